/**
 * Create Superuser Script
 *
 * Creates a staff + superuser account in the configured database.
 *
 * Usage: npm run create-superuser -- --email admin@example.com --password <password> [--name Admin]
 * The password may also come from SUPERUSER_PASSWORD.
 */

import { mkdirSync } from 'fs';
import dotenv from 'dotenv';
import { loadConfig } from '../src/config.js';
import { IN_MEMORY, closeDatabase, isUniqueViolation, openDatabase } from '../src/db/index.js';
import { ValidationError } from '../src/errors.js';
import { createSuperuser } from '../src/services/userService.js';

async function main() {
  dotenv.config();
  const args = process.argv.slice(2);

  let email: string | undefined;
  let password = process.env.SUPERUSER_PASSWORD;
  let name = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--email' || arg === '-e') {
      email = args[++i];
    } else if (arg === '--password' || arg === '-p') {
      password = args[++i];
    } else if (arg === '--name' || arg === '-n') {
      name = args[++i] ?? '';
    }
  }

  if (!password) {
    console.error('A password is required (--password or SUPERUSER_PASSWORD)');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  if (config.databasePath !== IN_MEMORY) {
    mkdirSync(config.databasePath, { recursive: true });
  }
  const db = await openDatabase(config.databasePath);

  try {
    const user = await createSuperuser(db, { email, password, name }, config.bcryptRounds);
    console.log(`Created superuser ${user.email} (id ${user.id})`);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(Object.values(error.fields).flat().join('\n'));
    } else if (isUniqueViolation(error)) {
      console.error(`A user with email ${email} already exists`);
    } else {
      throw error;
    }
    process.exitCode = 1;
  } finally {
    await closeDatabase(db);
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
