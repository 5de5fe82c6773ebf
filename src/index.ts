import { mkdirSync } from 'fs';
import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { IN_MEMORY, openDatabase } from './db/index.js';
import { LocalMediaStorage } from './services/mediaStorage.js';

dotenv.config();

async function main() {
  const config = loadConfig();

  if (config.databasePath !== IN_MEMORY) {
    mkdirSync(config.databasePath, { recursive: true });
  }
  mkdirSync(config.mediaRoot, { recursive: true });

  const db = await openDatabase(config.databasePath);
  const media = new LocalMediaStorage(config.mediaRoot, config.mediaUrl);
  const app = createApp({ config, db, media });

  app.listen(config.port, () => {
    console.log(`[Server] Recipe API running on http://localhost:${config.port}`);
  });
}

main().catch(error => {
  console.error('[Server] Failed to start:', error);
  process.exitCode = 1;
});
