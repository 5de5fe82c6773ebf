import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { closeDatabase, openDatabase } from '../src/db/index.js';
import { LocalMediaStorage } from '../src/services/mediaStorage.js';
import { createUser, obtainToken } from '../src/services/userService.js';
import type { AppContext, User } from '../src/types.js';

export const TEST_PASSWORD = 'test-pass-123';

export interface TestContext extends AppContext {
  app: Express;
  cleanup: () => Promise<void>;
}

/**
 * Fresh in-memory database and a temporary media root.
 */
export async function createTestContext(): Promise<TestContext> {
  const mediaRoot = await mkdtemp(join(tmpdir(), 'recipe-api-'));
  const config = loadConfig({
    DATABASE_PATH: ':memory:',
    MEDIA_ROOT: mediaRoot,
    BCRYPT_ROUNDS: '4',
  });
  const db = await openDatabase(config.databasePath);
  const media = new LocalMediaStorage(config.mediaRoot, config.mediaUrl);
  const ctx = { config, db, media };

  return {
    ...ctx,
    app: createApp(ctx),
    cleanup: async () => {
      await closeDatabase(db);
      await rm(mediaRoot, { recursive: true, force: true });
    },
  };
}

export interface AuthedUser {
  user: User;
  token: string;
  /** Value for the Authorization header */
  auth: string;
}

export async function createAuthedUser(ctx: AppContext, email = 'user@example.com'): Promise<AuthedUser> {
  const user = await createUser(ctx.db, { email, password: TEST_PASSWORD, name: 'Test User' }, { rounds: 4 });
  const { token } = await obtainToken(ctx.db, { email, password: TEST_PASSWORD });
  return { user, token, auth: `Token ${token}` };
}

export function samplePng(): Promise<Buffer> {
  return sharp({
    create: { width: 4, height: 4, channels: 3, background: { r: 200, g: 80, b: 40 } },
  })
    .png()
    .toBuffer();
}

export function sampleAvif(): Promise<Buffer> {
  return sharp({
    create: { width: 16, height: 16, channels: 3, background: { r: 40, g: 120, b: 200 } },
  })
    .avif()
    .toBuffer();
}
