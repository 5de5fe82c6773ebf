import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_PATH: z.string().min(1).default('data/recipes'),
  MEDIA_ROOT: z.string().min(1).default('media'),
  MEDIA_URL: z.string().min(1).default('/media/'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  JSON_BODY_LIMIT: z.string().min(1).default('1mb'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  CORS_ORIGIN: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  mediaRoot: string;
  /** Always ends with '/' */
  mediaUrl: string;
  maxUploadBytes: number;
  jsonBodyLimit: string;
  bcryptRounds: number;
  corsOrigin?: string;
}

/**
 * Build the app configuration from environment variables.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databasePath: vars.DATABASE_PATH,
    mediaRoot: vars.MEDIA_ROOT,
    mediaUrl: vars.MEDIA_URL.endsWith('/') ? vars.MEDIA_URL : `${vars.MEDIA_URL}/`,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    jsonBodyLimit: vars.JSON_BODY_LIMIT,
    bcryptRounds: vars.BCRYPT_ROUNDS,
    corsOrigin: vars.CORS_ORIGIN,
  };
}
