import path from 'path';
import { z } from 'zod';

const isTest = process.env.NODE_ENV === 'test';

const intFromEnv = (defaultValue: number, min: number) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z
      .string()
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(min))
  );

const envSchema = z.object({
  PORT: intFromEnv(8080, 1),
  // Tokens signed with one secret are unverifiable under another, so it must be
  // stable across restarts and is never generated at boot.
  JWT_SECRET: isTest
    ? z.string().min(1).default('test-secret')
    : z.string().min(16, 'JWT_SECRET must be set (at least 16 characters)'),
  JWT_ISSUER: z.string().min(1).default('wiki'),
  TOKEN_TTL_SECONDS: intFromEnv(0, 0),
  SESSION_TTL_MS: intFromEnv(30 * 60 * 1000, 1000),
  SESSION_COOKIE: z.string().min(1).default('wiki.sid'),
  COOKIE_SECURE: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((s) => s === 'true' || s === '1'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  DB_POOL_SIZE: intFromEnv(30, 1),
  DB_ACQUIRE_TIMEOUT_MS: intFromEnv(5000, 1),
  USERS_FILE: z.string().default(path.join(__dirname, '..', '..', 'config', 'wiki-users.json')),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(isTest ? 'silent' : 'info'),
});

function loadConfig() {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const env = parsed.data;

  return {
    wiki: {
      port: env.PORT,
      jwtSecret: env.JWT_SECRET,
      jwtIssuer: env.JWT_ISSUER,
      tokenTtlSeconds: env.TOKEN_TTL_SECONDS,
      sessionTtlMs: env.SESSION_TTL_MS,
      sessionCookie: env.SESSION_COOKIE,
      cookieSecure: env.COOKIE_SECURE,
      usersFile: env.USERS_FILE,
    },
    db: {
      redisUrl: env.REDIS_URL,
      poolSize: env.DB_POOL_SIZE,
      acquireTimeoutMs: env.DB_ACQUIRE_TIMEOUT_MS,
    },
    logLevel: env.LOG_LEVEL,
    isProduction: process.env.NODE_ENV === 'production',
    isTest,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
