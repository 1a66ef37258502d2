import { join, resolve } from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  MACRO_DATA_DIR: z.string().min(1).default('./data'),
  MACRO_SCREENSHOT_DIR: z.string().min(1).optional(),
  MACRO_LOG_DIR: z.string().min(1).optional(),
  MACRO_DEFAULT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
});

export type Env = z.infer<typeof envSchema>;

export interface RuntimePaths {
  dataDir: string;
  screenshotDir: string;
  logDir: string;
}

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached environment so the next `getEnv()` re-reads `process.env`. */
export function resetEnv(): void {
  _env = null;
}

export function resolvePaths(env: Env = getEnv()): RuntimePaths {
  const dataDir = resolve(env.MACRO_DATA_DIR);
  return {
    dataDir,
    screenshotDir: resolve(env.MACRO_SCREENSHOT_DIR ?? join(dataDir, 'screenshots')),
    logDir: resolve(env.MACRO_LOG_DIR ?? join(dataDir, 'logs')),
  };
}
