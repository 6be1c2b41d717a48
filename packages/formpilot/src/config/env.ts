import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  FORMPILOT_PREFERENCES_PATH: z.string().min(1).default('./formpilot_preferences.json'),
  FORMPILOT_SCREENSHOT_DIR: z.string().min(1).default('./screenshots'),
  FORMPILOT_HEADLESS: booleanFlag.default('true'),
  FORMPILOT_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drops the cached environment so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
