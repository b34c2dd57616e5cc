import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Env vars arrive as strings, so z.coerce.boolean() would treat "false" as true
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOOKUP_BASE_URL: z.string().url().default('https://api.scryfall.com'),
  LOOKUP_USER_AGENT: z.string().min(1).default('slipsort/0.1'),
  LOOKUP_MIN_TIME_MS: z.coerce.number().int().nonnegative().default(100),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOOKUP_ENABLED: booleanFlag,
  OUTPUT_DIR: z.string().min(1).default('output'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  return envSchema.parse(env);
}

export const config: AppConfig = parseConfig(process.env);
