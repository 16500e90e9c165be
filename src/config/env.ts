/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { ConfigError } from '../utils/errors.js';
import { isValidTimeZone } from '../utils/date.js';

export const REQUIRED_ENV_VARS = [
  'GROQ_API_KEY',
  'TAVILY_API_KEY',
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Language model (Groq via OpenAI-compatible endpoint)
  GROQ_API_KEY: z.string().trim().min(1),
  GROQ_MODEL: z.string().default('llama-3.1-8b-instant'),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),

  // Search
  TAVILY_API_KEY: z.string().trim().min(1),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1),
  TELEGRAM_CHAT_ID: z.string().trim().min(1),

  // Report
  REPORT_TIMEZONE: z
    .string()
    .default('America/New_York')
    .refine(isValidTimeZone, 'REPORT_TIMEZONE must be an IANA time zone'),
  INCLUDE_CHARTS: booleanFlag,

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().default('./logs/market-wrap.log'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate the environment once, before any stage runs.
 * Missing credentials are reported together by name.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const missing = REQUIRED_ENV_VARS.filter((name) => !source[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(missing);
  }

  const result = envSchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError([], details);
  }

  return result.data;
}
