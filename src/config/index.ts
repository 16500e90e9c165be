/**
 * Application configuration
 */

import type { Env } from './env.js';
import type { RetryConfig } from '../types/index.js';

export interface AppConfig {
  app: {
    name: string;
    version: string;
    env: Env['NODE_ENV'];
  };
  llm: {
    apiKey: string;
    model: string;
    baseUrl: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  search: {
    apiKey: string;
    endpoint: string;
    timeoutMs: number;
    chartTimeoutMs: number;
  };
  telegram: {
    botToken: string;
    chatId: string;
    apiBaseUrl: string;
    timeoutMs: number;
  };
  report: {
    timeZone: string;
    wordBudget: number;
    includeCharts: boolean;
  };
  logging: {
    level: Env['LOG_LEVEL'];
    file: string;
  };
  retry: RetryConfig;
}

export function buildConfig(env: Env): AppConfig {
  return {
    app: {
      name: 'market-wrap-bot',
      version: '1.0.0',
      env: env.NODE_ENV,
    },

    llm: {
      apiKey: env.GROQ_API_KEY,
      model: env.GROQ_MODEL,
      baseUrl: env.GROQ_BASE_URL,
      temperature: 0.7,
      maxTokens: 400,
      timeoutMs: 30000,
    },

    search: {
      apiKey: env.TAVILY_API_KEY,
      endpoint: 'https://api.tavily.com/search',
      timeoutMs: 30000,
      chartTimeoutMs: 20000,
    },

    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
      apiBaseUrl: 'https://api.telegram.org',
      timeoutMs: 30000,
    },

    report: {
      timeZone: env.REPORT_TIMEZONE,
      wordBudget: 300,
      includeCharts: env.INCLUDE_CHARTS,
    },

    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE,
    },

    retry: {
      maxAttempts: 3,
      rateLimitStepSeconds: 15,
      serverErrorStepSeconds: 10,
    },
  };
}

export { loadEnv, REQUIRED_ENV_VARS, type Env } from './env.js';
