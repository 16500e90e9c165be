/**
 * Market Wrap Workflow
 *
 * Primary pipeline first; the fallback executor only if it raised.
 * There is no third level: a failed fallback is reported as total failure.
 */

import { createPrimaryStages, runPrimaryPipeline, type PrimaryStages } from './pipeline.js';
import { runFallback } from './fallback.js';
import { TavilySearchClient } from './search/index.js';
import { GroqCompletionClient } from './summarizer/index.js';
import { TelegramClient } from './telegram/index.js';
import { errorMessage } from './utils/errors.js';
import type { Logger } from './utils/logger.js';
import type { AppConfig } from './config/index.js';
import type { MarketWrapDeps } from './context.js';
import type { PipelineResult } from './types/index.js';

/**
 * Wire the real collaborators from validated configuration
 */
export function createDependencies(config: AppConfig, logger: Logger): MarketWrapDeps {
  const searchLogger = logger.child({ component: 'search' });

  return {
    search: new TavilySearchClient({
      apiKey: config.search.apiKey,
      endpoint: config.search.endpoint,
      timeoutMs: config.search.timeoutMs,
      logger: searchLogger,
    }),
    chartSearch: new TavilySearchClient({
      apiKey: config.search.apiKey,
      endpoint: config.search.endpoint,
      timeoutMs: config.search.chartTimeoutMs,
      logger: searchLogger,
    }),
    completion: new GroqCompletionClient({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      baseUrl: config.llm.baseUrl,
      timeoutMs: config.llm.timeoutMs,
    }),
    messaging: new TelegramClient({
      botToken: config.telegram.botToken,
      chatId: config.telegram.chatId,
      apiBaseUrl: config.telegram.apiBaseUrl,
      timeoutMs: config.telegram.timeoutMs,
      logger: logger.child({ component: 'telegram' }),
    }),
    logger,
    report: config.report,
    retry: config.retry,
    completionOptions: {
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
    },
  };
}

export interface WorkflowOptions {
  /** Override the default stages; the fallback always uses `deps` directly */
  stages?: PrimaryStages;
}

export async function runMarketWrap(
  deps: MarketWrapDeps,
  options: WorkflowOptions = {}
): Promise<PipelineResult> {
  const { logger } = deps;
  const startTime = Date.now();
  const stages = options.stages ?? createPrimaryStages(deps);

  logger.info('Starting market wrap workflow');

  let primaryError: string;
  try {
    const confirmation = await runPrimaryPipeline(stages, logger.child({ component: 'pipeline' }));
    logger.info({ durationMs: Date.now() - startTime }, 'Workflow completed');
    return { status: 'delivered', path: 'primary', confirmation };
  } catch (error) {
    primaryError = errorMessage(error);
    logger.error({ error: primaryError }, 'Workflow failed');
  }

  try {
    const confirmation = await runFallback(deps);
    logger.info({ durationMs: Date.now() - startTime }, 'Fallback completed');
    return { status: 'delivered', path: 'fallback', confirmation, primaryError };
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ error: message, durationMs: Date.now() - startTime }, 'Fallback failed');
    return { status: 'failed', error: message, primaryError };
  }
}
