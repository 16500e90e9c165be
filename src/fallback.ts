/**
 * Fallback Executor
 *
 * Degraded path used only after the primary pipeline raised: one fixed news
 * search, one market wrap (with the summarizer's own retry policy) and one
 * plain-text delivery. It shares no stage with the primary pipeline.
 */

import { FALLBACK_REQUEST, formatNewsDigest } from './search/index.js';
import { generateMarketWrap } from './summarizer/index.js';
import { composeFallbackMessage } from './format/index.js';
import { FallbackError, type FallbackStep } from './utils/errors.js';
import type { MarketWrapDeps } from './context.js';
import type { DeliveryConfirmation } from './types/index.js';

async function step<T>(name: FallbackStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new FallbackError(name, error);
  }
}

export async function runFallback(deps: MarketWrapDeps): Promise<DeliveryConfirmation> {
  const { search, completion, messaging, report } = deps;
  const logger = deps.logger.child({ component: 'fallback' });
  const now = deps.now ?? (() => new Date());

  logger.info('Attempting fallback execution');

  const news = await step('fetch-news', async () =>
    formatNewsDigest(await search.search(FALLBACK_REQUEST))
  );

  const summary = await step('generate-summary', () =>
    generateMarketWrap(news, {
      client: completion,
      logger,
      sleep: deps.sleep,
      retry: deps.retry,
      completion: deps.completionOptions,
      wordBudget: report.wordBudget,
    })
  );

  const message = composeFallbackMessage(summary, now(), report.timeZone);

  const confirmation = await step('deliver', () => messaging.send(message));

  logger.info({ confirmation }, 'Fallback execution result');
  return confirmation;
}
