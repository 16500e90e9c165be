/**
 * Market Wrap Summarizer
 *
 * Retry-aware language-model caller. Transient provider errors back off
 * linearly by attempt number; everything else ends the call at once.
 */

import { classifyCompletionError } from './groq-client.js';
import { withRetry, type Sleep } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
  MarketSummary,
  NewsDigest,
  RetryConfig,
} from '../types/index.js';

export const DEFAULT_WORD_BUDGET = 300;

export const RETRY_EXHAUSTED_MESSAGE = 'Rate limit exceeded or LLM error after retries.';

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  rateLimitStepSeconds: 15,
  serverErrorStepSeconds: 10,
};

const DEFAULT_COMPLETION: CompletionOptions = {
  temperature: 0.7,
  maxTokens: 400,
};

export interface SummarizerDeps {
  client: CompletionClient;
  logger?: Logger;
  sleep?: Sleep;
  retry?: RetryConfig;
  completion?: CompletionOptions;
  wordBudget?: number;
}

export function buildMarketWrapPrompt(
  digest: NewsDigest,
  wordBudget: number = DEFAULT_WORD_BUDGET
): string {
  return `Write a concise (<${wordBudget} words) US market wrap based on the news:\n${digest}`;
}

/**
 * Milliseconds to wait after `attempt` produced `outcome`, or null if final
 */
export function backoffFor(
  outcome: CompletionOutcome,
  attempt: number,
  retry: RetryConfig = DEFAULT_RETRY
): number | null {
  if (outcome.kind !== 'transient') {
    return null;
  }
  const step =
    outcome.reason === 'rate-limit' ? retry.rateLimitStepSeconds : retry.serverErrorStepSeconds;
  return step * attempt * 1000;
}

/**
 * Request a market wrap and report the classified outcome.
 * Never throws for provider errors and never makes more than
 * `retry.maxAttempts` calls.
 */
export async function requestMarketWrap(
  digest: NewsDigest,
  deps: SummarizerDeps
): Promise<CompletionOutcome> {
  const {
    client,
    logger = silentLogger,
    sleep,
    retry = DEFAULT_RETRY,
    completion = DEFAULT_COMPLETION,
    wordBudget = DEFAULT_WORD_BUDGET,
  } = deps;

  const prompt = buildMarketWrapPrompt(digest, wordBudget);

  return withRetry<CompletionOutcome>(
    async (attempt) => {
      logger.debug({ attempt, promptLength: prompt.length }, 'Requesting market wrap');
      try {
        const text = await client.complete(prompt, completion);
        logger.info({ attempt, length: text.length }, 'Market wrap generated');
        return { kind: 'success', text };
      } catch (error) {
        const outcome = classifyCompletionError(error);
        if (outcome.kind === 'transient') {
          logger.warn({ attempt, reason: outcome.reason, error: outcome.message }, 'Transient LLM error');
        } else {
          logger.error({ attempt, error: outcome.message }, 'LLM error');
        }
        return outcome;
      }
    },
    {
      maxAttempts: retry.maxAttempts,
      backoffMs: (outcome, attempt) => backoffFor(outcome, attempt, retry),
      sleep,
      logger,
    }
  );
}

/**
 * String form of {@link requestMarketWrap}: the summary text, an error
 * description, or the retries-exhausted sentinel.
 */
export async function generateMarketWrap(
  digest: NewsDigest,
  deps: SummarizerDeps
): Promise<string> {
  const outcome = await requestMarketWrap(digest, deps);
  switch (outcome.kind) {
    case 'success':
      return outcome.text;
    case 'permanent':
      return `Error generating summary: ${outcome.message}`;
    case 'transient':
      return RETRY_EXHAUSTED_MESSAGE;
  }
}

/**
 * Truncate to `limit` whitespace-separated words; text within budget is returned untouched
 */
export function clampWords(text: string, limit: number = DEFAULT_WORD_BUDGET): MarketSummary {
  const words = text.trim().split(/\s+/);
  if (words.length <= limit) {
    return text;
  }
  return `${words.slice(0, limit).join(' ')}…`;
}
