/**
 * Primary Pipeline
 *
 * Four stages run strictly in order, each fed only the previous stage's output:
 * 1. research  - search today's market news and build a digest
 * 2. summarize - market wrap from the language model
 * 3. format    - Telegram Markdown message
 * 4. deliver   - send to the channel
 *
 * Each stage gets a single attempt. The first failure aborts the run.
 */

import { formatResearchDigest, findMarketCharts, RESEARCH_REQUEST } from './search/index.js';
import type { MarketChart } from './search/index.js';
import { requestMarketWrap, clampWords } from './summarizer/index.js';
import { formatMarketWrap } from './format/index.js';
import { StageError, errorMessage } from './utils/errors.js';
import type { Logger } from './utils/logger.js';
import type { MarketWrapDeps } from './context.js';
import type {
  DeliveryConfirmation,
  DeliveryMessage,
  MarketSummary,
  NewsDigest,
} from './types/index.js';

export const PRIMARY_STAGE_ORDER = ['research', 'summarize', 'format', 'deliver'] as const;

export type StageName = (typeof PRIMARY_STAGE_ORDER)[number];

export interface Stage<I, O> {
  name: StageName;
  run(input: I): Promise<O>;
}

export interface PrimaryStages {
  research: Stage<void, NewsDigest>;
  summarize: Stage<NewsDigest, MarketSummary>;
  format: Stage<MarketSummary, DeliveryMessage>;
  deliver: Stage<DeliveryMessage, DeliveryConfirmation>;
}

/**
 * Build the default stages over the given collaborators
 */
export function createPrimaryStages(deps: MarketWrapDeps): PrimaryStages {
  const { search, completion, messaging, report, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const chartSearch = deps.chartSearch ?? search;

  return {
    research: {
      name: 'research',
      run: async () => formatResearchDigest(await search.search(RESEARCH_REQUEST)),
    },

    summarize: {
      name: 'summarize',
      run: async (digest) => {
        const outcome = await requestMarketWrap(digest, {
          client: completion,
          logger: logger.child({ component: 'summarizer' }),
          sleep: deps.sleep,
          retry: deps.retry,
          completion: deps.completionOptions,
          wordBudget: report.wordBudget,
        });
        if (outcome.kind === 'success') {
          return clampWords(outcome.text, report.wordBudget);
        }
        throw new Error(
          outcome.kind === 'transient'
            ? `Language model unavailable after retries: ${outcome.message}`
            : `Language model error: ${outcome.message}`
        );
      },
    },

    format: {
      name: 'format',
      run: async (summary) => {
        let charts: MarketChart[] = [];
        if (report.includeCharts) {
          try {
            charts = await findMarketCharts(chartSearch, 'US market wrap');
          } catch (error) {
            logger.warn({ error: errorMessage(error) }, 'Chart lookup failed, formatting without charts');
          }
        }
        return formatMarketWrap(summary, { now: now(), timeZone: report.timeZone, charts });
      },
    },

    deliver: {
      name: 'deliver',
      run: (message) => messaging.send(message, { parseMode: 'Markdown' }),
    },
  };
}

async function runStage<I, O>(stage: Stage<I, O>, input: I, logger: Logger): Promise<O> {
  const startTime = Date.now();
  logger.info({ stage: stage.name }, 'Stage starting');

  try {
    const output = await stage.run(input);
    logger.info({ stage: stage.name, durationMs: Date.now() - startTime }, 'Stage complete');
    return output;
  } catch (error) {
    logger.error({ stage: stage.name, error: errorMessage(error) }, 'Stage failed');
    throw new StageError(stage.name, error);
  }
}

/**
 * Run research → summarize → format → deliver and return the delivery confirmation.
 * Throws a StageError naming the first stage that failed.
 */
export async function runPrimaryPipeline(
  stages: PrimaryStages,
  logger: Logger
): Promise<DeliveryConfirmation> {
  logger.info('Starting primary pipeline');

  const digest = await runStage(stages.research, undefined, logger);
  const summary = await runStage(stages.summarize, digest, logger);
  const message = await runStage(stages.format, summary, logger);
  const confirmation = await runStage(stages.deliver, message, logger);

  logger.info({ confirmation }, 'Primary pipeline complete');
  return confirmation;
}
