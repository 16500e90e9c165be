/**
 * Collaborators and settings shared by the primary and fallback paths
 */

import type { Logger } from './utils/logger.js';
import type { Sleep } from './utils/retry.js';
import type {
  CompletionClient,
  CompletionOptions,
  MessagingClient,
  RetryConfig,
  SearchClient,
} from './types/index.js';

export interface ReportSettings {
  timeZone: string;
  wordBudget: number;
  includeCharts: boolean;
}

export interface MarketWrapDeps {
  search: SearchClient;
  /** Chart lookup client, usually with a shorter timeout; defaults to `search` */
  chartSearch?: SearchClient;
  completion: CompletionClient;
  messaging: MessagingClient;
  logger: Logger;
  report: ReportSettings;
  retry: RetryConfig;
  completionOptions: CompletionOptions;
  /** Backoff wait; defaults to a real timer */
  sleep?: Sleep;
  /** Clock for message timestamps */
  now?: () => Date;
}
