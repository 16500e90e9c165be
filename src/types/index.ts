/**
 * Core types for the Market Wrap Bot
 */

export interface NewsArticle {
  title: string;
  content: string;
  url: string;
  publishedDate: string;
}

export interface NewsImage {
  url: string;
  description: string;
}

export type SearchDepth = 'basic' | 'advanced';

export interface SearchRequest {
  query: string;
  maxResults: number;
  depth: SearchDepth;
  includeImages?: boolean;
  includeAnswer?: boolean;
}

export interface SearchResponse {
  articles: NewsArticle[];
  images: NewsImage[];
  answer?: string;
}

/** Text built from the top search results, handed to the summarizer */
export type NewsDigest = string;

/** Language-model summary, bounded by the word budget */
export type MarketSummary = string;

/** Final Markdown text sent to the channel */
export type DeliveryMessage = string;

export type DeliveryConfirmation = string;

export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface SendOptions {
  parseMode?: ParseMode;
}

/**
 * Outcome of one invocation. `primaryError` is set whenever the primary
 * pipeline raised and the fallback ran.
 */
export type PipelineResult =
  | { status: 'delivered'; path: 'primary'; confirmation: DeliveryConfirmation }
  | { status: 'delivered'; path: 'fallback'; confirmation: DeliveryConfirmation; primaryError: string }
  | { status: 'failed'; error: string; primaryError: string };

export type TransientReason = 'rate-limit' | 'server-error';

export type CompletionOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'transient'; reason: TransientReason; message: string }
  | { kind: 'permanent'; message: string };

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
}

export interface RetryConfig {
  maxAttempts: number;
  /** Seconds per attempt number; attempt n waits `n * step` */
  rateLimitStepSeconds: number;
  serverErrorStepSeconds: number;
}

// ─── Collaborator contracts ─────────────────────────────────────────────────

export interface SearchClient {
  search(request: SearchRequest): Promise<SearchResponse>;
}

export interface CompletionClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface MessagingClient {
  send(text: DeliveryMessage, options?: SendOptions): Promise<DeliveryConfirmation>;
}
