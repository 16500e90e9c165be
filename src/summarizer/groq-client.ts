/**
 * Groq chat completions through the OpenAI SDK
 */

import OpenAI, { APIError, type ClientOptions } from 'openai';
import { errorMessage } from '../utils/errors.js';
import type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
} from '../types/index.js';

export interface GroqClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  /** HTTP transport for the SDK; defaults to the global fetch */
  fetch?: ClientOptions['fetch'];
}

export class GroqCompletionClient implements CompletionClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: GroqClientOptions) {
    // Retries belong to the market wrap caller; the SDK must not add its own
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch,
    });
    this.model = options.model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from language model');
    }
    return content;
  }
}

/**
 * Classify a failed completion call.
 *
 * HTTP status from the SDK decides when present. Otherwise the message text
 * is matched: anything mentioning a limit is rate limiting, and
 * "internal server error" is a provider fault.
 */
export function classifyCompletionError(
  error: unknown
): Exclude<CompletionOutcome, { kind: 'success' }> {
  const message = errorMessage(error);

  if (error instanceof APIError && typeof error.status === 'number') {
    if (error.status === 429) {
      return { kind: 'transient', reason: 'rate-limit', message };
    }
    if (error.status >= 500) {
      return { kind: 'transient', reason: 'server-error', message };
    }
    return { kind: 'permanent', message };
  }

  const lower = message.toLowerCase();
  if (lower.includes('limit')) {
    return { kind: 'transient', reason: 'rate-limit', message };
  }
  if (lower.includes('internal server error')) {
    return { kind: 'transient', reason: 'server-error', message };
  }
  return { kind: 'permanent', message };
}
