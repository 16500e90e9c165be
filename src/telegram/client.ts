/**
 * Telegram Bot API sender
 *
 * One sendMessage call per delivery, bounded by a timeout, never retried.
 */

import { z } from 'zod';
import { DeliveryError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type {
  DeliveryConfirmation,
  DeliveryMessage,
  MessagingClient,
  SendOptions,
} from '../types/index.js';

export interface TelegramClientOptions {
  botToken: string;
  chatId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const sendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.object({ message_id: z.number() }).optional(),
});

export const DELIVERY_CONFIRMATION = '✅ Message sent successfully to Telegram channel';

export class TelegramClient implements MessagingClient {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: TelegramClientOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.telegram.org';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  private apiUrl(method: string): string {
    return `${this.apiBaseUrl}/bot${this.botToken}/${method}`;
  }

  async send(text: DeliveryMessage, options: SendOptions = {}): Promise<DeliveryConfirmation> {
    const body: Record<string, unknown> = {
      chat_id: this.chatId,
      text,
    };
    if (options.parseMode) body.parse_mode = options.parseMode;

    this.logger.info({ length: text.length, parseMode: options.parseMode }, 'Sending message to Telegram');

    let resp: Response;
    try {
      resp = await this.fetchFn(this.apiUrl('sendMessage'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Telegram request failed');
      throw new DeliveryError(`Error sending to Telegram: ${errorMessage(error)}`, { cause: error });
    }

    let raw: unknown = null;
    try {
      raw = await resp.json();
    } catch (error) {
      if (resp.ok) {
        throw new DeliveryError('Telegram returned an unreadable response', {
          status: resp.status,
          cause: error,
        });
      }
    }

    const parsed = sendMessageResponseSchema.safeParse(raw);
    const description = parsed.success ? parsed.data.description : undefined;

    if (!resp.ok || !parsed.success || !parsed.data.ok) {
      this.logger.error({ status: resp.status, description }, 'Telegram sendMessage failed');
      throw new DeliveryError(
        `Error sending to Telegram: ${resp.status}${description ? ` ${description}` : ''}`,
        { status: resp.status }
      );
    }

    const messageId = parsed.data.result?.message_id;
    this.logger.info({ messageId }, 'Message delivered');

    return messageId === undefined
      ? DELIVERY_CONFIRMATION
      : `${DELIVERY_CONFIRMATION} (message ${messageId})`;
  }
}
