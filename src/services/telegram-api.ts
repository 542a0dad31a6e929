/**
 * Telegram Bot API client
 *
 * sendMessage for replies and slot alerts, getUpdates for reading commands
 * by long polling. Responses are validated before use.
 */

import { z } from 'zod';
import { ensureOk, withRetry, type RetryOptions } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';

type FetchFn = typeof fetch;

export interface TelegramApiOptions {
  fetch?: FetchFn;
  retry?: RetryOptions;
  /** Per-request timeout; getUpdates adds its long-poll time on top */
  timeoutMs?: number;
}

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      chat: z.object({ id: z.number().int() }),
      from: z
        .object({
          username: z.string().optional(),
          first_name: z.string().optional(),
        })
        .optional(),
      text: z.string().optional(),
    })
    .optional(),
});

const updatesResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.array(updateSchema).default([]),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export interface SendMessageOptions {
  /** @default true */
  markdown?: boolean;
}

/**
 * Aborts on the parent signal or after `ms`, whichever comes first
 */
function linkedTimeout(ms: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  const onAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

export class TelegramApi {
  private readonly fetchFn: FetchFn;

  constructor(
    private botToken: string,
    private options: TelegramApiOptions = {},
    private apiBase = 'https://api.telegram.org'
  ) {
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Transient failures are retried; a 400 (e.g. unparseable Markdown) is not.
   */
  async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<void> {
    const body = JSON.stringify({
      chat_id: chatId,
      text,
      ...(options.markdown === false ? {} : { parse_mode: 'Markdown' }),
      disable_web_page_preview: true,
    });

    await withRetry(async () => {
      const response = await this.fetchFn(this.methodUrl('sendMessage'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      await ensureOk(response);
    }, this.options.retry);
  }

  /**
   * Messages after `offset`, waiting up to `timeoutSeconds` for one to arrive.
   * Not retried here; the polling loop owns backoff.
   */
  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const request = linkedTimeout(timeoutSeconds * 1000 + this.requestTimeoutMs, signal);
    try {
      const response = await this.fetchFn(this.methodUrl('getUpdates'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ offset, timeout: timeoutSeconds, allowed_updates: ['message'] }),
        signal: request.signal,
      });
      await ensureOk(response);

      const parsed = updatesResponseSchema.parse(await response.json());
      if (!parsed.ok) {
        throw new Error(`getUpdates failed: ${parsed.description ?? 'no description'}`);
      }
      return parsed.result;
    } finally {
      request.dispose();
    }
  }

  private get requestTimeoutMs(): number {
    return this.options.timeoutMs ?? TIMEOUTS.NOTIFY_REQUEST;
  }

  private methodUrl(method: string): string {
    return `${this.apiBase}/bot${this.botToken}/${method}`;
  }
}
