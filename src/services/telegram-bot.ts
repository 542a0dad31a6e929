/**
 * Telegram command front end
 *
 * Long-polls getUpdates, hands each command message to MonitorCommands with
 * the chat id as the user id, and sends the reply back to that chat. Updates
 * are handled one at a time in the order Telegram returns them.
 */

import type { UserId } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { HttpStatusError } from '../utils/retry.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';
import type { TelegramApi, TelegramUpdate } from './telegram-api.js';

const log = logger.telegram;

export interface CommandHandler {
  handle(userId: UserId, username: string, line: string): Promise<string>;
}

export interface TelegramBotOptions {
  api: TelegramApi;
  commands: CommandHandler;
  /** @default 30 */
  pollTimeoutSeconds?: number;
  /** Base delay after a failed getUpdates, doubled per consecutive failure */
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
}

export class TelegramBot {
  private offset = 0;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;

  constructor(private options: TelegramBotOptions) {
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? TIMEOUTS.UPDATES_LONG_POLL / 1000;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 60_000;
  }

  /**
   * Poll until the signal aborts. Never rejects.
   */
  async run(signal: AbortSignal): Promise<void> {
    log.info('Listening for commands');
    let failures = 0;

    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
        failures = 0;
      } catch (error) {
        if (signal.aborted) break;
        failures += 1;
        const delayMs = Math.min(this.retryDelayMs * 2 ** (failures - 1), this.maxRetryDelayMs);
        log.warn('getUpdates failed', { error: errorMessage(error), failures, delayMs });
        await sleep(delayMs, signal);
      }
    }

    log.info('Stopped listening for commands');
  }

  /**
   * Fetch and handle one batch of updates.
   *
   * @returns the number of updates received
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const updates = await this.options.api.getUpdates(this.offset, this.pollTimeoutSeconds, signal);
    for (const update of updates) {
      // acknowledged even when handling fails, so a bad update is not redelivered
      this.offset = Math.max(this.offset, update.update_id + 1);
      await this.handleUpdate(update);
    }
    return updates.length;
  }

  private async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    const text = message?.text?.trim();
    if (!message || !text?.startsWith('/')) {
      return;
    }

    const chatId = String(message.chat.id);
    const username = message.from?.username ?? message.from?.first_name ?? '';
    log.debug('Command received', { chatId, command: text.split(/\s+/)[0] });

    const reply = await this.options.commands.handle(chatId, username, text);
    try {
      await this.send(chatId, reply);
    } catch (error) {
      log.error('Reply could not be delivered', { chatId, error });
    }
  }

  private async send(chatId: string, text: string): Promise<void> {
    const { api } = this.options;
    try {
      await api.sendMessage(chatId, text);
    } catch (error) {
      if (!(error instanceof HttpStatusError && error.status === 400)) {
        throw error;
      }
      // Markdown Telegram could not parse, e.g. an underscore in a centre id
      log.debug('Markdown rejected, resending as plain text', { chatId });
      await api.sendMessage(chatId, text, { markdown: false });
    }
  }
}
