/**
 * Notifiers
 *
 * Deliver admitted slots to a user. The poll scheduler awaits notify() and
 * logs a rejection; HTTP notifiers retry transient failures a bounded number
 * of times before rejecting.
 */

import { createHmac } from 'node:crypto';
import type { AppointmentSlot, Notifier, UserId } from '../types/index.js';
import type { NotifierConfig } from '../utils/config-schemas.js';
import { formatAppointmentMessage } from '../utils/formatting.js';
import { logger } from '../utils/logger.js';
import { ensureOk, withRetry, type RetryOptions } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { TEST_CENTERS } from '../core/site-profile.js';
import { TelegramApi } from './telegram-api.js';

const log = logger.notifier;

type FetchFn = typeof fetch;

export interface HttpNotifierOptions {
  fetch?: FetchFn;
  retry?: RetryOptions;
  timeoutMs?: number;
}

function centerDisplayName(center: string): string {
  return TEST_CENTERS[center] ?? center;
}

/**
 * Writes admitted slots to the log. Used when no delivery channel is configured.
 */
export class LogNotifier implements Notifier {
  async notify(userId: UserId, slots: readonly AppointmentSlot[]): Promise<void> {
    log.info('Appointments available', {
      userId,
      slots: slots.map((slot) => ({ center: slot.center, date: slot.date, time: slot.time })),
    });
  }
}

/**
 * Sends a Markdown message through the Telegram Bot API. The user id is the chat id.
 */
export class TelegramNotifier implements Notifier {
  private readonly api: TelegramApi;

  constructor(botToken: string, options: HttpNotifierOptions = {}, apiBase?: string) {
    this.api = new TelegramApi(botToken, options, apiBase);
  }

  async notify(userId: UserId, slots: readonly AppointmentSlot[]): Promise<void> {
    await this.api.sendMessage(userId, formatAppointmentMessage(slots, centerDisplayName));
    log.info('Telegram notification sent', { userId, slots: slots.length });
  }
}

export interface WebhookPayload {
  event: 'appointments.available';
  userId: UserId;
  sentAt: number;
  slots: readonly AppointmentSlot[];
}

/**
 * POSTs a JSON payload, signed with HMAC-SHA256 when a secret is configured.
 */
export class WebhookNotifier implements Notifier {
  private readonly fetchFn: FetchFn;

  constructor(
    private url: string,
    private secret: string | undefined,
    private options: HttpNotifierOptions = {},
    private now: () => number = Date.now
  ) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async notify(userId: UserId, slots: readonly AppointmentSlot[]): Promise<void> {
    const sentAt = this.now();
    const payload: WebhookPayload = { event: 'appointments.available', userId, sentAt, slots };
    const body = JSON.stringify(payload);

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Webhook-Timestamp': sentAt.toString(),
    };
    if (this.secret) {
      headers['X-Webhook-Signature'] = `sha256=${signPayload(body, this.secret)}`;
    }

    const deliveryStart = this.now();
    await withRetry(async () => {
      const response = await this.fetchFn(this.url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? TIMEOUTS.NOTIFY_REQUEST),
      });
      await ensureOk(response);
    }, this.options.retry);

    log.timed('Webhook delivered', deliveryStart, { userId, slots: slots.length }, this.now);
  }
}

export function signPayload(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

export function createNotifier(config: NotifierConfig, options: HttpNotifierOptions = {}): Notifier {
  switch (config.channel) {
    case 'telegram':
      return new TelegramNotifier(config.botToken, options);
    case 'webhook':
      return new WebhookNotifier(config.url, config.secret, options);
    case 'log':
      return new LogNotifier();
  }
}
