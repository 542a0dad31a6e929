import { createHmac } from 'node:crypto';
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  LogNotifier,
  TelegramNotifier,
  WebhookNotifier,
  createNotifier,
  signPayload,
} from '../../src/services/notifier.js';
import type { AppointmentSlot } from '../../src/types/index.js';
import { logger } from '../../src/utils/logger.js';

const slots: AppointmentSlot[] = [
  {
    center: 'london',
    date: '2025-07-01',
    time: '09:30',
    testType: 'car',
    bookingUrl: 'https://booking.test/book/1',
  },
];

const fastRetry = { initialDelayMs: 1 };

function requestOf(fetchMock: Mock<typeof fetch>, call = 0): { url: string; init: RequestInit | undefined } {
  const args = fetchMock.mock.calls[call];
  if (!args) {
    throw new Error(`fetch call ${call} not made`);
  }
  return { url: String(args[0]), init: args[1] };
}

describe('TelegramNotifier', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
  });

  it('should post a Markdown message to the chat', async () => {
    const notifier = new TelegramNotifier('test-token', { fetch: fetchMock });

    await notifier.notify('12345', slots);

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '12345',
      text:
        '*Appointments available!*\n\n' +
        '*1. London Test Centre*\nDate: 2025-07-01\nTime: 09:30\nTest type: car\n[Book now](https://booking.test/book/1)',
      parse_mode: 'Markdown',
      disable_web_page_preview: true,
    });
  });

  it('should retry a server error', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));
    const notifier = new TelegramNotifier('test-token', { fetch: fetchMock, retry: fastRetry });

    await notifier.notify('12345', slots);

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should reject a client error without retrying', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 400, statusText: 'Bad Request' }));
    const notifier = new TelegramNotifier('test-token', { fetch: fetchMock, retry: fastRetry });

    await expect(notifier.notify('12345', slots)).rejects.toThrow('HTTP 400: Bad Request');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should give up after the attempt limit', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const notifier = new TelegramNotifier('test-token', {
      fetch: fetchMock,
      retry: { ...fastRetry, maxAttempts: 2 },
    });

    await expect(notifier.notify('12345', slots)).rejects.toThrow('fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('WebhookNotifier', () => {
  const sentAt = Date.parse('2025-06-01T12:00:00Z');
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
  });

  it('should post a signed payload', async () => {
    const notifier = new WebhookNotifier('https://hooks.test/slots', 'test-secret', { fetch: fetchMock }, () => sentAt);

    await notifier.notify('u1', slots);

    const { url, init } = requestOf(fetchMock);
    const body = String(init?.body);
    expect(url).toBe('https://hooks.test/slots');
    expect(JSON.parse(body)).toEqual({ event: 'appointments.available', userId: 'u1', sentAt, slots });
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Webhook-Timestamp': String(sentAt),
      'X-Webhook-Signature': `sha256=${createHmac('sha256', 'test-secret').update(body).digest('hex')}`,
    });
  });

  it('should omit the signature without a secret', async () => {
    const notifier = new WebhookNotifier('https://hooks.test/slots', undefined, { fetch: fetchMock }, () => sentAt);

    await notifier.notify('u1', slots);

    expect(requestOf(fetchMock).init?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Webhook-Timestamp': String(sentAt),
    });
  });

  it('should time delivery with the injected clock', async () => {
    const info = vi.spyOn(logger.notifier, 'info');
    const clock = vi.fn<() => number>().mockReturnValueOnce(sentAt).mockReturnValueOnce(sentAt).mockReturnValueOnce(sentAt + 250);
    const notifier = new WebhookNotifier('https://hooks.test/slots', undefined, { fetch: fetchMock }, clock);

    await notifier.notify('u1', slots);

    expect(clock).toHaveBeenCalledTimes(3);
    expect(info).toHaveBeenCalledWith('Webhook delivered', { userId: 'u1', slots: 1, durationMs: 250 });
    info.mockRestore();
  });
});

describe('signPayload', () => {
  it('should produce a hex HMAC that depends on the secret', () => {
    const signature = signPayload('{"a":1}', 'test-secret');

    expect(signature).toMatch(/^[0-9a-f]{64}$/);
    expect(signPayload('{"a":1}', 'other-secret')).not.toBe(signature);
  });
});

describe('createNotifier', () => {
  it('should pick the notifier for the configured channel', () => {
    expect(createNotifier({ channel: 'telegram', botToken: 'test-token' })).toBeInstanceOf(TelegramNotifier);
    expect(createNotifier({ channel: 'webhook', url: 'https://hooks.test/slots', secret: undefined })).toBeInstanceOf(
      WebhookNotifier
    );
    expect(createNotifier({ channel: 'log' })).toBeInstanceOf(LogNotifier);
  });

  it('should resolve the log notifier without side effects', async () => {
    await expect(new LogNotifier().notify('u1', slots)).resolves.toBeUndefined();
  });
});
