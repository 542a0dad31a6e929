/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 * An unset variable takes `defaultVal`.
 */
export function booleanStringSchema(defaultVal = false) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: {
  min?: number;
  max?: number;
  default: number;
}) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return z.preprocess((val) => (val === '' ? undefined : val), schema.default(options.default));
}

/**
 * Schema for an optional, non-empty string (empty env vars count as unset).
 */
const optionalStringSchema = z.preprocess(
  (val) => (val === '' ? undefined : val),
  z.string().optional()
);

export const urlSchema = z.string().url();

/**
 * Schema for a valid WebSocket URL.
 */
export const websocketUrlSchema = z
  .string()
  .refine(
    (url) => url.startsWith('ws://') || url.startsWith('wss://'),
    { message: 'Must be a valid WebSocket URL starting with ws:// or wss://' }
  );

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: z.preprocess((val) => (val === '' ? undefined : val), logLevelSchema.default('info')),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// TARGET SITE
// ============================================

export const siteConfigSchema = z.object({
  baseUrl: z.preprocess(
    (val) => (val === '' ? undefined : val),
    urlSchema.default('https://www.gov.uk/book-driving-test')
  ),
  username: optionalStringSchema,
  password: optionalStringSchema,
});

export type SiteConfig = z.infer<typeof siteConfigSchema>;

// ============================================
// MONITOR TIMING
// ============================================

export const monitorConfigSchema = z.object({
  pollIntervalSeconds: integerStringSchema({ min: 10, max: 86400, default: 300 }),
  boundedWaitSeconds: integerStringSchema({ min: 1, max: 300, default: 30 }),
  navigationBackoffSeconds: integerStringSchema({ min: 1, max: 86400, default: 60 }),
  authBackoffMultiplier: integerStringSchema({ min: 1, max: 100, default: 5 }),
  backoffCeilingMultiplier: integerStringSchema({ min: 1, max: 1000, default: 10 }),
  notificationCooldownSeconds: integerStringSchema({ min: 0, max: 604800, default: 300 }),
  retentionDays: integerStringSchema({ min: 1, max: 3650, default: 30 }),
  dateHorizonDays: integerStringSchema({ min: 1, max: 3650, default: 180 }),
});

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

// ============================================
// BROWSER
// ============================================

export const browserConfigSchema = z.object({
  headless: booleanStringSchema(true),
  endpoint: z.preprocess((val) => (val === '' ? undefined : val), websocketUrlSchema.optional()),
  executablePath: optionalStringSchema,
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// DATABASE
// ============================================

export const databaseConfigSchema = z.object({
  sqlitePath: z.preprocess(
    (val) => (val === '' ? undefined : val),
    z.string().default('./data/slot-monitor.db')
  ),
});

export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;

// ============================================
// NOTIFICATIONS
// ============================================

export const notifierConfigSchema = z
  .object({
    telegramBotToken: optionalStringSchema,
    webhookUrl: z.preprocess((val) => (val === '' ? undefined : val), urlSchema.optional()),
    webhookSecret: optionalStringSchema,
  })
  .transform((config) => {
    if (config.telegramBotToken) {
      return { channel: 'telegram' as const, botToken: config.telegramBotToken };
    }
    if (config.webhookUrl) {
      return {
        channel: 'webhook' as const,
        url: config.webhookUrl,
        secret: config.webhookSecret,
      };
    }
    return { channel: 'log' as const };
  });

export type NotifierConfig = z.infer<typeof notifierConfigSchema>;

// ============================================
// CONSOLE
// ============================================

export const consoleConfigSchema = z.object({
  localUserId: z.preprocess((val) => (val === '' ? undefined : val), z.string().default('local')),
});

export type ConsoleConfig = z.infer<typeof consoleConfigSchema>;

// ============================================
// ERRORS
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
