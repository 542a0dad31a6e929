/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration.
 */

import type { z } from 'zod';
import {
  logConfigSchema,
  siteConfigSchema,
  monitorConfigSchema,
  browserConfigSchema,
  databaseConfigSchema,
  notifierConfigSchema,
  consoleConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type SiteConfig,
  type MonitorConfig,
  type BrowserConfig,
  type DatabaseConfig,
  type NotifierConfig,
  type ConsoleConfig,
} from './config-schemas.js';

type Env = NodeJS.ProcessEnv;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToSiteConfig(env: Env) {
  return {
    baseUrl: env.TARGET_BASE_URL,
    username: env.TARGET_USERNAME,
    password: env.TARGET_PASSWORD,
  };
}

function mapEnvToMonitorConfig(env: Env) {
  return {
    pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
    boundedWaitSeconds: env.BOUNDED_WAIT_SECONDS,
    navigationBackoffSeconds: env.NAVIGATION_BACKOFF_SECONDS,
    authBackoffMultiplier: env.AUTH_BACKOFF_MULTIPLIER,
    backoffCeilingMultiplier: env.BACKOFF_CEILING_MULTIPLIER,
    notificationCooldownSeconds: env.NOTIFICATION_COOLDOWN_SECONDS,
    retentionDays: env.RETENTION_DAYS,
    dateHorizonDays: env.DATE_HORIZON_DAYS,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headless: env.BROWSER_HEADLESS,
    endpoint: env.BROWSER_ENDPOINT,
    executablePath: env.BROWSER_EXECUTABLE_PATH,
  };
}

function mapEnvToDatabaseConfig(env: Env) {
  return {
    sqlitePath: env.SQLITE_PATH,
  };
}

function mapEnvToNotifierConfig(env: Env) {
  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN,
    webhookUrl: env.NOTIFY_WEBHOOK_URL,
    webhookSecret: env.NOTIFY_WEBHOOK_SECRET,
  };
}

function mapEnvToConsoleConfig(env: Env) {
  return {
    localUserId: env.LOCAL_USER_ID,
  };
}

function parseSection<S extends z.ZodTypeAny>(section: string, schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  return parseSection('logging', logConfigSchema, mapEnvToLogConfig(env));
}

export function parseSiteConfig(env: Env = process.env): SiteConfig {
  return parseSection('site', siteConfigSchema, mapEnvToSiteConfig(env));
}

export function parseMonitorConfig(env: Env = process.env): MonitorConfig {
  return parseSection('monitor', monitorConfigSchema, mapEnvToMonitorConfig(env));
}

export function parseBrowserConfig(env: Env = process.env): BrowserConfig {
  return parseSection('browser', browserConfigSchema, mapEnvToBrowserConfig(env));
}

export function parseDatabaseConfig(env: Env = process.env): DatabaseConfig {
  return parseSection('database', databaseConfigSchema, mapEnvToDatabaseConfig(env));
}

export function parseNotifierConfig(env: Env = process.env): NotifierConfig {
  return parseSection('notifier', notifierConfigSchema, mapEnvToNotifierConfig(env));
}

export function parseConsoleConfig(env: Env = process.env): ConsoleConfig {
  return parseSection('console', consoleConfigSchema, mapEnvToConsoleConfig(env));
}

/**
 * Every configuration section the application reads at startup.
 */
export interface AppConfig {
  log: LogConfig;
  site: SiteConfig;
  monitor: MonitorConfig;
  browser: BrowserConfig;
  database: DatabaseConfig;
  notifier: NotifierConfig;
  console: ConsoleConfig;
}

/**
 * Parse all sections at once. Call early in bootstrap to fail fast on misconfig.
 *
 * @throws ConfigValidationError naming the first invalid section
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    log: parseLogConfig(env),
    site: parseSiteConfig(env),
    monitor: parseMonitorConfig(env),
    browser: parseBrowserConfig(env),
    database: parseDatabaseConfig(env),
    notifier: parseNotifierConfig(env),
    console: parseConsoleConfig(env),
  };
}

export type ConfigSection = keyof AppConfig;

/**
 * Check if a configuration section is valid without throwing.
 */
export function isConfigValid(
  section: ConfigSection,
  env: Env = process.env
): { valid: boolean; error?: string } {
  const parsers: Record<ConfigSection, (env: Env) => unknown> = {
    log: parseLogConfig,
    site: parseSiteConfig,
    monitor: parseMonitorConfig,
    browser: parseBrowserConfig,
    database: parseDatabaseConfig,
    notifier: parseNotifierConfig,
    console: parseConsoleConfig,
  };

  try {
    parsers[section](env);
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { valid: false, error: error.message };
    }
    return { valid: false, error: String(error) };
  }
}
