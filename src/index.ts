/**
 * Slot monitor library entry
 *
 * Polls a driving test booking site on behalf of many users and notifies each
 * user once per cooldown window when a slot matching their preferences appears.
 */

export { createApp, VERSION, type AppOverrides, type MonitorApp } from './app.js';

export {
  AuthenticatedSession,
  withAuthenticatedSession,
  type AuthenticatedSessionOptions,
  type ResultsView,
  type SelectorSpec,
} from './core/authenticated-session.js';
export { AppointmentExtractor, type SkippedFilter, type SlotExtractor } from './core/appointment-extractor.js';
export {
  DEFAULT_DATE_HORIZON_DAYS,
  TIME_WINDOWS,
  createDateRangeSchema,
  createFilterSpecSchema,
  filterSpecFromSettings,
  matchesTimePreferences,
  parseFilterSpec,
  parseTimePreferences,
  slotMatchesFilter,
  validateFilterSpec,
  type FilterSpecOptions,
  type FilterValidation,
} from './core/filter-spec.js';
export {
  MonitorHandle,
  MonitorRegistry,
  type FailedMonitor,
  type MonitorTask,
  type MonitorTaskFactory,
  type StartResult,
  type StopResult,
} from './core/monitor-registry.js';
export {
  NotificationGate,
  slotIdentityKey,
  type NotificationGateConfig,
  type NotificationRecord,
} from './core/notification-gate.js';
export {
  PlaywrightLauncher,
  type AttributeRecord,
  type BrowserHandle,
  type BrowserLauncher,
  type PageDriver,
} from './core/page-driver.js';
export {
  DEFAULT_BACKOFF_POLICY,
  PollScheduler,
  computeBackoffDelay,
  type BackoffPolicy,
  type MonitorSession,
  type PollSchedulerOptions,
} from './core/poll-scheduler.js';
export { TEST_CENTERS, createSiteProfile, type SiteProfile } from './core/site-profile.js';

export { MonitorCommands, type MonitorCommandsOptions } from './services/monitor-commands.js';
export { SqliteMonitoringStore, type SqliteStoreConfig } from './services/monitoring-store.js';
export {
  LogNotifier,
  TelegramNotifier,
  WebhookNotifier,
  createNotifier,
  signPayload,
  type WebhookPayload,
} from './services/notifier.js';
export { RetentionSweeper, type SweepResult } from './services/retention-sweeper.js';
export { TelegramApi, type SendMessageOptions, type TelegramApiOptions, type TelegramUpdate } from './services/telegram-api.js';
export { TelegramBot, type CommandHandler, type TelegramBotOptions } from './services/telegram-bot.js';

export * from './types/index.js';
export { loadAppConfig, type AppConfig } from './utils/env-parser.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export {
  AuthError,
  FilterValidationError,
  InitError,
  NavigationError,
  PersistenceError,
} from './utils/errors.js';
