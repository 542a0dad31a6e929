/**
 * Application wiring
 *
 * Builds the store, gate, registry, command surface and retention sweeper
 * from an AppConfig, and starts the Telegram command front end when a bot
 * token is configured. Collaborators can be overridden for tests.
 */

import { AppointmentExtractor } from './core/appointment-extractor.js';
import { AuthenticatedSession } from './core/authenticated-session.js';
import { MonitorRegistry, type MonitorTaskFactory } from './core/monitor-registry.js';
import { NotificationGate } from './core/notification-gate.js';
import { PlaywrightLauncher, type BrowserLauncher } from './core/page-driver.js';
import { PollScheduler } from './core/poll-scheduler.js';
import { createSiteProfile } from './core/site-profile.js';
import { MonitorCommands } from './services/monitor-commands.js';
import { SqliteMonitoringStore } from './services/monitoring-store.js';
import { createNotifier } from './services/notifier.js';
import { RetentionSweeper } from './services/retention-sweeper.js';
import { TelegramApi } from './services/telegram-api.js';
import { TelegramBot } from './services/telegram-bot.js';
import type { Credentials, MonitoringStore, Notifier } from './types/index.js';
import { toIsoDate } from './utils/dates.js';
import type { AppConfig } from './utils/env-parser.js';
import { InitError } from './utils/errors.js';
import { configureLogger, logAppShutdown, logAppStart, logger } from './utils/logger.js';
import { resolveMonitorTimings } from './utils/timeouts.js';

export const VERSION = '0.1.0';

export interface AppOverrides {
  store?: MonitoringStore;
  launcher?: BrowserLauncher;
  notifier?: Notifier;
  /** Used by the Telegram and webhook clients */
  fetch?: typeof fetch;
  now?: () => number;
}

export interface MonitorApp {
  config: AppConfig;
  store: MonitoringStore;
  gate: NotificationGate;
  registry: MonitorRegistry;
  commands: MonitorCommands;
  sweeper: RetentionSweeper;
  /** Null unless TELEGRAM_BOT_TOKEN is set */
  bot: TelegramBot | null;
  shutdown(reason?: string): Promise<void>;
}

function siteCredentials(config: AppConfig): Credentials | null {
  const { username, password } = config.site;
  return username && password ? { username, password } : null;
}

export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<MonitorApp> {
  configureLogger({ level: config.log.level, prettyPrint: config.log.prettyPrint });
  logAppStart(VERSION, [config.notifier.channel, config.browser.endpoint ? 'remote-browser' : 'local-browser']);

  const now = overrides.now ?? Date.now;
  const timings = resolveMonitorTimings(config.monitor);
  const site = createSiteProfile(config.site.baseUrl);

  let store: MonitoringStore;
  if (overrides.store) {
    store = overrides.store;
  } else {
    const sqlite = new SqliteMonitoringStore({ dbPath: config.database.sqlitePath }, now);
    await sqlite.initialize();
    store = sqlite;
  }

  const gate = new NotificationGate(
    { cooldownMs: timings.notificationCooldownMs, retentionMs: timings.retentionMs },
    now
  );
  const httpOptions = overrides.fetch ? { fetch: overrides.fetch } : {};
  const notifier = overrides.notifier ?? createNotifier(config.notifier, httpOptions);
  const launcher = overrides.launcher ?? new PlaywrightLauncher(config.browser);
  const extractor = new AppointmentExtractor(site);
  const credentials = siteCredentials(config);

  const createTask: MonitorTaskFactory = (userId, filter) => {
    if (!credentials) {
      throw new InitError('Site credentials are not configured');
    }
    return new PollScheduler({
      userId,
      filter,
      credentials,
      resultsUrl: site.resultsUrl,
      session: new AuthenticatedSession({ launcher, site, boundedWaitMs: timings.boundedWaitMs, userId }),
      extractor,
      gate,
      notifier,
      store,
      policy: timings,
    });
  };

  const registry = new MonitorRegistry(createTask, store, now);
  const commands = new MonitorCommands({
    store,
    registry,
    credentialsConfigured: credentials !== null,
    filterOptions: () => ({ today: toIsoDate(new Date(now())), horizonDays: config.monitor.dateHorizonDays }),
    now,
  });
  const sweeper = new RetentionSweeper({ store, gate, retentionDays: config.monitor.retentionDays });
  sweeper.start();

  const botController = new AbortController();
  let bot: TelegramBot | null = null;
  let botDone: Promise<void> = Promise.resolve();
  if (config.notifier.channel === 'telegram') {
    bot = new TelegramBot({ api: new TelegramApi(config.notifier.botToken, httpOptions), commands });
    botDone = bot.run(botController.signal);
  }

  if (!credentials) {
    logger.app.warn('TARGET_USERNAME / TARGET_PASSWORD not set; /monitor is disabled');
  }

  let closing: Promise<void> | null = null;
  const shutdown = (reason?: string): Promise<void> => {
    closing ??= (async () => {
      logAppShutdown(reason);
      botController.abort();
      await botDone;
      sweeper.stop();
      await registry.stopAll();
      store.close();
    })();
    return closing;
  };

  return { config, store, gate, registry, commands, sweeper, bot, shutdown };
}
