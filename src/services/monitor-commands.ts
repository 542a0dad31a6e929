/**
 * Monitor Commands
 *
 * Text command surface shared by the console and chat front ends. Each call
 * takes one input line and resolves to the reply text; it never throws.
 */

import type { FilterSpecOptions } from '../core/filter-spec.js';
import {
  createDateRangeSchema,
  filterSpecFromSettings,
  formatIssues,
  isCenterId,
  parseTimePreferences,
} from '../core/filter-spec.js';
import type { MonitorHandle, MonitorRegistry } from '../core/monitor-registry.js';
import { TEST_CENTERS } from '../core/site-profile.js';
import type { FilterSpec, MonitoringStore, UserId, UserSettings } from '../types/index.js';
import { FilterValidationError, errorMessage } from '../utils/errors.js';
import {
  formatDuration,
  formatGlobalStats,
  formatUserStats,
  sanitizeInput,
} from '../utils/formatting.js';
import { logger } from '../utils/logger.js';

const log = logger.commands;

export interface MonitorCommandsOptions {
  store: MonitoringStore;
  registry: MonitorRegistry;
  /** False when site credentials are missing; /monitor then refuses */
  credentialsConfigured: boolean;
  /** Evaluated per command so "today" stays current */
  filterOptions?: () => FilterSpecOptions;
  now?: () => number;
}

const HELP_TEXT = [
  '*Commands*',
  '/start - register and show this overview',
  '/help - show this help',
  '/settings - show your preferences',
  '/settings centers london, leeds - preferred test centres',
  '/settings dates 2025-07-01 2025-08-15 - date range (or "clear")',
  '/settings times morning, 14:30 - morning, afternoon, evening, any or HH:MM',
  '/settings notifications on|off',
  '/centers - list known test centres',
  '/monitor - start monitoring',
  '/status - monitoring status',
  '/stop - stop monitoring',
  '/stats - statistics',
].join('\n');

const NOT_REGISTERED = 'Please use /start first.';

export class MonitorCommands {
  private readonly now: () => number;

  constructor(private options: MonitorCommandsOptions) {
    this.now = options.now ?? Date.now;
  }

  async handle(userId: UserId, username: string, line: string): Promise<string> {
    const [rawCommand = '', ...rest] = line.trim().split(/\s+/);
    // `/stop@SomeBot` in group chats
    const command = rawCommand.toLowerCase().split('@')[0];
    const args = rest.join(' ');

    try {
      switch (command) {
        case '/start':
          return await this.start(userId, username);
        case '/help':
          return HELP_TEXT;
        case '/settings':
          return await this.settings(userId, args);
        case '/centers':
          return this.centers();
        case '/monitor':
          return await this.monitor(userId);
        case '/status':
          return await this.status(userId);
        case '/stop':
          return await this.stop(userId);
        case '/stats':
          return await this.stats(userId);
        default:
          return 'Unknown command. Use /help to see what is available.';
      }
    } catch (error) {
      log.error('Command failed', { userId, command, error });
      return `Something went wrong: ${errorMessage(error)}`;
    }
  }

  private async start(userId: UserId, username: string): Promise<string> {
    const name = sanitizeInput(username) || 'there';
    await this.options.store.addUser(userId, name);
    return [
      `Welcome, ${name}!`,
      'This monitor watches the driving test booking site and tells you when a slot matching your preferences appears.',
      '',
      'Set your preferences with /settings, then start with /monitor.',
      '',
      HELP_TEXT,
    ].join('\n');
  }

  private async settings(userId: UserId, args: string): Promise<string> {
    const [rawSection = '', ...rest] = args.split(/\s+/);
    const section = rawSection.toLowerCase();
    const value = sanitizeInput(rest.join(' '));

    switch (section) {
      case '':
        return this.describeSettings(await this.options.store.getUserSettings(userId));
      case 'centers':
        return this.setCenters(userId, value);
      case 'dates':
        return this.setDates(userId, value);
      case 'times':
        return this.setTimes(userId, value);
      case 'notifications':
        return this.setNotifications(userId, value);
      default:
        return 'Unknown setting. Use centers, dates, times or notifications.';
    }
  }

  private async setCenters(userId: UserId, value: string): Promise<string> {
    const tokens = value.toLowerCase().split(/[\s,]+/).filter((token) => token.length > 0);
    if (tokens.length === 0) {
      return 'Usage: /settings centers london, leeds';
    }
    const invalid = tokens.filter((token) => !isCenterId(token));
    if (invalid.length > 0) {
      return `Invalid centre code: ${invalid.join(', ')}`;
    }
    const centers = [...new Set(tokens)];
    if (!(await this.save(userId, { centers }))) {
      return NOT_REGISTERED;
    }
    const unknown = centers.filter((center) => !(center in TEST_CENTERS));
    const note = unknown.length > 0 ? `\nNot in the known list (see /centers): ${unknown.join(', ')}` : '';
    return `Preferred centres: ${centers.join(', ')}${note}`;
  }

  private async setDates(userId: UserId, value: string): Promise<string> {
    if (value.toLowerCase() === 'clear') {
      if (!(await this.save(userId, { dateRange: undefined }))) {
        return NOT_REGISTERED;
      }
      return 'Date range cleared.';
    }

    const [start, end] = value.split(/\s+/);
    if (!start || !end) {
      return 'Usage: /settings dates YYYY-MM-DD YYYY-MM-DD';
    }
    const result = createDateRangeSchema(this.filterOptions()).safeParse({ start, end });
    if (!result.success) {
      return `Invalid date range: ${formatIssues(result.error).join('; ')}`;
    }
    if (!(await this.save(userId, { dateRange: result.data }))) {
      return NOT_REGISTERED;
    }
    return `Date range: ${result.data.start} to ${result.data.end}`;
  }

  private async setTimes(userId: UserId, value: string): Promise<string> {
    const timePreferences = parseTimePreferences(value);
    if (timePreferences.length === 0) {
      return 'Usage: /settings times morning, afternoon, evening, any or HH:MM';
    }
    if (!(await this.save(userId, { timePreferences }))) {
      return NOT_REGISTERED;
    }
    return `Time preferences: ${timePreferences.join(', ')}`;
  }

  private async setNotifications(userId: UserId, value: string): Promise<string> {
    const normalized = value.toLowerCase();
    if (normalized !== 'on' && normalized !== 'off') {
      return 'Usage: /settings notifications on|off';
    }
    if (!(await this.save(userId, { notifications: normalized === 'on' }))) {
      return NOT_REGISTERED;
    }
    return `Notifications ${normalized}.`;
  }

  private centers(): string {
    const lines = Object.entries(TEST_CENTERS).map(([id, name]) => `${id} - ${name}`);
    return ['*Test centres*', ...lines].join('\n');
  }

  private async monitor(userId: UserId): Promise<string> {
    const { registry, store } = this.options;
    if (registry.isRunning(userId)) {
      return 'You are already monitoring appointments. Use /stop to stop first.';
    }
    if (!this.options.credentialsConfigured) {
      return 'Site credentials are not configured (TARGET_USERNAME and TARGET_PASSWORD).';
    }

    const settings = await store.getUserSettings(userId);
    if (!settings.centers || settings.centers.length === 0) {
      return 'Please set your preferred centres first: /settings centers london';
    }
    if (settings.notifications === false) {
      return 'Notifications are off. Turn them on with /settings notifications on.';
    }

    let filter: FilterSpec;
    try {
      filter = filterSpecFromSettings(settings, this.filterOptions());
    } catch (error) {
      if (error instanceof FilterValidationError) {
        return `Your settings need attention: ${error.issues.join('; ')}`;
      }
      throw error;
    }

    const result = registry.start(userId, filter);
    if (!result.success) {
      return 'You are already monitoring appointments. Use /stop to stop first.';
    }
    return `Monitoring started for ${filter.centers.join(', ')}. You will be notified when appointments become available.`;
  }

  private async status(userId: UserId): Promise<string> {
    const { registry } = this.options;
    const handle = registry.get(userId);
    const failure = handle ? undefined : registry.lastFailure(userId);
    const settings = await this.options.store.getUserSettings(userId);
    const lines = [
      '*Monitoring status*',
      `Status: ${handle ? `active (${handle.state})` : failure ? `stopped (${failure.error})` : 'inactive'}`,
      `Preferred centres: ${settings.centers?.join(', ') || 'not set'}`,
      `Date range: ${settings.dateRange ? `${settings.dateRange.start} to ${settings.dateRange.end}` : 'not set'}`,
      `Times: ${settings.timePreferences?.join(', ') || 'any'}`,
    ];
    if (handle) {
      lines.push(...this.describeHandle(handle));
    }
    return lines.join('\n');
  }

  private describeHandle(handle: MonitorHandle): string[] {
    const runningMinutes = Math.floor((this.now() - handle.startedAt) / 60000);
    const lines = [`Running for: ${formatDuration(runningMinutes)}`, `Checks: ${handle.cycles}`];
    const last = handle.lastOutcome;
    if (last) {
      lines.push(
        last.ok
          ? `Last check: ${last.slotsFound} matching, ${last.admitted} new`
          : `Last check failed (${last.kind}): ${last.message}`
      );
    }
    if (handle.nextDelayMs !== null) {
      lines.push(`Next check in: ${formatDuration(Math.ceil(handle.nextDelayMs / 60000))}`);
    }
    return lines;
  }

  private async stop(userId: UserId): Promise<string> {
    const result = await this.options.registry.stop(userId);
    if (!result.success) {
      return 'You are not currently monitoring appointments.';
    }
    return `Monitoring stopped after ${result.exit.cycles} checks.`;
  }

  private async stats(userId: UserId): Promise<string> {
    const [userStats, globalStats] = await Promise.all([
      this.options.store.getUserStats(userId),
      this.options.store.getGlobalStats(),
    ]);
    return [
      formatUserStats(userStats),
      '',
      formatGlobalStats(globalStats),
      `Monitors in this process: ${this.options.registry.count()}`,
    ].join('\n');
  }

  private describeSettings(settings: UserSettings): string {
    return [
      '*Your settings*',
      `Preferred centres: ${settings.centers?.join(', ') || 'not set'}`,
      `Date range: ${settings.dateRange ? `${settings.dateRange.start} to ${settings.dateRange.end}` : 'not set'}`,
      `Times: ${settings.timePreferences?.join(', ') || 'any'}`,
      `Notifications: ${settings.notifications === false ? 'off' : 'on'}`,
      '',
      'Change them with /settings centers|dates|times|notifications ...',
    ].join('\n');
  }

  private save(userId: UserId, settings: UserSettings): Promise<boolean> {
    return this.options.store.updateUserSettings(userId, settings);
  }

  private filterOptions(): FilterSpecOptions {
    return this.options.filterOptions?.() ?? {};
  }
}
