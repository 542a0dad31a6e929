/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr (stdout is reserved for the command console)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LogLevel } from './config-schemas.js';

export type { LogLevel } from './config-schemas.js';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  userId?: string;
  center?: string;
  url?: string;
  operation?: string;
  state?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function readLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: readLevel(process.env.LOG_LEVEL),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs to prevent secrets from leaking.
 * Uses Pino's path syntax (wildcards with *)
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'password',
  'credentials',
  '*.password',
  '*.secret',
  '*.token',
  '*.botToken',
  '*.webhookSecret',
  '*.credentials',
  '*.cookie',
  '*.Cookie',
  'headers.authorization',
  'headers.Authorization',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'slot-monitor',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the base logger on every call so configureLogger() takes effect
 * for loggers created at module load.
 */
export class Logger {
  private cached: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this.cached = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this.cached) {
      return this.cached;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger.cached = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Error level. Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, error: undefined, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext, now: () => number = Date.now): void {
    const durationMs = now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  session: new Logger('AuthenticatedSession'),
  browser: new Logger('PlaywrightLauncher'),
  extractor: new Logger('AppointmentExtractor'),
  scheduler: new Logger('PollScheduler'),
  registry: new Logger('MonitorRegistry'),
  gate: new Logger('NotificationGate'),
  store: new Logger('MonitoringStore'),
  notifier: new Logger('Notifier'),
  commands: new Logger('MonitorCommands'),
  telegram: new Logger('TelegramBot'),
  retention: new Logger('RetentionSweeper'),
  retry: new Logger('Retry'),
  app: new Logger('App'),
};

export function logAppStart(version: string, features: string[]): void {
  logger.app.info('Slot monitor starting', {
    version,
    features,
    nodeVersion: process.version,
  });
}

export function logAppShutdown(reason?: string): void {
  logger.app.info('Slot monitor shutting down', { reason });
}
