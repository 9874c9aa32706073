/**
 * Logger
 *
 * Console and file logging with structured metadata.
 * Uses Winston with a level set that lines up with failure severities.
 */

import winston from 'winston';
import { LoggingConfig, LogLevel } from '../types/config';

/**
 * Level ordering, most severe first
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  critical: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4
};

const LOG_COLORS: Record<LogLevel, string> = {
  critical: 'magenta',
  error: 'red',
  warning: 'yellow',
  info: 'green',
  debug: 'blue'
};

winston.addColors(LOG_COLORS);

type LogMeta = Record<string, unknown>;

/**
 * Logger instance
 */
let instance: winston.Logger | null = null;

function consoleFormat(colorize: boolean): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    colorize ? winston.format.colorize() : winston.format.uncolorize(),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
      let log = `${String(timestamp)} [${level}] ${String(message)}`;

      if (Object.keys(meta).length > 0) {
        log += ` ${JSON.stringify(meta)}`;
      }

      if (stack) {
        log += `\n${String(stack)}`;
      }

      return log;
    })
  );
}

/**
 * Initialize the logger from configuration
 */
export function initializeLogger(config: LoggingConfig): winston.Logger {
  const transports: winston.transport[] = [];

  if (config.console.enabled) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat(config.console.colorize)
      })
    );
  }

  if (config.file?.enabled && config.file.path) {
    transports.push(
      new winston.transports.File({
        filename: config.file.path,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.errors({ stack: true }),
          winston.format.json()
        )
      })
    );
  }

  instance = winston.createLogger({
    levels: LOG_LEVELS,
    level: config.level,
    transports,
    // A logger with no transports complains on every write
    silent: transports.length === 0,
    exitOnError: false
  });

  return instance;
}

/**
 * Get logger instance
 */
export function getLogger(): winston.Logger {
  if (!instance) {
    instance = winston.createLogger({
      levels: LOG_LEVELS,
      level: process.env.LOG_LEVEL && process.env.LOG_LEVEL in LOG_LEVELS
        ? process.env.LOG_LEVEL
        : 'info',
      transports: [new winston.transports.Console({ format: consoleFormat(true) })],
      exitOnError: false
    });
  }

  return instance;
}

/**
 * Silence or re-enable all output (used by test setup)
 */
export function setLoggerSilent(silent: boolean): void {
  getLogger().silent = silent;
}

function errorMeta(error: unknown): LogMeta | undefined {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, name: error.name };
  }
  if (error === undefined) {
    return undefined;
  }
  return { message: String(error) };
}

/**
 * Structured logging helpers
 */
export const logger = {
  log(level: LogLevel, message: string, meta?: LogMeta): void {
    getLogger().log(level, message, meta);
  },

  debug(message: string, meta?: LogMeta): void {
    getLogger().log('debug', message, meta);
  },

  info(message: string, meta?: LogMeta): void {
    getLogger().log('info', message, meta);
  },

  warn(message: string, meta?: LogMeta): void {
    getLogger().log('warning', message, meta);
  },

  error(message: string, error?: unknown, meta?: LogMeta): void {
    getLogger().log('error', message, { ...meta, error: errorMeta(error) });
  },

  critical(message: string, meta?: LogMeta): void {
    getLogger().log('critical', message, meta);
  },

  /**
   * Component-specific logging
   */
  component(component: string) {
    return {
      debug: (message: string, meta?: LogMeta) => {
        logger.debug(message, { component, ...meta });
      },
      info: (message: string, meta?: LogMeta) => {
        logger.info(message, { component, ...meta });
      },
      warn: (message: string, meta?: LogMeta) => {
        logger.warn(message, { component, ...meta });
      },
      error: (message: string, error?: unknown, meta?: LogMeta) => {
        logger.error(message, error, { component, ...meta });
      }
    };
  },

  /**
   * Flush and close transports
   */
  shutdown(): Promise<void> {
    const current = instance;
    if (!current) {
      return Promise.resolve();
    }
    instance = null;
    return new Promise((resolve) => {
      current.on('finish', () => resolve());
      current.end();
    });
  }
};
