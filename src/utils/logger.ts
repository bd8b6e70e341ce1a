/**
 * Structured logging over winston
 *
 * Console output is always on; Loki and the development log files are added
 * from the environment. Request-scoped loggers stamp every line with the
 * trace ID assigned by the tracing middleware.
 */

import winston from 'winston';
import LokiTransport from 'winston-loki';
import type { LogContext, LogLevel } from '../types/logging';

const SERVICE_NAME = 'people-records-api';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

export interface LoggerSettings {
  level: LogLevel;
  environment: string;
  version: string;
  lokiHost?: string;
  silent: boolean;
}

export type TracedLogger = {
  [K in LogLevel]: (message: string, context?: Omit<LogContext, 'traceId'>) => void;
};

export function resolveLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

function settingsFromEnv(env: NodeJS.ProcessEnv): LoggerSettings {
  const environment = env.NODE_ENV || 'development';
  return {
    level: resolveLogLevel(env.LOG_LEVEL),
    environment,
    version: env.npm_package_version || '0.2.0',
    lokiHost: env.LOKI_HOST || undefined,
    silent: environment === 'test',
  };
}

/**
 * "<timestamp> <level>: [<traceId>] <message> <meta as JSON>"
 */
export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, traceId, ...meta } = info;
  const parts = [`${String(timestamp)} ${level}:`];
  if (typeof traceId === 'string') {
    parts.push(`[${traceId}]`);
  }
  parts.push(String(message));
  if (Object.keys(meta).length > 0) {
    parts.push(JSON.stringify(meta));
  }
  return parts.join(' ');
}

function consoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp(),
      winston.format.printf(formatConsoleLine)
    ),
  });
}

function lokiTransport(host: string, environment: string): winston.transport {
  return new LokiTransport({
    host,
    labels: { service: SERVICE_NAME, environment },
    json: true,
    format: winston.format.json(),
    replaceTimestamp: true,
    onConnectionError: (err: unknown) => {
      const reason = err instanceof Error ? `: ${err.message}` : '';
      console.error(`Loki unreachable, logging to console only${reason}`);
    },
  });
}

function developmentFileTransports(): winston.transport[] {
  return [
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    }),
  ];
}

export class Logger {
  private readonly logger: winston.Logger;

  constructor(settings: LoggerSettings = settingsFromEnv(process.env)) {
    const transports = [consoleTransport()];
    if (settings.lokiHost) {
      transports.push(lokiTransport(settings.lokiHost, settings.environment));
    }
    if (settings.environment === 'development') {
      transports.push(...developmentFileTransports());
    }

    this.logger = winston.createLogger({
      level: settings.level,
      silent: settings.silent,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: {
        service: SERVICE_NAME,
        version: settings.version,
        environment: settings.environment,
      },
      transports,
    });
  }

  public log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  public error(message: string, context?: LogContext & { error?: Error | string }): void {
    this.log('error', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  public verbose(message: string, context?: LogContext): void {
    this.log('verbose', message, context);
  }

  /**
   * Logger bound to one request's trace ID
   */
  public withTrace(traceId: string): TracedLogger {
    const bound = (level: LogLevel) => (message: string, context?: Omit<LogContext, 'traceId'>) =>
      this.log(level, message, { ...context, traceId });

    return {
      error: bound('error'),
      warn: bound('warn'),
      info: bound('info'),
      debug: bound('debug'),
      verbose: bound('verbose'),
    };
  }
}

export const logger = new Logger();
export default logger;
