/**
 * Logging-related type definitions
 */

export interface LogContext {
  traceId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';
