/**
 * Type definitions for the logsift logging system
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  meta?: Record<string, unknown>;
  duration?: number;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;

  /** Start a timer for performance measurement */
  time(label: string): void;

  /** End a timer and log the duration */
  timeEnd(label: string, meta?: Record<string, unknown>): number | undefined;
}

export interface LoggerState {
  level: LogLevel;
  format: LogFormat;
  timers: Map<string, number>;
}
