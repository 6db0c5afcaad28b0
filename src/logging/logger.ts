/**
 * Core structured logger for logsift
 *
 * Everything is written to stderr: stdout carries the rendered report and
 * must stay clean enough to pipe.
 */

import { LogLevel, type LogEntry, type LogFormat, type Logger, type LoggerState } from './types.js';

const state: LoggerState = {
  level: LogLevel.INFO,
  format: 'pretty',
  timers: new Map(),
};

function levelToString(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG: return 'DEBUG';
    case LogLevel.INFO: return 'INFO';
    case LogLevel.WARN: return 'WARN';
    case LogLevel.ERROR: return 'ERROR';
    default: return 'INFO';
  }
}

/**
 * Parse log level from string (unknown values fall back to INFO)
 */
export function stringToLevel(levelStr: string): LogLevel {
  switch (levelStr.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

function getLevelColor(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG: return '\x1b[36m'; // Cyan
    case LogLevel.INFO: return '\x1b[32m';  // Green
    case LogLevel.WARN: return '\x1b[33m';  // Yellow
    case LogLevel.ERROR: return '\x1b[31m'; // Red
    default: return '\x1b[0m';
  }
}

const RESET_COLOR = '\x1b[0m';
const DIM_COLOR = '\x1b[2m';

function formatEntry(entry: LogEntry): string {
  if (state.format === 'json') {
    return JSON.stringify(entry);
  }

  const levelColor = getLevelColor(stringToLevel(entry.level));
  const levelPadded = entry.level.padEnd(5);

  let output = `${DIM_COLOR}${entry.timestamp}${RESET_COLOR} ${levelColor}${levelPadded}${RESET_COLOR}`;
  output += ` ${DIM_COLOR}[${entry.component}]${RESET_COLOR}`;
  output += ` ${entry.message}`;

  if (entry.duration !== undefined) {
    output += ` ${DIM_COLOR}(${entry.duration}ms)${RESET_COLOR}`;
  }

  if (entry.meta && Object.keys(entry.meta).length > 0) {
    output += ` ${DIM_COLOR}${JSON.stringify(entry.meta)}${RESET_COLOR}`;
  }

  return output;
}

function writeLog(level: LogLevel, entry: LogEntry): void {
  const formatted = formatEntry(entry);

  if (level === LogLevel.WARN) {
    console.warn(formatted);
  } else {
    console.error(formatted);
  }
}

function createEntry(
  level: LogLevel,
  message: string,
  component: string,
  meta?: Record<string, unknown>,
  duration?: number
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: levelToString(level),
    component,
    message,
  };

  if (meta && Object.keys(meta).length > 0) {
    entry.meta = meta;
  }

  if (duration !== undefined) {
    entry.duration = duration;
  }

  return entry;
}

function log(level: LogLevel, message: string, component: string, meta?: Record<string, unknown>): void {
  if (level < state.level) return;
  writeLog(level, createEntry(level, message, component, meta));
}

class ComponentLogger implements Logger {
  private component: string;
  private timerPrefix: string;

  constructor(component: string) {
    this.component = component;
    this.timerPrefix = `${component}:`;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    log(LogLevel.DEBUG, message, this.component, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    log(LogLevel.WARN, message, this.component, meta);
  }

  time(label: string): void {
    state.timers.set(`${this.timerPrefix}${label}`, Date.now());
  }

  timeEnd(label: string, meta?: Record<string, unknown>): number | undefined {
    const key = `${this.timerPrefix}${label}`;
    const start = state.timers.get(key);

    if (start === undefined) {
      this.warn(`Timer "${label}" does not exist`);
      return undefined;
    }

    state.timers.delete(key);
    const duration = Date.now() - start;

    if (LogLevel.DEBUG >= state.level) {
      const entry = createEntry(LogLevel.DEBUG, `${label} completed`, this.component, meta, duration);
      writeLog(LogLevel.DEBUG, entry);
    }

    return duration;
  }
}

/**
 * Logger configuration and management
 */
export const logger = {
  setLevelFromString(levelStr: string): void {
    state.level = stringToLevel(levelStr);
  },

  setFormat(format: LogFormat): void {
    state.format = format;
  },

  getLevel(): LogLevel {
    return state.level;
  },

  getFormat(): LogFormat {
    return state.format;
  },

  /**
   * Reset logger state (for testing)
   */
  reset(): void {
    state.level = LogLevel.INFO;
    state.format = 'pretty';
    state.timers.clear();
  },

  /**
   * Create a component-scoped logger
   */
  child(component: string): Logger {
    return new ComponentLogger(component);
  },
};

export { LogLevel } from './types.js';
export type { Logger, LogEntry, LogFormat } from './types.js';
