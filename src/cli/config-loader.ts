/**
 * Configuration loader for logsift
 * Supports loading from environment variables and JSON or YAML config files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { LogFormat } from '../logging/index.js';

export interface LogsiftConfig {
  logLevel: string;
  logFormat: LogFormat;
}

/**
 * Config file format (JSON or YAML)
 */
interface ConfigFileFormat {
  logging?: {
    level?: string;
    format?: string;
  };
}

/**
 * Custom error for configuration validation failures
 */
export class ConfigValidationError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

const DEFAULTS: LogsiftConfig = {
  logLevel: 'info',
  logFormat: 'pretty',
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'warning', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a parsed document to the config file shape, dropping anything unknown
 */
function toConfigFile(parsed: unknown, configPath: string): ConfigFileFormat {
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${configPath}`);
  }

  const logging = parsed.logging;
  if (!isRecord(logging)) {
    return {};
  }

  return {
    logging: {
      level: typeof logging.level === 'string' ? logging.level : undefined,
      format: typeof logging.format === 'string' ? logging.format : undefined,
    },
  };
}

function parseConfigFile(content: string, configPath: string): unknown {
  const extension = path.extname(configPath).toLowerCase();

  if (extension === '.yaml' || extension === '.yml') {
    try {
      return yaml.load(content);
    } catch {
      throw new Error(`Invalid YAML in config file: ${configPath}`);
    }
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
}

// Values are validated in validate(), so raw strings pass through here
type RawConfig = Partial<Record<keyof LogsiftConfig, string>>;

export const ConfigLoader = {
  /**
   * Load configuration from environment variables
   */
  fromEnv(): RawConfig {
    const config: RawConfig = {};

    if (process.env.LOGSIFT_LOG_LEVEL) {
      config.logLevel = process.env.LOGSIFT_LOG_LEVEL;
    }
    if (process.env.LOGSIFT_LOG_FORMAT) {
      config.logFormat = process.env.LOGSIFT_LOG_FORMAT;
    }

    return config;
  },

  /**
   * Load configuration from a JSON (.json) or YAML (.yaml, .yml) file
   */
  fromFile(configPath: string): RawConfig {
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    let fileContent: string;
    try {
      fileContent = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read config file: ${configPath}`, { cause: error });
    }

    const parsed = toConfigFile(parseConfigFile(fileContent, configPath), configPath);
    const config: RawConfig = {};

    if (parsed.logging?.level) {
      config.logLevel = parsed.logging.level;
    }
    if (parsed.logging?.format) {
      config.logFormat = parsed.logging.format;
    }

    return config;
  },

  /**
   * Load configuration merging file and environment variables
   * Environment variables take precedence over file config
   */
  load(configPath?: string): LogsiftConfig {
    const fileConfig = configPath ? ConfigLoader.fromFile(configPath) : {};
    const envConfig = ConfigLoader.fromEnv();

    // Merge: defaults < file < env
    return ConfigLoader.validate({ ...fileConfig, ...envConfig });
  },

  /**
   * Validate configuration and apply defaults
   * Throws ConfigValidationError listing every invalid field
   */
  validate(config: RawConfig): LogsiftConfig {
    const errors: string[] = [];
    const logLevel = config.logLevel ?? DEFAULTS.logLevel;
    const logFormat = config.logFormat ?? DEFAULTS.logFormat;

    if (!LOG_LEVELS.includes(logLevel.toLowerCase())) {
      errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
    }

    const format = isLogFormat(logFormat) ? logFormat : undefined;
    if (!format) {
      errors.push(`logFormat must be one of ${LOG_FORMATS.join(', ')} (got "${logFormat}")`);
    }

    if (errors.length > 0 || !format) {
      throw new ConfigValidationError(errors);
    }

    return { logLevel, logFormat: format };
  },

  /**
   * Get default configuration values
   */
  getDefaults(): LogsiftConfig {
    return { ...DEFAULTS };
  },
};
