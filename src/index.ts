// logsift - failure-signature summaries and remediation advice for llm-review logs

export * from './analyzer/index.js';
export * from './reporter/index.js';

export {
  ConfigLoader,
  ConfigValidationError,
  type LogsiftConfig
} from './cli/config-loader.js';

export { logger, LogLevel, type Logger, type LogFormat } from './logging/index.js';
