/**
 * logsift Logging Module
 *
 * Usage:
 * ```typescript
 * import { logger } from '../logging/index.js';
 *
 * const log = logger.child('Analyzer');
 * log.debug('Scanning log', { path });
 *
 * log.time('scan');
 * // ...
 * log.timeEnd('scan', { lines: 1200 });
 * ```
 *
 * Level and format are set by the CLI from its loaded configuration
 * (LOGSIFT_LOG_LEVEL / LOGSIFT_LOG_FORMAT or the config file).
 */

export { logger, LogLevel, stringToLevel } from './logger.js';
export type { Logger, LogEntry, LogFormat } from './types.js';
