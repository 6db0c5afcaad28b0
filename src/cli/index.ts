/**
 * CLI entry point for logsift
 * Analyses an llm-review log file and prints the stability report
 */

import { ConfigLoader } from './config-loader.js';
import { analyseLogFile } from '../analyzer/index.js';
import { renderReport } from '../reporter/index.js';
import { logger } from '../logging/index.js';
import pkg from '../../package.json' with { type: 'json' };

const log = logger.child('CLI');

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  logFile?: string;
  args: string[];
  options: Record<string, string | boolean>;
}

const VERSION = pkg.version;

// Options that never take a value
const BOOLEAN_OPTIONS = new Set(['help', 'version']);

const USAGE = `logsift - Analyse llm-review logs and print a stability report

Usage:
  logsift <log_file> [options]

Arguments:
  log_file              Path to the llm-review log file to analyse

Options:
  --config <path>       Load settings from a JSON or YAML config file
  -h, --help            Show this help message
  -v, --version         Show version number

Environment:
  LOGSIFT_LOG_LEVEL     debug, info, warn, error (default: info)
  LOGSIFT_LOG_FORMAT    pretty, json (default: pretty)`;

/**
 * Parse command-line arguments into structured format
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    args: [],
    options: {},
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const optionName = arg.slice(2);
      const nextArg = args[i + 1];

      if (!BOOLEAN_OPTIONS.has(optionName) && nextArg && !nextArg.startsWith('-')) {
        result.options[optionName] = nextArg;
        i += 2;
      } else {
        result.options[optionName] = true;
        i++;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      result.options[arg.slice(1)] = true;
      i++;
    } else if (result.logFile === undefined) {
      result.logFile = arg;
      i++;
    } else {
      result.args.push(arg);
      i++;
    }
  }

  return result;
}

/**
 * CLI class with static methods
 */
export const CLI = {
  /**
   * Run the CLI with given arguments.
   * Failures to read the log file are not caught here: they reach the caller.
   */
  async run(args: string[]): Promise<number> {
    const parsed = parseArgs(args);

    if (parsed.options.help || parsed.options.h) {
      CLI.showHelp();
      return 0;
    }

    if (parsed.options.version || parsed.options.v) {
      CLI.showVersion();
      return 0;
    }

    if (!parsed.logFile) {
      console.error('Error: missing required argument <log_file>\n');
      console.error(USAGE);
      return 2;
    }

    if (parsed.args.length > 0) {
      console.error(`Error: unexpected arguments: ${parsed.args.join(' ')}`);
      return 2;
    }

    if (parsed.options.config === true) {
      console.error('Error: --config requires a path\n');
      console.error(USAGE);
      return 2;
    }

    const configPath = typeof parsed.options.config === 'string' ? parsed.options.config : undefined;
    const config = ConfigLoader.load(configPath);

    logger.setLevelFromString(config.logLevel);
    logger.setFormat(config.logFormat);
    log.debug('Configuration loaded', { configPath, logLevel: config.logLevel, logFormat: config.logFormat });

    const summary = analyseLogFile(parsed.logFile);
    console.log(renderReport(summary));

    return 0;
  },

  showHelp(): void {
    console.log(USAGE);
  },

  showVersion(): void {
    console.log(`logsift v${VERSION}`);
  },
};
