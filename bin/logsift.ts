#!/usr/bin/env node
/**
 * logsift CLI Entry Point
 *
 * Usage:
 *   npx tsx bin/logsift.ts <log_file> [options]
 *   node dist/bin/logsift.js <log_file> [options]
 */

import 'dotenv/config';
import { CLI } from '../src/cli/index.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  try {
    // stdout may still be flushing a piped report
    process.exitCode = await CLI.run(args);
  } catch (error) {
    // Missing log file, bad config: no partial report
    console.error('Fatal error:', error instanceof Error ? error.message : 'Unknown error');
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

void main();
