/**
 * Log analyzer for llm-review automation runs
 *
 * Scans log lines once, in order, running every detector against every line,
 * and accumulates the hits into an IssueSummary. The same per-line step backs
 * the eager (string, line list, file) and lazy (async line stream) entry points.
 */

import * as fs from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import { logger } from '../logging/index.js';
import { DETECTORS } from './detectors.js';
import { LogFileNotFoundError, isNotFoundError } from './errors.js';
import { type IssueSummary, createEmptySummary } from './types.js';

const log = logger.child('Analyzer');

// Numbers per-scan timer labels
let scanCount = 0;

// Universal-newline boundaries: CRLF, LF, CR, VT, FF, FS/GS/RS, NEL, LS, PS
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Run every detector against a single line. Detectors are independent, so a
 * line can feed several of them.
 */
export function applyLine(summary: IssueSummary, line: string): void {
  for (const detector of DETECTORS) {
    detector.apply(line, summary);
  }
}

export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(LINE_BREAK_RE);
  // A trailing line break does not start another line
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Analyse the provided log lines and return a structured summary.
 */
export function analyseLines(lines: Iterable<string>): Readonly<IssueSummary> {
  const summary = createEmptySummary();
  let count = 0;
  const label = `scan-${++scanCount}`;

  log.time(label);
  for (const line of lines) {
    applyLine(summary, line);
    count++;
  }
  log.timeEnd(label, { lines: count });

  return summary;
}

export function analyseLogText(text: string): Readonly<IssueSummary> {
  return analyseLines(splitLines(text));
}

/**
 * Load a log file and return the extracted summary.
 *
 * @throws LogFileNotFoundError when nothing exists at `path`
 */
export function analyseLogFile(path: string): Readonly<IssueSummary> {
  log.debug('Reading log file', { path });

  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new LogFileNotFoundError(path, error);
    }
    throw error;
  }

  return analyseLogText(content);
}

/**
 * Lazy form of analyseLines for logs too large to hold in memory.
 */
export async function analyseLineStream(lines: AsyncIterable<string>): Promise<Readonly<IssueSummary>> {
  const summary = createEmptySummary();
  let count = 0;
  const label = `stream-scan-${++scanCount}`;

  log.time(label);
  for await (const line of lines) {
    applyLine(summary, line);
    count++;
  }
  log.timeEnd(label, { lines: count });

  return summary;
}

/**
 * Stream a log file line by line into a summary.
 *
 * @throws LogFileNotFoundError when nothing exists at `path`
 */
export async function analyseLogFileStream(path: string): Promise<Readonly<IssueSummary>> {
  log.debug('Streaming log file', { path });

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new LogFileNotFoundError(path, error);
    }
    throw error;
  }

  try {
    return await analyseLineStream(handle.readLines({ encoding: 'utf-8' }));
  } finally {
    await handle.close();
  }
}
