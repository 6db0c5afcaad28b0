import type { IssueSummary } from './types.js';

/**
 * A single pattern check run against every log line.
 * Returns true when the line matched and the summary was updated.
 */
export interface LineDetector {
  name: DetectorName;
  apply(line: string, summary: IssueSummary): boolean;
}

export type DetectorName =
  | 'missing_backticks'
  | 'oscillation'
  | 'unacceptable_character'
  | 'recursion_limit'
  | 'qa_none_error'
  | 'draft_status'
  | 'future_date'
  | 'notes_processed'
  | 'notes_with_errors';

const MISSING_BACKTICKS_RE = /Type name '([^']+)' found without backticks/;
// Runs to the end of the line: only \n ends it, not \r or the Unicode separators
const OSCILLATION_RE = /Oscillation detected[^\n]*/;
const UNACCEPTABLE_CHAR_RE = /unacceptable character #x([0-9A-Fa-f]{4})/;
const RECURSION_LIMIT_RE = /Recursion limit of \d+ reached/;
const STATUS_DRAFT_RE = /status set to 'draft'/i;
const FUTURE_DATE_RE = /future(?:-looking)? dates?/i;

const QA_NONE_ERROR = "argument of type 'NoneType' is not iterable";
const NOTES_PROCESSED_LABEL = 'Notes Processed';
const ERRORS_LABEL = 'Errors';
const METRIC_LABEL = 'Metric';

/** Box-drawing border that wraps cells in the run's metrics table */
const TABLE_BORDER = '│';

const INTEGER_TOKEN_RE = /^[+-]?\d+(?:_\d+)*$/;

function stripBorder(token: string): string {
  let start = 0;
  let end = token.length;
  while (start < end && token[start] === TABLE_BORDER) start++;
  while (end > start && token[end - 1] === TABLE_BORDER) end--;
  return token.slice(start, end);
}

/**
 * Return the last integer-like whitespace-delimited token on the line,
 * ignoring table borders and any trailing non-numeric tokens.
 * Tokens beyond Number.MAX_SAFE_INTEGER are skipped like any other non-count.
 */
export function extractLastInteger(line: string): number | undefined {
  const tokens = line.split(/\s+/).filter(Boolean);

  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = stripBorder(tokens[i]);
    if (!token || !INTEGER_TOKEN_RE.test(token)) {
      continue;
    }
    const value = parseInt(token.replace(/_/g, ''), 10);
    if (!Number.isSafeInteger(value)) {
      continue;
    }
    return value;
  }

  return undefined;
}

export const DETECTORS: readonly LineDetector[] = [
  {
    name: 'missing_backticks',
    apply(line, summary) {
      const match = MISSING_BACKTICKS_RE.exec(line);
      if (!match) return false;
      summary.missingBackticks.add(match[1]);
      return true;
    },
  },
  {
    name: 'oscillation',
    apply(line, summary) {
      const match = OSCILLATION_RE.exec(line);
      if (!match) return false;
      summary.oscillationMessages.push(match[0]);
      return true;
    },
  },
  {
    name: 'unacceptable_character',
    apply(line, summary) {
      const match = UNACCEPTABLE_CHAR_RE.exec(line);
      if (!match) return false;
      summary.unacceptableControlCodes.add(match[1].toLowerCase());
      return true;
    },
  },
  {
    name: 'recursion_limit',
    apply(line, summary) {
      if (!RECURSION_LIMIT_RE.test(line)) return false;
      summary.recursionLimitHits += 1;
      return true;
    },
  },
  {
    name: 'qa_none_error',
    apply(line, summary) {
      if (!line.includes(QA_NONE_ERROR)) return false;
      summary.qaVerificationNoneErrors += 1;
      return true;
    },
  },
  {
    name: 'draft_status',
    apply(line, summary) {
      if (!STATUS_DRAFT_RE.test(line)) return false;
      summary.draftStatusNotes += 1;
      return true;
    },
  },
  {
    name: 'future_date',
    apply(line, summary) {
      if (!FUTURE_DATE_RE.test(line)) return false;
      summary.futureDatedMetadataNotes += 1;
      return true;
    },
  },
  {
    name: 'notes_processed',
    apply(line, summary) {
      if (!line.includes(NOTES_PROCESSED_LABEL)) return false;
      const value = extractLastInteger(line);
      if (value === undefined) return false;
      summary.notesProcessed = value;
      return true;
    },
  },
  {
    name: 'notes_with_errors',
    apply(line, summary) {
      if (!line.includes(ERRORS_LABEL) || line.includes(METRIC_LABEL)) return false;
      const value = extractLastInteger(line);
      if (value === undefined) return false;
      summary.notesWithErrors = value;
      return true;
    },
  },
];
