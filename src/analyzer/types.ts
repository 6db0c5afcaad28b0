/**
 * Structured summary of the chronic failure patterns found in an llm-review log.
 *
 * One summary is built per analysis run. Counters only grow, sets only gain
 * members, and the metric fields are overwritten by the last metric line seen.
 */
export interface IssueSummary {
  /** Full text of every oscillation warning, in encounter order (duplicates kept) */
  oscillationMessages: string[];
  /** Kotlin type names reported without surrounding backticks */
  missingBackticks: Set<string>;
  /** Lower-cased 4-digit hex codes of control characters that crashed the validator */
  unacceptableControlCodes: Set<string>;
  recursionLimitHits: number;
  qaVerificationNoneErrors: number;
  draftStatusNotes: number;
  futureDatedMetadataNotes: number;
  /** Last "Notes Processed" metric seen */
  notesProcessed?: number;
  /** Last "Errors" metric seen */
  notesWithErrors?: number;
}

export function createEmptySummary(): IssueSummary {
  return {
    oscillationMessages: [],
    missingBackticks: new Set(),
    unacceptableControlCodes: new Set(),
    recursionLimitHits: 0,
    qaVerificationNoneErrors: 0,
    draftStatusNotes: 0,
    futureDatedMetadataNotes: 0,
  };
}
