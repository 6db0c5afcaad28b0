import type { IssueSummary } from '../analyzer/types.js';

export type RecommendationType =
  | 'missing_backticks'
  | 'validator_oscillation'
  | 'future_dated_metadata'
  | 'draft_status'
  | 'control_characters'
  | 'recursion_limit'
  | 'qa_none_guard'
  | 'systemic_errors';

export interface Recommendation {
  type: RecommendationType;
  message: string;
}

function sortedList(values: Iterable<string>): string {
  return [...values].sort().join(', ');
}

/**
 * Formats a ratio as a percentage with one decimal place (0.25 -> "25.0%").
 * Exact ties round half to even, so 0.0025 gives "0.2%" and 0.1225 gives "12.2%".
 */
export function formatPercent(ratio: number): string {
  const percent = ratio * 100;

  // A double sits exactly halfway between two tenths only when it ends in .25 or .75
  if (Number.isInteger(percent * 4) && !Number.isInteger(percent * 2)) {
    const tenths = Math.abs(percent) * 10;
    const lower = Math.floor(tenths);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return `${percent < 0 ? '-' : ''}${(even / 10).toFixed(1)}%`;
  }

  return `${percent.toFixed(1)}%`;
}

export class RecommendationEngine {
  /**
   * Derives follow-up steps from a summary, in a fixed order.
   * Each recommendation appears at most once and only when its trigger holds.
   */
  analyze(summary: Readonly<IssueSummary>): Recommendation[] {
    const recommendations: Recommendation[] = [];

    if (summary.missingBackticks.size > 0) {
      recommendations.push({
        type: 'missing_backticks',
        message:
          'Wrap Kotlin type identifiers in backticks during automated fixes to ' +
          `avoid validator oscillation (missing: ${sortedList(summary.missingBackticks)}).`
      });
    }

    if (summary.oscillationMessages.length > 0) {
      recommendations.push({
        type: 'validator_oscillation',
        message:
          'Tune the fixer/validator handshake: automatically short-circuit after ' +
          'two oscillating iterations and flag the note for manual review with ' +
          'the concrete validator payload.'
      });
    }

    if (summary.futureDatedMetadataNotes > 0) {
      recommendations.push({
        type: 'future_dated_metadata',
        message:
          'Allow the metadata fixer to normalise future-dated timestamps when ' +
          'they exceed the allowed threshold instead of repeatedly deferring to ' +
          'manual review.'
      });
    }

    if (summary.draftStatusNotes > 0) {
      recommendations.push({
        type: 'draft_status',
        message:
          'Escalate draft-status warnings with context so reviewers can make a ' +
          'publishability decision without combing through raw logs.'
      });
    }

    if (summary.unacceptableControlCodes.size > 0) {
      recommendations.push({
        type: 'control_characters',
        message: `Strip non-printable control characters (e.g. 0x${sortedList(summary.unacceptableControlCodes)}).`
      });
    }

    if (summary.recursionLimitHits > 0) {
      recommendations.push({
        type: 'recursion_limit',
        message:
          'Increase the LangGraph recursion limit or implement stronger guard ' +
          'rails on fix-planning loops to prevent runaway iterations.'
      });
    }

    if (summary.qaVerificationNoneErrors > 0) {
      recommendations.push({
        type: 'qa_none_guard',
        message:
          'Guard QA verification against None results before membership tests ' +
          "so automation no longer crashes on 'NoneType' iterable checks."
      });
    }

    const { notesProcessed, notesWithErrors } = summary;
    if (notesProcessed !== undefined && notesWithErrors !== undefined && notesWithErrors > 0) {
      // No rate without a denominator
      const rate = notesProcessed !== 0 ? ` (${formatPercent(notesWithErrors / notesProcessed)})` : '';
      recommendations.push({
        type: 'systemic_errors',
        message:
          `Investigate systemic issues: ${notesWithErrors} of ${notesProcessed} ` +
          `notes${rate} still end in errors despite modifications.`
      });
    }

    return recommendations;
  }
}
