/**
 * Renders an IssueSummary as the plain-text stability report.
 *
 * Section order is fixed; a section only appears when it has data.
 */

import type { IssueSummary } from '../analyzer/types.js';
import { RecommendationEngine } from './recommendation-engine.js';

export const REPORT_TITLE = 'LLM review log analysis';
export const REPORT_RULE = '========================';

const defaultEngine = new RecommendationEngine();

export function renderReport(
  summary: Readonly<IssueSummary>,
  engine: RecommendationEngine = defaultEngine
): string {
  const lines: string[] = [REPORT_TITLE, REPORT_RULE];

  if (summary.notesProcessed !== undefined) {
    const errors = summary.notesWithErrors ?? 0;
    lines.push(`Processed notes: ${summary.notesProcessed} (errors: ${errors})`);
  }

  if (summary.oscillationMessages.length > 0) {
    lines.push('');
    lines.push('Oscillation detected in validators:');
    for (const message of summary.oscillationMessages) {
      lines.push(`  - ${message}`);
    }
  }

  if (summary.missingBackticks.size > 0) {
    lines.push('');
    lines.push(`Missing backticks around Kotlin types: ${[...summary.missingBackticks].sort().join(', ')}`);
  }

  if (summary.unacceptableControlCodes.size > 0) {
    lines.push(`Control character crashes encountered: ${[...summary.unacceptableControlCodes].sort().join(', ')}`);
  }

  if (summary.recursionLimitHits > 0) {
    lines.push(`Recursion limit hit: ${summary.recursionLimitHits} time(s)`);
  }

  if (summary.qaVerificationNoneErrors > 0) {
    lines.push(`QA verification NoneType errors: ${summary.qaVerificationNoneErrors} occurrence(s)`);
  }

  if (summary.futureDatedMetadataNotes > 0) {
    lines.push(`Future-dated metadata warnings: ${summary.futureDatedMetadataNotes} occurrence(s)`);
  }

  if (summary.draftStatusNotes > 0) {
    lines.push(`Draft-status metadata warnings: ${summary.draftStatusNotes} occurrence(s)`);
  }

  const recommendations = engine.analyze(summary);
  if (recommendations.length > 0) {
    lines.push('');
    lines.push('Recommended follow-up actions:');
    for (const recommendation of recommendations) {
      lines.push(`  * ${recommendation.message}`);
    }
  }

  return lines.join('\n');
}
