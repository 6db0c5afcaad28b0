import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { renderReport } from './report-renderer.js';
import { RecommendationEngine } from './recommendation-engine.js';
import { analyseLogFile } from '../analyzer/analyzer.js';
import { type IssueSummary, createEmptySummary } from '../analyzer/types.js';

describe('renderReport', () => {
  let summary: IssueSummary;

  beforeEach(() => {
    summary = createEmptySummary();
  });

  it('should render only the banner for an empty summary', () => {
    expect(renderReport(summary)).toBe('LLM review log analysis\n========================');
  });

  it('should default errors to 0 when only notes processed is known', () => {
    summary.notesProcessed = 40;

    expect(renderReport(summary).split('\n')).toEqual([
      'LLM review log analysis',
      '========================',
      'Processed notes: 40 (errors: 0)',
    ]);
  });

  it('should not render the processed line when only errors are known', () => {
    summary.notesWithErrors = 3;

    expect(renderReport(summary)).toBe('LLM review log analysis\n========================');
  });

  it('should render oscillation messages in encounter order', () => {
    summary.oscillationMessages.push('Oscillation detected: B', 'Oscillation detected: A');

    const lines = renderReport(summary).split('\n');

    expect(lines.slice(2, 6)).toEqual([
      '',
      'Oscillation detected in validators:',
      '  - Oscillation detected: B',
      '  - Oscillation detected: A',
    ]);
  });

  it('should render counters with their units', () => {
    summary.recursionLimitHits = 2;
    summary.qaVerificationNoneErrors = 1;
    summary.futureDatedMetadataNotes = 4;
    summary.draftStatusNotes = 3;

    const lines = renderReport(summary).split('\n');

    expect(lines.slice(2, 6)).toEqual([
      'Recursion limit hit: 2 time(s)',
      'QA verification NoneType errors: 1 occurrence(s)',
      'Future-dated metadata warnings: 4 occurrence(s)',
      'Draft-status metadata warnings: 3 occurrence(s)',
    ]);
  });

  it('should show the systemic-issue rate in the recommendations', () => {
    summary.notesProcessed = 100;
    summary.notesWithErrors = 25;

    expect(renderReport(summary).split('\n')).toEqual([
      'LLM review log analysis',
      '========================',
      'Processed notes: 100 (errors: 25)',
      '',
      'Recommended follow-up actions:',
      '  * Investigate systemic issues: 25 of 100 notes (25.0%) still end in errors despite modifications.',
    ]);
  });

  it('should accept a custom recommendation engine', () => {
    class QuietEngine extends RecommendationEngine {
      override analyze() {
        return [];
      }
    }
    summary.recursionLimitHits = 1;

    expect(renderReport(summary, new QuietEngine()).split('\n')).toEqual([
      'LLM review log analysis',
      '========================',
      'Recursion limit hit: 1 time(s)',
    ]);
  });

  it('should render the full report for the fixture log', () => {
    const fixture = fileURLToPath(new URL('../analyzer/__fixtures__/llm-review.log', import.meta.url));

    expect(renderReport(analyseLogFile(fixture)).split('\n')).toEqual([
      'LLM review log analysis',
      '========================',
      'Processed notes: 12 (errors: 3)',
      '',
      'Oscillation detected in validators:',
      '  - Oscillation detected for q-coroutine-flows--kotlin--medium.md: validator re-raised missing backticks warning',
      '  - Oscillation detected for q-hot-flows--kotlin--hard.md: validator re-raised missing backticks warning',
      '',
      'Missing backticks around Kotlin types: Flow, SharedFlow, StateFlow',
      'Control character crashes encountered: 0004',
      'Recursion limit hit: 1 time(s)',
      'QA verification NoneType errors: 1 occurrence(s)',
      'Future-dated metadata warnings: 1 occurrence(s)',
      'Draft-status metadata warnings: 1 occurrence(s)',
      '',
      'Recommended follow-up actions:',
      '  * Wrap Kotlin type identifiers in backticks during automated fixes to avoid validator oscillation (missing: Flow, SharedFlow, StateFlow).',
      '  * Tune the fixer/validator handshake: automatically short-circuit after two oscillating iterations and flag the note for manual review with the concrete validator payload.',
      '  * Allow the metadata fixer to normalise future-dated timestamps when they exceed the allowed threshold instead of repeatedly deferring to manual review.',
      '  * Escalate draft-status warnings with context so reviewers can make a publishability decision without combing through raw logs.',
      '  * Strip non-printable control characters (e.g. 0x0004).',
      '  * Increase the LangGraph recursion limit or implement stronger guard rails on fix-planning loops to prevent runaway iterations.',
      "  * Guard QA verification against None results before membership tests so automation no longer crashes on 'NoneType' iterable checks.",
      '  * Investigate systemic issues: 3 of 12 notes (25.0%) still end in errors despite modifications.',
    ]);
  });
});
