// Analyzer module - Extracts failure signatures from llm-review logs

export {
  analyseLines,
  analyseLogText,
  analyseLogFile,
  analyseLineStream,
  analyseLogFileStream,
  applyLine,
  splitLines
} from './analyzer.js';

export {
  DETECTORS,
  extractLastInteger,
  type LineDetector,
  type DetectorName
} from './detectors.js';

export { LogFileNotFoundError } from './errors.js';

export { createEmptySummary, type IssueSummary } from './types.js';
