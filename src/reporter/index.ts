// Reporter module - Turns an issue summary into remediation advice

export {
  RecommendationEngine,
  formatPercent,
  type Recommendation,
  type RecommendationType
} from './recommendation-engine.js';

export {
  renderReport,
  REPORT_TITLE,
  REPORT_RULE
} from './report-renderer.js';
