export * from './types.js';
export * from './errors.js';
export { classifyValue, isBelowGood, meetsBound, ratingRank } from './classify.js';
export { formatValue } from './format.js';
export {
  DEFAULT_REGISTRY_PATH,
  MetricRegistry,
  getDefaultRegistry,
  loadMetricRegistry,
  parseMetricDefinitions
} from './registry.js';
export {
  calculatePercentileRanking,
  compareToBenchmark,
  evaluate,
  evaluateDefinition,
  localizeResult,
  rankAgainstPeers,
  type EvaluateOptions
} from './engine.js';
export {
  buildRatioReport,
  serializeLocalizedResult,
  serializeReport,
  type MetricFailure,
  type RatioReport,
  type RatioReportRequest,
  type ReportSummary,
  type SerializedAnalysisResult,
  type SerializedLocalizedResult,
  type SerializedRatioReport
} from './report.js';
export { financialStatementSchema, parseStatement, type FinancialStatement } from './statements.js';
