export const SUPPORTED_LOCALES = ['en', 'ar'] as const;
export type Locale = (typeof SUPPORTED_LOCALES)[number];

export type LocalizedText = Readonly<Record<Locale, string>>;

export const RISK_LEVELS = ['very_low', 'low', 'moderate', 'high', 'very_high'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

// Ordered best to worst; the index is the rating's rank.
export const PERFORMANCE_RATINGS = ['excellent', 'good', 'average', 'poor', 'critical'] as const;
export type PerformanceRating = (typeof PERFORMANCE_RATINGS)[number];

export const METRIC_CATEGORIES = ['liquidity', 'profitability', 'leverage', 'efficiency'] as const;
export type MetricCategory = (typeof METRIC_CATEGORIES)[number];

export type ImprovementDirection = 'higher_is_better' | 'lower_is_better';

export type ValueFormat = 'ratio' | 'percent' | 'times' | 'days';

/** Raw financial-statement figures keyed by line-item name. */
export type FinancialInputs = Readonly<Record<string, number | undefined>>;

export interface Tier {
  risk: RiskLevel;
  rating: PerformanceRating;
}

export interface ThresholdEntry extends Tier {
  /** Inclusive bound; `null` marks the catch-all entry at the end of the table. */
  bound: number | null;
}

export interface ZeroDenominatorPolicy extends Tier {
  value: number;
}

export interface FormulaTerms {
  add: readonly string[];
  subtract: readonly string[];
}

export interface RatioFormula {
  numerator: FormulaTerms;
  denominator: FormulaTerms;
  multiplier: number;
}

export interface RecommendationRule {
  improve: readonly LocalizedText[];
  maintain: readonly LocalizedText[];
}

export type InterpretationTemplates = Readonly<Record<PerformanceRating, LocalizedText>>;

export interface MetricDefinition {
  id: string;
  name: LocalizedText;
  description: LocalizedText;
  category: MetricCategory;
  formula: RatioFormula;
  requiredInputs: readonly string[];
  direction: ImprovementDirection;
  thresholds: readonly ThresholdEntry[];
  zeroDenominator: ZeroDenominatorPolicy;
  format: ValueFormat;
  interpretation: InterpretationTemplates;
  recommendations: RecommendationRule;
}

export type BenchmarkPosition = 'above' | 'below' | 'at';

export interface BenchmarkComparison {
  industryAverage: number;
  /** Percentage distance from the average; null when it cannot be expressed. */
  differencePct: number | null;
  position: BenchmarkPosition;
  favorable: boolean;
  text: LocalizedText;
}

export interface PeerRanking {
  /** Share of peer values at or below the metric value, 0-100; 50 without peers. */
  percentile: number;
  peerCount: number;
  text: LocalizedText;
}

export interface AnalysisResult {
  metricId: string;
  category: MetricCategory;
  value: number;
  formattedValue: LocalizedText;
  riskLevel: RiskLevel;
  performanceRating: PerformanceRating;
  zeroDenominator: boolean;
  localizedName: LocalizedText;
  localizedInterpretation: LocalizedText;
  recommendations: readonly LocalizedText[];
  warnings: readonly string[];
  benchmark?: BenchmarkComparison;
  peerRanking?: PeerRanking;
}

export interface LocalizedAnalysisResult {
  metricId: string;
  locale: Locale;
  name: string;
  value: number;
  formattedValue: string;
  riskLevel: RiskLevel;
  performanceRating: PerformanceRating;
  interpretation: string;
  recommendations: string[];
  benchmark?: string;
  peerRanking?: string;
  warnings: string[];
}
