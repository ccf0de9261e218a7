import { evaluateDefinition } from './engine.js';
import { MissingInputError, isRatioEngineError, type RatioErrorCode } from './errors.js';
import { getDefaultRegistry, type MetricRegistry } from './registry.js';
import type {
  AnalysisResult,
  FinancialInputs,
  LocalizedAnalysisResult,
  MetricCategory,
  PerformanceRating,
  RiskLevel
} from './types.js';

export interface RatioReportRequest {
  lineItems: FinancialInputs;
  /** Metrics to evaluate, in output order. Every registered metric when omitted. */
  metricIds?: readonly string[];
  /** Industry averages keyed by metric id. */
  benchmarks?: Readonly<Record<string, number>>;
  /** Peer-group values keyed by metric id, for percentile ranking. */
  peerValues?: Readonly<Record<string, readonly number[]>>;
}

export interface MetricFailure {
  metricId: string;
  code: RatioErrorCode;
  message: string;
  missingInputs?: readonly string[];
  retryable: false;
}

export interface ReportSummary {
  requested: number;
  evaluated: number;
  failed: number;
  byRating: Record<PerformanceRating, number>;
  byRisk: Record<RiskLevel, number>;
  byCategory: Partial<Record<MetricCategory, number>>;
}

export interface RatioReport {
  results: AnalysisResult[];
  failures: MetricFailure[];
  summary: ReportSummary;
}

export type SerializedAnalysisResult = Omit<AnalysisResult, 'value'> & { value: number | string };

export type SerializedLocalizedResult = Omit<LocalizedAnalysisResult, 'value'> & { value: number | string };

export interface SerializedRatioReport {
  results: SerializedAnalysisResult[];
  failures: MetricFailure[];
  summary: ReportSummary;
}

type Outcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; failure: MetricFailure };

function summarize(requested: number, results: readonly AnalysisResult[], failed: number): ReportSummary {
  const byRating: Record<PerformanceRating, number> = { excellent: 0, good: 0, average: 0, poor: 0, critical: 0 };
  const byRisk: Record<RiskLevel, number> = { very_low: 0, low: 0, moderate: 0, high: 0, very_high: 0 };
  const byCategory: Partial<Record<MetricCategory, number>> = {};

  for (const result of results) {
    byRating[result.performanceRating] += 1;
    byRisk[result.riskLevel] += 1;
    byCategory[result.category] = (byCategory[result.category] ?? 0) + 1;
  }

  return {
    requested,
    evaluated: results.length,
    failed,
    byRating,
    byRisk,
    byCategory
  };
}

async function evaluateOne(
  registry: MetricRegistry,
  metricId: string,
  lineItems: FinancialInputs,
  benchmark: number | undefined,
  peerValues: readonly number[] | undefined
): Promise<Outcome> {
  try {
    const definition = registry.require(metricId);
    return { ok: true, result: evaluateDefinition(definition, lineItems, { benchmark, peerValues }) };
  } catch (error) {
    if (!isRatioEngineError(error)) {
      throw error;
    }
    return {
      ok: false,
      failure: {
        metricId,
        code: error.code,
        message: error.message,
        ...(error instanceof MissingInputError ? { missingInputs: error.missingInputs } : {}),
        retryable: false
      }
    };
  }
}

/**
 * Evaluates a batch of metrics against one set of statement line items.
 *
 * Each metric runs independently; a metric that cannot be evaluated lands in
 * `failures` while the rest of the batch still completes. Duplicate ids are
 * evaluated once, at the position of their first occurrence.
 */
export async function buildRatioReport(
  request: RatioReportRequest,
  registry: MetricRegistry = getDefaultRegistry()
): Promise<RatioReport> {
  const metricIds = [...new Set(request.metricIds ?? registry.ids())];
  const benchmarks = request.benchmarks ?? {};
  const peerValues = request.peerValues ?? {};

  const outcomes = await Promise.all(
    metricIds.map((metricId) =>
      evaluateOne(
        registry,
        metricId,
        request.lineItems,
        Object.hasOwn(benchmarks, metricId) ? benchmarks[metricId] : undefined,
        Object.hasOwn(peerValues, metricId) ? peerValues[metricId] : undefined
      )
    )
  );

  const results: AnalysisResult[] = [];
  const failures: MetricFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      results.push(outcome.result);
    } else {
      failures.push(outcome.failure);
    }
  }

  return {
    results,
    failures,
    summary: summarize(metricIds.length, results, failures.length)
  };
}

function jsonSafe(value: number): number | string {
  return Number.isFinite(value) ? value : String(value);
}

/** JSON-ready copy of a report; non-finite numbers become "Infinity", "-Infinity" or "NaN". */
export function serializeReport(report: RatioReport): SerializedRatioReport {
  return {
    results: report.results.map((result) => ({ ...result, value: jsonSafe(result.value) })),
    failures: report.failures,
    summary: report.summary
  };
}

/** JSON-ready copy of a single-locale result, with the same non-finite handling as reports. */
export function serializeLocalizedResult(result: LocalizedAnalysisResult): SerializedLocalizedResult {
  return { ...result, value: jsonSafe(result.value) };
}
