import { classifyValue, isBelowGood } from './classify.js';
import { InvalidInputError, MissingInputError } from './errors.js';
import { formatValue, renderTemplate } from './format.js';
import { getDefaultRegistry, type MetricRegistry } from './registry.js';
import type {
  AnalysisResult,
  BenchmarkComparison,
  BenchmarkPosition,
  FinancialInputs,
  FormulaTerms,
  Locale,
  LocalizedAnalysisResult,
  LocalizedText,
  MetricDefinition,
  PeerRanking,
  Tier
} from './types.js';
import { deepFreeze } from './utils.js';

export interface EvaluateOptions {
  registry?: MetricRegistry;
  /** Industry average for the metric, in the metric's own units (0.12 for a 12% margin). */
  benchmark?: number;
  /** Peer-group values of the same metric to rank against. */
  peerValues?: readonly number[];
}

const BENCHMARK_TEXT: Record<BenchmarkPosition, { withDiff: LocalizedText; plain: LocalizedText }> = {
  above: {
    withDiff: { en: 'Above industry average by {diff}%', ar: 'أعلى من متوسط القطاع بنسبة {diff}%' },
    plain: { en: 'Above industry average', ar: 'أعلى من متوسط القطاع' }
  },
  below: {
    withDiff: { en: 'Below industry average by {diff}%', ar: 'أقل من متوسط القطاع بنسبة {diff}%' },
    plain: { en: 'Below industry average', ar: 'أقل من متوسط القطاع' }
  },
  at: {
    withDiff: { en: 'At industry average', ar: 'مساوٍ لمتوسط القطاع' },
    plain: { en: 'At industry average', ar: 'مساوٍ لمتوسط القطاع' }
  }
};

const PEER_RANKING_TEXT = {
  ranked: {
    en: 'Percentile rank {percentile} among {count} peers',
    ar: 'الترتيب المئوي {percentile} بين {count} من النظراء'
  },
  noPeers: {
    en: 'Percentile rank {percentile} (no peer data)',
    ar: 'الترتيب المئوي {percentile} (لا توجد بيانات للنظراء)'
  }
} satisfies Record<string, LocalizedText>;

function localize(render: (locale: Locale) => string): LocalizedText {
  return { en: render('en'), ar: render('ar') };
}

/**
 * Pulls every input the formula names. Absent keys are reported together;
 * a present zero is a value, not an absence.
 */
function readInputs(definition: MetricDefinition, inputs: FinancialInputs): Map<string, number> {
  const values = new Map<string, number>();
  const missing: string[] = [];

  for (const name of definition.requiredInputs) {
    const value = Object.hasOwn(inputs, name) ? inputs[name] : undefined;
    if (value === undefined) {
      missing.push(name);
      continue;
    }
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(definition.id, name, value);
    }
    values.set(name, value);
  }

  if (missing.length > 0) {
    throw new MissingInputError(definition.id, missing);
  }
  return values;
}

function sumTerms(terms: FormulaTerms, values: ReadonlyMap<string, number>): number {
  const added = terms.add.reduce((sum, name) => sum + (values.get(name) ?? 0), 0);
  return terms.subtract.reduce((sum, name) => sum - (values.get(name) ?? 0), added);
}

export function compareToBenchmark(
  definition: MetricDefinition,
  value: number,
  industryAverage: number
): BenchmarkComparison {
  const position: BenchmarkPosition = value > industryAverage ? 'above' : value < industryAverage ? 'below' : 'at';
  const differencePct = industryAverage !== 0 && Number.isFinite(value)
    ? ((value - industryAverage) / Math.abs(industryAverage)) * 100
    : null;
  const favorable = position === 'at'
    || (definition.direction === 'higher_is_better' ? position === 'above' : position === 'below');

  const templates = BENCHMARK_TEXT[position];
  const diff = differencePct === null ? null : Math.abs(differencePct).toFixed(1);
  const text = localize((locale) => diff === null
    ? templates.plain[locale]
    : renderTemplate(templates.withDiff[locale], { diff }));

  return { industryAverage, differencePct, position, favorable, text };
}

/** Share of peer values at or below `value`, as 0-100. An empty peer list ranks at the median. */
export function calculatePercentileRanking(value: number, peerValues: readonly number[]): number {
  if (peerValues.length === 0) {
    return 50;
  }
  const position = peerValues.filter((peer) => peer <= value).length;
  return (position / peerValues.length) * 100;
}

export function rankAgainstPeers(value: number, peerValues: readonly number[]): PeerRanking {
  const percentile = calculatePercentileRanking(value, peerValues);
  const vars = { percentile: percentile.toFixed(1), count: String(peerValues.length) };
  const templates = peerValues.length === 0 ? PEER_RANKING_TEXT.noPeers : PEER_RANKING_TEXT.ranked;
  return {
    percentile,
    peerCount: peerValues.length,
    text: localize((locale) => renderTemplate(templates[locale], vars))
  };
}

/** Evaluates one metric definition against raw inputs. Pure: no I/O, no clock. */
export function evaluateDefinition(
  definition: MetricDefinition,
  inputs: FinancialInputs,
  options: Pick<EvaluateOptions, 'benchmark' | 'peerValues'> = {}
): AnalysisResult {
  const values = readInputs(definition, inputs);
  const { formula } = definition;

  const numerator = sumTerms(formula.numerator, values);
  const denominator = sumTerms(formula.denominator, values);
  const zeroDenominator = denominator === 0;

  let value: number;
  let tier: Tier;
  if (zeroDenominator) {
    value = definition.zeroDenominator.value;
    tier = { risk: definition.zeroDenominator.risk, rating: definition.zeroDenominator.rating };
  } else {
    value = (formula.multiplier * numerator) / denominator;
    tier = classifyValue(definition, value);
  }

  const formattedValue = localize((locale) => formatValue(value, definition.format, locale));
  const template = definition.interpretation[tier.rating];
  const localizedInterpretation = localize((locale) =>
    renderTemplate(template[locale], { value: formattedValue[locale] })
  );

  const recommendations = isBelowGood(tier.rating)
    ? definition.recommendations.improve
    : definition.recommendations.maintain;

  const warnings: string[] = [];
  for (const [name, input] of values) {
    if (input < 0) {
      warnings.push(`Negative value detected for ${name}: ${input}`);
    }
  }

  let benchmark: BenchmarkComparison | undefined;
  if (options.benchmark !== undefined) {
    if (!Number.isFinite(options.benchmark)) {
      throw new InvalidInputError(definition.id, 'benchmark', options.benchmark);
    }
    benchmark = compareToBenchmark(definition, value, options.benchmark);
  }

  let peerRanking: PeerRanking | undefined;
  if (options.peerValues !== undefined) {
    const invalidPeer = options.peerValues.find((peer) => !Number.isFinite(peer));
    if (invalidPeer !== undefined) {
      throw new InvalidInputError(definition.id, 'peerValues', invalidPeer);
    }
    peerRanking = rankAgainstPeers(value, options.peerValues);
  }

  const result: AnalysisResult = {
    metricId: definition.id,
    category: definition.category,
    value,
    formattedValue,
    riskLevel: tier.risk,
    performanceRating: tier.rating,
    zeroDenominator,
    localizedName: definition.name,
    localizedInterpretation,
    recommendations: recommendations.map((text) => ({ en: text.en, ar: text.ar })),
    warnings,
    ...(benchmark ? { benchmark } : {}),
    ...(peerRanking ? { peerRanking } : {})
  };
  return deepFreeze(result);
}

/**
 * Evaluates a registered metric.
 *
 * @throws UnknownMetricError when the id is not registered
 * @throws MissingInputError when a required input is absent
 * @throws InvalidInputError when an input, the benchmark or a peer value is not finite
 */
export function evaluate(
  metricId: string,
  inputs: FinancialInputs,
  options: EvaluateOptions = {}
): AnalysisResult {
  const registry = options.registry ?? getDefaultRegistry();
  return evaluateDefinition(registry.require(metricId), inputs, options);
}

export function localizeResult(result: AnalysisResult, locale: Locale): LocalizedAnalysisResult {
  return {
    metricId: result.metricId,
    locale,
    name: result.localizedName[locale],
    value: result.value,
    formattedValue: result.formattedValue[locale],
    riskLevel: result.riskLevel,
    performanceRating: result.performanceRating,
    interpretation: result.localizedInterpretation[locale],
    recommendations: result.recommendations.map((text) => text[locale]),
    ...(result.benchmark ? { benchmark: result.benchmark.text[locale] } : {}),
    ...(result.peerRanking ? { peerRanking: result.peerRanking.text[locale] } : {}),
    warnings: [...result.warnings]
  };
}
