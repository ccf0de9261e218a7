#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { CliUsageError, USAGE, parseArgs, parseLineItems, renderResultJson, type CliArgs } from './cli.js';
import { initConfig } from './config.js';
import {
  buildRatioReport,
  evaluate,
  isRatioEngineError,
  loadMetricRegistry,
  localizeResult,
  parseStatement,
  serializeReport,
  type FinancialStatement,
  type Locale,
  type LocalizedAnalysisResult,
  type MetricFailure,
  type MetricRegistry,
  type PerformanceRating,
  type RatioReport
} from './modules/ratios/index.js';
import { errorMessage, ratioLogger, setLogLevel } from './modules/ratios/utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const SAMPLE_STATEMENT_PATH = path.resolve(__dirname, '../data/sample-statement.json');

const RATING_ICON: Record<PerformanceRating, string> = {
  excellent: '🟢',
  good: '🟢',
  average: '🟡',
  poor: '🟠',
  critical: '🔴'
};

async function readStatement(filePath: string): Promise<FinancialStatement> {
  const source = await readFile(filePath, 'utf8');
  return parseStatement(JSON.parse(source));
}

function printResult(result: LocalizedAnalysisResult) {
  console.log(`\n${RATING_ICON[result.performanceRating]} ${result.name} (${result.metricId})`);
  console.log(`   Value: ${result.formattedValue}`);
  console.log(`   Rating: ${result.performanceRating}, Risk: ${result.riskLevel}`);
  console.log(`   ${result.interpretation}`);
  if (result.benchmark) {
    console.log(`   Benchmark: ${result.benchmark}`);
  }
  if (result.peerRanking) {
    console.log(`   Peers: ${result.peerRanking}`);
  }
  result.recommendations.forEach((text) => console.log(`   - ${text}`));
  result.warnings.forEach((text) => console.log(`   ⚠️  ${text}`));
}

function printFailure(failure: MetricFailure) {
  console.log(`\n❌ ${failure.metricId}: ${failure.message}`);
}

function printReport(report: RatioReport, locale: Locale, title: string) {
  console.log(`\n📊 ${title}`);
  console.log('----------------------------------------------------------------');
  report.results.forEach((result) => printResult(localizeResult(result, locale)));
  report.failures.forEach(printFailure);

  const { summary } = report;
  console.log('\n----------------------------------------------------------------');
  console.log(`Evaluated ${summary.evaluated}/${summary.requested}, failed ${summary.failed}`);
}

function listMetrics(registry: MetricRegistry, locale: Locale) {
  console.log(`\n📚 ${registry.size} registered metrics:`);
  for (const definition of registry.list()) {
    console.log(
      `${definition.id.padEnd(28)} ${definition.category.padEnd(14)} ${definition.name[locale]}`
    );
  }
}

async function runStatement(
  registry: MetricRegistry,
  statement: FinancialStatement,
  args: CliArgs,
  fallbackLocale: Locale
) {
  const locale = args.locale ?? statement.locale ?? fallbackLocale;
  const report = await buildRatioReport(
    {
      lineItems: statement.lineItems,
      metricIds: statement.metrics,
      benchmarks: statement.benchmarks,
      peerValues: statement.peerValues
    },
    registry
  );

  if (args.json) {
    console.log(JSON.stringify(serializeReport(report), null, 2));
  } else {
    const title = [statement.company, statement.period].filter(Boolean).join(' · ') || 'Ratio report';
    printReport(report, locale, title);
  }

  if (report.failures.length > 0) {
    process.exitCode = 1;
  }
}

async function main() {
  const config = initConfig();
  const args = parseArgs(process.argv.slice(2));
  // stdout carries the report in --json mode
  setLogLevel(args.json && config.logLevel === 'info' ? 'warn' : config.logLevel);

  const locale = args.locale ?? config.locale;
  const registry = loadMetricRegistry(config.registryPath);

  if (args.mode === '--list') {
    listMetrics(registry, locale);
  } else if (args.mode === '--metric') {
    const [metricId, ...pairs] = args.positional;
    if (!metricId) {
      console.error('Please specify a metric: --metric current_ratio current_assets=1500 current_liabilities=1000');
      process.exitCode = 1;
      return;
    }
    const result = evaluate(metricId, parseLineItems(pairs), { registry });
    if (args.json) {
      console.log(renderResultJson(result, locale));
    } else {
      printResult(localizeResult(result, locale));
    }
  } else if (args.mode === '--file') {
    const filePath = args.positional[0];
    if (!filePath) {
      console.error('Please specify a statement file: --file statement.json');
      process.exitCode = 1;
      return;
    }
    await runStatement(registry, await readStatement(filePath), args, locale);
  } else if (args.mode === '--demo' || args.mode === undefined) {
    if (!args.json) {
      console.log('🚀 Running demo analysis...');
    }
    await runStatement(registry, await readStatement(SAMPLE_STATEMENT_PATH), args, locale);
  } else {
    console.error(`Unknown option ${args.mode}\n${USAGE}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(`❌ ${error.message}\n${USAGE}`);
  } else if (isRatioEngineError(error)) {
    ratioLogger.error('[CLI] Evaluation failed', { code: error.code, message: error.message });
    console.error(`❌ ${error.message}`);
  } else {
    ratioLogger.error('[CLI] Unexpected failure', { message: errorMessage(error) });
    console.error('❌ Unexpected failure:', error);
  }
  process.exitCode = 1;
});
