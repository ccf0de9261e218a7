import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { RegistryError, UnknownMetricError } from '../errors.js';
import {
  getDefaultRegistry,
  loadMetricRegistry,
  MetricRegistry,
  parseMetricDefinitions
} from '../registry.js';
import { setLogLevel } from '../utils.js';

setLogLevel('error');

type Overrides = Record<string, unknown>;

function metricEntry(overrides: Overrides = {}): Overrides {
  return {
    id: 'test_ratio',
    name: { en: 'Test Ratio', ar: 'نسبة اختبار' },
    description: { en: 'A ratio for tests', ar: 'نسبة للاختبار' },
    category: 'liquidity',
    formula: {
      numerator: { add: ['alpha'] },
      denominator: { add: ['alpha', 'beta'] }
    },
    direction: 'higher_is_better',
    thresholds: [
      { bound: 2, risk: 'very_low', rating: 'excellent' },
      { bound: 1, risk: 'moderate', rating: 'average' },
      { risk: 'high', rating: 'poor' }
    ],
    zeroDenominator: { value: 0, risk: 'very_high', rating: 'critical' },
    format: 'ratio',
    interpretation: {
      excellent: { en: 'Excellent {value}', ar: 'ممتاز {value}' },
      good: { en: 'Good {value}', ar: 'جيد {value}' },
      average: { en: 'Average {value}', ar: 'متوسط {value}' },
      poor: { en: 'Poor {value}', ar: 'ضعيف {value}' }
    },
    recommendations: {
      improve: [{ en: 'Improve', ar: 'تحسين' }],
      maintain: [{ en: 'Maintain', ar: 'الحفاظ' }]
    },
    ...overrides
  };
}

function registryIssues(raw: unknown): readonly string[] {
  try {
    parseMetricDefinitions(raw);
  } catch (error) {
    assert.ok(error instanceof RegistryError);
    return error.issues;
  }
  assert.fail('expected the catalogue to be rejected');
}

describe('parseMetricDefinitions', () => {
  it('fills defaults and derives required inputs', () => {
    const [definition] = parseMetricDefinitions({ metrics: [metricEntry()] });

    assert.deepEqual(definition.requiredInputs, ['alpha', 'beta']);
    assert.deepEqual(definition.formula.numerator.subtract, []);
    assert.equal(definition.formula.multiplier, 1);
    assert.equal(definition.thresholds[2].bound, null);
    assert.deepEqual(definition.interpretation.critical, { en: 'Poor {value}', ar: 'ضعيف {value}' });
    assert.ok(Object.isFrozen(definition));
    assert.ok(Object.isFrozen(definition.thresholds));
  });

  it('requires a trailing catch-all', () => {
    const issues = registryIssues({
      metrics: [
        metricEntry({
          thresholds: [
            { bound: 2, risk: 'very_low', rating: 'excellent' },
            { bound: 1, risk: 'moderate', rating: 'average' }
          ]
        })
      ]
    });
    assert.deepEqual(issues, [
      'metrics.0.thresholds.1.bound: the last threshold must be the catch-all with bound null'
    ]);
  });

  it('rejects a catch-all before the end of the table', () => {
    const issues = registryIssues({
      metrics: [
        metricEntry({
          thresholds: [
            { risk: 'very_low', rating: 'excellent' },
            { risk: 'high', rating: 'poor' }
          ]
        })
      ]
    });
    assert.deepEqual(issues, ['metrics.0.thresholds.0.bound: only the last threshold may omit its bound']);
  });

  it('requires bounds to move away from the best tier', () => {
    const issues = registryIssues({
      metrics: [
        metricEntry({
          thresholds: [
            { bound: 1, risk: 'very_low', rating: 'excellent' },
            { bound: 2, risk: 'moderate', rating: 'average' },
            { risk: 'high', rating: 'poor' }
          ]
        })
      ]
    });
    assert.deepEqual(issues, ['metrics.0.thresholds.1.bound: bounds must be strictly decreasing']);
  });

  it('checks bound order against the direction', () => {
    const issues = registryIssues({
      metrics: [metricEntry({ direction: 'lower_is_better' })]
    });
    assert.deepEqual(issues, ['metrics.0.thresholds.1.bound: bounds must be strictly increasing']);
  });

  it('rejects ratings that improve down the table', () => {
    const issues = registryIssues({
      metrics: [
        metricEntry({
          thresholds: [
            { bound: 2, risk: 'moderate', rating: 'average' },
            { bound: 1, risk: 'very_low', rating: 'excellent' },
            { risk: 'high', rating: 'poor' }
          ]
        })
      ]
    });
    assert.deepEqual(issues, [
      'metrics.0.thresholds.1.rating: ratings must not improve further down the table'
    ]);
  });

  it('rejects duplicate ids', () => {
    const issues = registryIssues({ metrics: [metricEntry(), metricEntry()] });
    assert.deepEqual(issues, ['metrics.1.id: duplicate metric id test_ratio']);
  });

  it('rejects unknown categories', () => {
    const issues = registryIssues({ metrics: [metricEntry({ category: 'valuation' })] });
    assert.equal(issues.length, 1);
    assert.ok(issues[0].startsWith('metrics.0.category: '));
  });

  it('rejects a catalogue without metrics', () => {
    assert.throws(() => parseMetricDefinitions({ metrics: [] }), RegistryError);
    assert.throws(() => parseMetricDefinitions(null), RegistryError);
  });
});

describe('MetricRegistry', () => {
  const [definition] = parseMetricDefinitions({ metrics: [metricEntry()] });
  const registry = new MetricRegistry([definition]);

  it('looks definitions up by id', () => {
    assert.equal(registry.size, 1);
    assert.equal(registry.has('test_ratio'), true);
    assert.equal(registry.get('test_ratio'), definition);
    assert.equal(registry.get('other_ratio'), undefined);
    assert.deepEqual(registry.ids(), ['test_ratio']);
  });

  it('throws for unknown ids on require', () => {
    assert.throws(() => registry.require('other_ratio'), UnknownMetricError);
  });

  it('filters by category', () => {
    assert.deepEqual(registry.list('liquidity'), [definition]);
    assert.deepEqual(registry.list('leverage'), []);
  });

  it('refuses duplicate definitions', () => {
    assert.throws(
      () => new MetricRegistry([definition, definition]),
      (error: unknown) => {
        assert.ok(error instanceof RegistryError);
        assert.deepEqual(error.issues, ['duplicate metric id test_ratio']);
        return true;
      }
    );
  });
});

describe('loadMetricRegistry', () => {
  let workDir = '';

  before(() => {
    workDir = mkdtempSync(path.join(tmpdir(), 'ratio-registry-'));
  });

  after(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('loads the bundled catalogue', () => {
    const registry = getDefaultRegistry();

    assert.equal(registry.size, 15);
    assert.equal(registry.list('liquidity').length, 4);
    assert.equal(registry.list('profitability').length, 5);
    assert.equal(registry.list('leverage').length, 3);
    assert.equal(registry.list('efficiency').length, 3);
    assert.equal(registry.require('current_ratio').zeroDenominator.value, Infinity);
    assert.equal(registry.require('days_sales_outstanding').formula.multiplier, 365);
    assert.equal(getDefaultRegistry(), registry);
  });

  it('loads a catalogue from a YAML file', () => {
    const filePath = path.join(workDir, 'metrics.yaml');
    writeFileSync(
      filePath,
      [
        'metrics:',
        '  - id: test_ratio',
        '    name: { en: Test Ratio, ar: نسبة اختبار }',
        '    description: { en: A ratio for tests, ar: نسبة للاختبار }',
        '    category: efficiency',
        '    formula:',
        '      numerator: { add: [alpha] }',
        '      denominator: { add: [beta] }',
        '    direction: higher_is_better',
        '    thresholds:',
        '      - { bound: 1, risk: low, rating: good }',
        '      - { risk: high, rating: poor }',
        '    zeroDenominator: { value: .inf, risk: very_low, rating: excellent }',
        '    format: times',
        '    interpretation:',
        '      excellent: { en: "Excellent {value}", ar: "ممتاز {value}" }',
        '      good: { en: "Good {value}", ar: "جيد {value}" }',
        '      average: { en: "Average {value}", ar: "متوسط {value}" }',
        '      poor: { en: "Poor {value}", ar: "ضعيف {value}" }',
        '    recommendations:',
        '      improve: [{ en: Improve, ar: تحسين }]',
        '      maintain: [{ en: Maintain, ar: الحفاظ }]',
        ''
      ].join('\n')
    );

    const registry = loadMetricRegistry(filePath);

    assert.deepEqual(registry.ids(), ['test_ratio']);
    assert.equal(registry.require('test_ratio').zeroDenominator.value, Infinity);
  });

  it('wraps a missing catalogue file', () => {
    const filePath = path.join(workDir, 'absent.yaml');

    assert.throws(
      () => loadMetricRegistry(filePath),
      (error: unknown) => {
        assert.ok(error instanceof RegistryError);
        assert.equal(error.code, 'INVALID_REGISTRY');
        assert.ok(error.issues[0].startsWith(`${filePath}: ENOENT`));
        return true;
      }
    );
  });

  it('wraps YAML syntax errors', () => {
    const filePath = path.join(workDir, 'broken.yaml');
    writeFileSync(filePath, 'metrics: [\n');

    assert.throws(
      () => loadMetricRegistry(filePath),
      (error: unknown) => {
        assert.ok(error instanceof RegistryError);
        assert.equal(error.issues.length, 1);
        assert.ok(error.issues[0].startsWith(`${filePath}: `));
        return true;
      }
    );
  });
});
