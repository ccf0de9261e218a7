import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { RegistryError, UnknownMetricError } from './errors.js';
import {
  METRIC_CATEGORIES,
  PERFORMANCE_RATINGS,
  RISK_LEVELS,
  type MetricCategory,
  type MetricDefinition
} from './types.js';
import { deepFreeze, errorMessage, ratioLogger } from './utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/modules/ratios and dist/modules/ratios both sit three levels below the package root.
export const DEFAULT_REGISTRY_PATH = path.resolve(__dirname, '../../../data/metrics.yaml');

const localizedTextSchema = z.object({
  en: z.string().min(1),
  ar: z.string().min(1)
});

const termsSchema = z.object({
  add: z.array(z.string().min(1)).min(1),
  subtract: z.array(z.string().min(1)).default([])
});

const thresholdSchema = z.object({
  bound: z.number().finite().nullable().default(null),
  risk: z.enum(RISK_LEVELS),
  rating: z.enum(PERFORMANCE_RATINGS)
});

const metricSchema = z
  .object({
    id: z.string().regex(/^[a-z][a-z0-9_]*$/, 'must be snake_case'),
    name: localizedTextSchema,
    description: localizedTextSchema,
    category: z.enum(METRIC_CATEGORIES),
    formula: z.object({
      numerator: termsSchema,
      denominator: termsSchema,
      multiplier: z.number().finite().positive().default(1)
    }),
    direction: z.enum(['higher_is_better', 'lower_is_better']),
    thresholds: z.array(thresholdSchema).min(1),
    zeroDenominator: z.object({
      value: z.number(),
      risk: z.enum(RISK_LEVELS),
      rating: z.enum(PERFORMANCE_RATINGS)
    }),
    format: z.enum(['ratio', 'percent', 'times', 'days']),
    interpretation: z.object({
      excellent: localizedTextSchema,
      good: localizedTextSchema,
      average: localizedTextSchema,
      poor: localizedTextSchema,
      critical: localizedTextSchema.optional()
    }),
    recommendations: z.object({
      improve: z.array(localizedTextSchema).min(1),
      maintain: z.array(localizedTextSchema).min(1)
    })
  })
  .superRefine((metric, ctx) => {
    const { thresholds, direction } = metric;
    const lastIndex = thresholds.length - 1;

    thresholds.forEach((entry, index) => {
      if (index === lastIndex && entry.bound !== null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'the last threshold must be the catch-all with bound null',
          path: ['thresholds', index, 'bound']
        });
      }
      if (index < lastIndex && entry.bound === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'only the last threshold may omit its bound',
          path: ['thresholds', index, 'bound']
        });
      }
      if (index === 0) {
        return;
      }

      const previous = thresholds[index - 1];
      if (rank(entry.rating) < rank(previous.rating)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'ratings must not improve further down the table',
          path: ['thresholds', index, 'rating']
        });
      }
      if (previous.bound === null || entry.bound === null) {
        return;
      }
      const ordered = direction === 'higher_is_better' ? entry.bound < previous.bound : entry.bound > previous.bound;
      if (!ordered) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: direction === 'higher_is_better'
            ? 'bounds must be strictly decreasing'
            : 'bounds must be strictly increasing',
          path: ['thresholds', index, 'bound']
        });
      }
    });
  });

const registrySchema = z
  .object({
    metrics: z.array(metricSchema).min(1)
  })
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.metrics.forEach((metric, index) => {
      if (seen.has(metric.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate metric id ${metric.id}`,
          path: ['metrics', index, 'id']
        });
      }
      seen.add(metric.id);
    });
  });

type MetricEntry = z.infer<typeof metricSchema>;

function rank(rating: MetricEntry['thresholds'][number]['rating']): number {
  return PERFORMANCE_RATINGS.indexOf(rating);
}

function toDefinition(entry: MetricEntry): MetricDefinition {
  const { numerator, denominator } = entry.formula;
  const requiredInputs = [
    ...new Set([...numerator.add, ...numerator.subtract, ...denominator.add, ...denominator.subtract])
  ];

  return deepFreeze({
    id: entry.id,
    name: entry.name,
    description: entry.description,
    category: entry.category,
    formula: entry.formula,
    requiredInputs,
    direction: entry.direction,
    thresholds: entry.thresholds,
    zeroDenominator: entry.zeroDenominator,
    format: entry.format,
    interpretation: {
      excellent: entry.interpretation.excellent,
      good: entry.interpretation.good,
      average: entry.interpretation.average,
      poor: entry.interpretation.poor,
      critical: entry.interpretation.critical ?? entry.interpretation.poor
    },
    recommendations: entry.recommendations
  });
}

/**
 * Validates raw catalogue data (as parsed from YAML or built in code)
 * and returns frozen metric definitions.
 */
export function parseMetricDefinitions(raw: unknown): MetricDefinition[] {
  const parsed = registrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data.metrics.map(toDefinition);
}

export class MetricRegistry {
  private readonly definitions: ReadonlyMap<string, MetricDefinition>;

  constructor(definitions: readonly MetricDefinition[]) {
    const byId = new Map<string, MetricDefinition>();
    for (const definition of definitions) {
      if (byId.has(definition.id)) {
        throw new RegistryError([`duplicate metric id ${definition.id}`]);
      }
      byId.set(definition.id, definition);
    }
    this.definitions = byId;
  }

  get size(): number {
    return this.definitions.size;
  }

  has(metricId: string): boolean {
    return this.definitions.has(metricId);
  }

  get(metricId: string): MetricDefinition | undefined {
    return this.definitions.get(metricId);
  }

  require(metricId: string): MetricDefinition {
    const definition = this.definitions.get(metricId);
    if (!definition) {
      throw new UnknownMetricError(metricId);
    }
    return definition;
  }

  ids(): string[] {
    return [...this.definitions.keys()];
  }

  list(category?: MetricCategory): MetricDefinition[] {
    const all = [...this.definitions.values()];
    return category ? all.filter((definition) => definition.category === category) : all;
  }
}

export function loadMetricRegistry(filePath: string = DEFAULT_REGISTRY_PATH): MetricRegistry {
  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new RegistryError([`${filePath}: ${errorMessage(error)}`]);
  }

  const registry = new MetricRegistry(parseMetricDefinitions(raw));
  ratioLogger.info('[Registry] Loaded metric definitions', {
    count: registry.size,
    filePath
  });
  return registry;
}

let defaultRegistry: MetricRegistry | null = null;

/** The bundled catalogue, loaded on first use and shared for the rest of the process. */
export function getDefaultRegistry(): MetricRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadMetricRegistry();
  }
  return defaultRegistry;
}
