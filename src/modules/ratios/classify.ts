import { RegistryError } from './errors.js';
import {
  PERFORMANCE_RATINGS,
  type ImprovementDirection,
  type MetricDefinition,
  type PerformanceRating,
  type Tier
} from './types.js';

const GOOD_RANK = PERFORMANCE_RATINGS.indexOf('good');

export function ratingRank(rating: PerformanceRating): number {
  return PERFORMANCE_RATINGS.indexOf(rating);
}

export function isBelowGood(rating: PerformanceRating): boolean {
  return ratingRank(rating) > GOOD_RANK;
}

/** Bounds are inclusive: lower bounds for higher-is-better, upper bounds otherwise. */
export function meetsBound(direction: ImprovementDirection, value: number, bound: number): boolean {
  return direction === 'higher_is_better' ? value >= bound : value <= bound;
}

/**
 * Walks the threshold table from the most favourable tier down and returns
 * the first tier whose bound the value meets, or the catch-all.
 */
export function classifyValue(
  definition: Pick<MetricDefinition, 'direction' | 'thresholds'>,
  value: number
): Tier {
  for (const entry of definition.thresholds) {
    if (entry.bound === null || meetsBound(definition.direction, value, entry.bound)) {
      return { risk: entry.risk, rating: entry.rating };
    }
  }
  throw new RegistryError(['threshold table has no catch-all entry']);
}
