import { differenceInCalendarDays } from 'date-fns';
import { DEFAULT_SCORING_CONFIG } from '../../config/scoring';
import type { PriorityLevel, PriorityWeights, ScoringConfig, UrgencyRule } from '../../config/scoring';
import type { DeliveryRecord, ScoredDeliveryRecord } from './types';

export type PriorityMetrics = {
  daysSinceReturn: number;
  countingDelay: number;
  validationDelay: number;
  totalOpen: number;
};

function roundTo(n: number, dp: number): number {
  const p = Math.pow(10, dp);
  return Math.round(n * p) / p;
}

/**
 * Age of a slip in calendar days.
 *
 * - Closed slips (no open tablets) age until they were counted, falling back to `now`.
 * - Open slips always age until `now`.
 * - No return date: 0.
 * - Never negative: a counted date before the return date, or a return date after `now`, is 0.
 */
export function computeDaysSinceReturn(
  record: Pick<DeliveryRecord, 'returnDate' | 'countedDate' | 'totalOpen'>,
  now: Date
): number {
  if (!record.returnDate) return 0;
  const until = record.totalOpen === 0 && record.countedDate ? record.countedDate : now;
  return Math.max(0, differenceInCalendarDays(until, record.returnDate));
}

export function computePriorityScore(metrics: PriorityMetrics, weights: PriorityWeights): number {
  const score =
    metrics.daysSinceReturn * weights.daysSinceReturn +
    metrics.countingDelay * weights.countingDelay +
    metrics.validationDelay * weights.validationDelay +
    metrics.totalOpen * weights.openTablets;
  return roundTo(score, 2);
}

/**
 * Levels are ascending half-open bands [min, next.min). Scores under the first band take the
 * first label, so the level never decreases as the score grows.
 */
export function assignPriorityLevel(score: number, levels: PriorityLevel[]): string {
  let label = levels[0]?.label ?? '';
  for (const level of levels) {
    if (score < level.min) break;
    label = level.label;
  }
  return label;
}

export function assignUrgencyCategory(
  score: number,
  daysSinceReturn: number,
  rules: UrgencyRule[],
  fallback: string
): string {
  const hit = rules.find((rule) => score >= rule.minScore || daysSinceReturn >= rule.minDays);
  return hit ? hit.category : fallback;
}

export function scoreRecord(
  record: DeliveryRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
  now: Date = new Date()
): ScoredDeliveryRecord {
  const daysSinceReturn = computeDaysSinceReturn(record, now);
  const priorityScore = computePriorityScore(
    {
      daysSinceReturn,
      countingDelay: record.countingDelay,
      validationDelay: record.validationDelay,
      totalOpen: record.totalOpen,
    },
    config.weights
  );

  return {
    ...record,
    daysSinceReturn,
    priorityScore,
    priorityLevel: assignPriorityLevel(priorityScore, config.levels),
    urgencyCategory: assignUrgencyCategory(priorityScore, daysSinceReturn, config.urgencyRules, config.defaultUrgency),
  };
}

/** Highest score first; ties keep document order. */
export function sortByPriority(records: ScoredDeliveryRecord[]): ScoredDeliveryRecord[] {
  return [...records].sort((a, b) => b.priorityScore - a.priorityScore);
}
