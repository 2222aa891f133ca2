import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_SCORING_CONFIG, resolveScoringConfig } from '../../../src/config/scoring';
import {
  assignPriorityLevel,
  assignUrgencyCategory,
  computeDaysSinceReturn,
  computePriorityScore,
  scoreRecord,
  sortByPriority,
} from '../../../src/services/returns/priorityScorer';
import { makeRecord } from './sampleLines';

const { weights, levels, urgencyRules } = DEFAULT_SCORING_CONFIG;

describe('computeDaysSinceReturn', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('ages a closed slip until it was counted, whatever the clock says', () => {
    const record = makeRecord({
      totalOpen: 0,
      returnDate: new Date(2025, 7, 1),
      countedDate: new Date(2025, 7, 10),
    });

    vi.useFakeTimers();
    vi.setSystemTime(new Date(2025, 11, 24));
    expect(computeDaysSinceReturn(record, new Date())).toBe(9);

    vi.setSystemTime(new Date(2031, 2, 3));
    expect(computeDaysSinceReturn(record, new Date())).toBe(9);
    expect(scoreRecord(record).daysSinceReturn).toBe(9);
  });

  it('ages a closed slip without a counted date until now', () => {
    const record = makeRecord({ totalOpen: 0, returnDate: new Date(2025, 7, 1), countedDate: null });
    expect(computeDaysSinceReturn(record, new Date(2025, 7, 21))).toBe(20);
  });

  it('ages an open slip until now even when a counted date exists', () => {
    const record = makeRecord({
      totalOpen: 2,
      returnDate: new Date(2025, 7, 1),
      countedDate: new Date(2025, 7, 10),
    });
    expect(computeDaysSinceReturn(record, new Date(2025, 7, 31))).toBe(30);
  });

  it('is 0 when the counted date is before the return date', () => {
    const record = makeRecord({
      totalOpen: 0,
      returnDate: new Date(2025, 8, 20),
      countedDate: new Date(2025, 8, 10),
    });
    expect(computeDaysSinceReturn(record, new Date(2025, 9, 2))).toBe(0);
  });

  it('is 0 when the return date is after now', () => {
    const record = makeRecord({ totalOpen: 2, returnDate: new Date(2025, 9, 12) });
    expect(computeDaysSinceReturn(record, new Date(2025, 9, 2))).toBe(0);
  });

  it('is 0 without a return date', () => {
    expect(computeDaysSinceReturn(makeRecord({ returnDate: null }), new Date(2025, 7, 31))).toBe(0);
  });
});

describe('computePriorityScore', () => {
  it('weights the four metrics', () => {
    const score = computePriorityScore(
      { daysSinceReturn: 10, countingDelay: 5, validationDelay: 2, totalOpen: 3 },
      weights
    );
    expect(score).toBe(6.2);
  });

  it('rounds to two decimals', () => {
    const score = computePriorityScore(
      { daysSinceReturn: 1, countingDelay: 0, validationDelay: 0, totalOpen: 0 },
      { daysSinceReturn: 1 / 3, countingDelay: 0, validationDelay: 0, openTablets: 0 }
    );
    expect(score).toBe(0.33);
  });
});

describe('assignPriorityLevel', () => {
  it.each([
    [-5, 'LOW'],
    [0, 'LOW'],
    [9.99, 'LOW'],
    [10, 'MEDIUM'],
    [19.99, 'MEDIUM'],
    [20, 'HIGH'],
    [34.99, 'HIGH'],
    [35, 'CRITICAL'],
    [500, 'CRITICAL'],
  ])('score %s -> %s', (score, label) => {
    expect(assignPriorityLevel(score, levels)).toBe(label);
  });

  it('never decreases as the score grows', () => {
    const configs = [
      levels,
      [{ label: 'A', min: 5 }],
      [
        { label: 'A', min: -10 },
        { label: 'B', min: 0.5 },
        { label: 'C', min: 1 },
        { label: 'D', min: 42 },
      ],
    ];

    for (const config of configs) {
      const labels = config.map((l) => l.label);
      let previous = -1;
      for (let score = -20; score <= 60; score += 0.25) {
        const rank = labels.indexOf(assignPriorityLevel(score, config));
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    }
  });
});

describe('assignUrgencyCategory', () => {
  it.each([
    [40, 0, 'URGENT'],
    [0, 30, 'URGENT'],
    [20, 0, 'ATTENTION'],
    [0, 15, 'ATTENTION'],
    [10, 0, 'NORMAL'],
    [0, 7, 'NORMAL'],
    [9.99, 6, 'NONE'],
  ])('score %s, %s days -> %s', (score, days, category) => {
    expect(assignUrgencyCategory(score, days, urgencyRules, 'NONE')).toBe(category);
  });
});

describe('scoreRecord', () => {
  it('adds the derived fields without touching the input', () => {
    const record = makeRecord({
      returnDate: new Date(2025, 8, 2),
      totalOpen: 2,
      countingDelay: 15,
      validationDelay: 0,
    });

    const scored = scoreRecord(record, DEFAULT_SCORING_CONFIG, new Date(2025, 9, 2));

    expect(scored).toMatchObject({
      slipId: '729000018669',
      daysSinceReturn: 30,
      priorityScore: 16.7,
      priorityLevel: 'MEDIUM',
      urgencyCategory: 'URGENT',
    });
    expect(record).not.toHaveProperty('priorityScore');
  });

  it('uses caller weights and levels', () => {
    const config = resolveScoringConfig({
      weights: { daysSinceReturn: 1, countingDelay: 0, validationDelay: 0, openTablets: 0 },
      levels: [
        { label: 'fresh', min: 0 },
        { label: 'stale', min: 30 },
      ],
    });
    const scored = scoreRecord(makeRecord({ totalOpen: 1 }), config, new Date(2025, 9, 2));

    expect(scored.priorityScore).toBe(30);
    expect(scored.priorityLevel).toBe('stale');
  });
});

describe('sortByPriority', () => {
  it('orders by score descending and keeps ties in document order', () => {
    const now = new Date(2025, 9, 2);
    const records = [
      { slipId: '700000000001', countingDelay: 5 },
      { slipId: '700000000002', countingDelay: 10 },
      { slipId: '700000000003', countingDelay: 5 },
      { slipId: '700000000004', countingDelay: 20 },
    ].map((o) => scoreRecord(makeRecord({ ...o, returnDate: null }), DEFAULT_SCORING_CONFIG, now));

    const sorted = sortByPriority(records);

    expect(sorted.map((r) => r.slipId)).toEqual(['700000000004', '700000000002', '700000000001', '700000000003']);
    expect(records.map((r) => r.slipId)).toEqual([
      '700000000001',
      '700000000002',
      '700000000003',
      '700000000004',
    ]);
  });
});
