/**
 * Tests for record filtering and summaries.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { filterRecords, summarize, summarizeByCondition } from '../../../../src/core/analysis/index.js';
import { BASELINE_SHAPE, conditionRecords, record } from './fixtures.js';

describe('filterRecords', () => {
  const records = [
    record({ condition: 'C0', tier: 'T1' }),
    record({ condition: 'C2', tier: 'T2' }),
    record({ condition: 'C0', tier: 'T3' }),
  ];

  it('should return everything without predicates', () => {
    expect(filterRecords(records)).toHaveLength(3);
  });

  it('should combine condition and tier predicates', () => {
    expect(filterRecords(records, { condition: 'C0', tiers: ['T2', 'T3'] })).toEqual([records[2]]);
  });

  it('should accept a tier set', () => {
    expect(filterRecords(records, { tiers: new Set(['T1']) })).toEqual([records[0]]);
  });

  it('should give the same subset whichever filter runs first', () => {
    const recordArb = fc
      .record({
        condition: fc.constantFrom('C0', 'C2', 'C4'),
        tier: fc.constantFrom('T1', 'T2', 'T3'),
        taskSuccess: fc.integer({ min: 0, max: 1 }),
        runtimeSeconds: fc.integer({ min: 120, max: 5000 }),
      })
      .map((fields) => record(fields));

    fc.assert(
      fc.property(
        fc.array(recordArb, { maxLength: 40 }),
        fc.constantFrom('C0', 'C2', 'C4'),
        fc.subarray(['T1', 'T2', 'T3']),
        (generated, condition, tiers) => {
          const conditionFirst = filterRecords(filterRecords(generated, { condition }), { tiers });
          const tiersFirst = filterRecords(filterRecords(generated, { tiers }), { condition });
          expect(conditionFirst).toEqual(tiersFirst);
          expect(conditionFirst).toEqual(filterRecords(generated, { condition, tiers }));
        }
      )
    );
  });
});

describe('summarize', () => {
  it('should return zeros for an empty subset', () => {
    expect(summarize([])).toEqual({
      n: 0,
      successRate: 0,
      testsPassRate: 0,
      avgPrReadiness: 0,
      medianRuntime: 0,
      medianTokens: 0,
      medianCost: 0,
      contextUtilizationRate: 0,
      avgMaintainability: 0,
      avgTestQuality: 0,
    });
  });

  it('should use means for rates and medians for runtime, tokens and cost', () => {
    const summary = summarize([
      record({ taskSuccess: 1, testsPassed: 1, runtimeSeconds: 100, totalTokens: 1000, estimatedCostUsd: 0.5 }),
      record({ taskSuccess: 0, testsPassed: 1, runtimeSeconds: 300, totalTokens: 3000, estimatedCostUsd: 1.5 }),
      record({ taskSuccess: 0, testsPassed: 0, runtimeSeconds: 900, totalTokens: 2000, estimatedCostUsd: 0.25 }),
      record({ taskSuccess: 1, testsPassed: 1, runtimeSeconds: 200, totalTokens: 4000, estimatedCostUsd: 1 }),
    ]);

    expect(summary.n).toBe(4);
    expect(summary.successRate).toBe(0.5);
    expect(summary.testsPassRate).toBe(0.75);
    expect(summary.medianRuntime).toBe(250);
    expect(summary.medianTokens).toBe(2500);
    expect(summary.medianCost).toBe(0.75);
  });
});

describe('summarizeByCondition', () => {
  it('should follow condition order and skip conditions without records', () => {
    const records = [...conditionRecords('C3', BASELINE_SHAPE), ...conditionRecords('C0', BASELINE_SHAPE)];
    const rows = summarizeByCondition(records);

    expect(rows.map((row) => row.condition)).toEqual(['C0', 'C3']);
    expect(rows[0]).toMatchObject({ condition: 'C0', n: 30, successRate: 17 / 30 });
  });

  it('should ignore conditions outside the order', () => {
    const rows = summarizeByCondition([record({ condition: 'C9' })]);
    expect(rows).toEqual([]);
  });
});
