import { describe, expect, it } from 'vitest';

import { classifyGroup, groupResults, labelFor, rowId, summarizeRun } from '../src/aggregator';
import { emptyCounts } from '../src/core/status';
import type { ResultSource, StatusCounts } from '../src/core/types';
import { createHarness, group, record, runTest, START_MS, testCase } from './helpers/fixtures';

const counts = (partial: Partial<StatusCounts>): StatusCounts => ({ ...emptyCounts(), ...partial });

describe('classifyGroup', () => {
  it.each([
    [{ pass: 10, error: 1 }, 'error'],
    [{ pass: 10, fail: 1, skip: 1 }, 'fail'],
    [{ pass: 10, skip: 1 }, 'skip'],
    [{ pass: 10 }, 'pass'],
    [{ fail: 3, error: 1, skip: 2 }, 'error'],
    [{ fail: 1, skip: 4 }, 'fail'],
    [{}, 'pass'],
  ] as const)('classifies %o as %s', (partial, expected) => {
    expect(classifyGroup(counts(partial))).toBe(expected);
  });
});

describe('groupResults', () => {
  const math = group('MathTests');
  const strings = group('StringTests', 'String helpers\nsecond line');
  const add = testCase(math, 'test_add');
  const div = testCase(math, 'test_div');
  const sub = testCase(math, 'test_sub');
  const upper = testCase(strings, 'test_upper');
  const split = testCase(strings, 'test_split');

  it('builds group rows and ids for a mixed run', () => {
    const groups = groupResults([
      record('pass', add),
      record('error', div),
      record('pass', sub),
      record('pass', upper),
      record('fail', split),
    ]);

    expect(groups.map((g) => [g.id, g.classification, g.total])).toEqual([
      ['c1', 'error', 3],
      ['c2', 'fail', 2],
    ]);
    expect(groups[0]?.counts).toEqual({ pass: 2, fail: 0, error: 1, skip: 0 });
    expect(groups[1]?.counts).toEqual({ pass: 1, fail: 1, error: 0, skip: 0 });
    expect(groups.flatMap((g) => g.rows.map((r) => r.rowId))).toEqual([
      'pt1.1',
      'ft1.2',
      'pt1.3',
      'pt2.1',
      'ft2.2',
    ]);
  });

  it('orders groups by first appearance and keeps emission order inside', () => {
    const groups = groupResults([record('pass', upper), record('pass', add), record('skip', split)]);

    expect(groups.map((g) => g.group.name)).toEqual(['StringTests', 'MathTests']);
    expect(groups[0]?.rows.map((r) => r.record.test.name)).toEqual(['test_upper', 'test_split']);
    expect(groups[0]?.rows.map((r) => r.rowId)).toEqual(['pt1.1', 'st1.2']);
  });

  it('labels groups with the first description line', () => {
    const [, second] = groupResults([record('pass', add), record('pass', upper)]);

    expect(second?.label).toBe('StringTests: String helpers');
    expect(labelFor('MathTests', undefined)).toBe('MathTests');
    expect(labelFor('MathTests', '  \nignored')).toBe('MathTests');
  });

  it('gives every group and row a distinct id', () => {
    const records = [add, div, sub, upper, split, add, upper].map((test, i) =>
      record(i % 3 === 0 ? 'fail' : 'pass', test),
    );
    const groups = groupResults(records);
    const ids = [...groups.map((g) => g.id), ...groups.flatMap((g) => g.rows.map((r) => r.rowId))];

    expect(new Set(ids).size).toBe(groups.length + records.length);
  });

  it('shares the f prefix between failures and errors', () => {
    expect(rowId('fail', 1, 1)).toBe('ft1.1');
    expect(rowId('error', 1, 2)).toBe('ft1.2');
    expect(rowId('skip', 3, 4)).toBe('st3.4');
  });

  it('classifies a passing group next to a mixed one', () => {
    const alpha = group('Alpha');
    const beta = group('Beta');
    const groups = groupResults([
      record('pass', testCase(alpha, 'a1')),
      record('pass', testCase(alpha, 'a2')),
      record('pass', testCase(alpha, 'a3')),
      record('pass', testCase(beta, 'b1')),
      record('fail', testCase(beta, 'b2')),
      record('skip', testCase(beta, 'b3')),
    ]);

    expect(groups.map((g) => g.classification)).toEqual(['pass', 'fail']);
    expect(groups.map((g) => g.total)).toEqual([3, 3]);
    expect(groups[1]?.rows.map((r) => r.rowId)).toEqual(['pt2.1', 'ft2.2', 'st2.3']);
  });

  it('returns no groups for an empty run', () => {
    expect(groupResults([])).toEqual([]);
  });
});

describe('summarizeRun', () => {
  it('sums group counts to the run counts', () => {
    const { collector } = createHarness();
    const math = group('MathTests');
    const strings = group('StringTests');

    runTest(collector, testCase(math, 'a'), (c, t) => c.onPass(t));
    runTest(collector, testCase(strings, 'b'), (c, t) => {
      c.onSubResult(t, 'x');
      c.onSubResult(t, 'y', { kind: 'error', detail: 'bad' });
    });
    runTest(collector, testCase(math, 'c'), (c, t) => c.onSkip(t, 'later'));

    const summary = summarizeRun(collector);
    const summed = groupResults(collector.results).reduce(
      (acc, g) => ({
        pass: acc.pass + g.counts.pass,
        fail: acc.fail + g.counts.fail,
        error: acc.error + g.counts.error,
        skip: acc.skip + g.counts.skip,
      }),
      emptyCounts(),
    );

    expect(summed).toEqual(summary.counts);
    expect(summary.total).toBe(4);
    expect(summary.passRate).toBe(50);
  });

  it('reports a zero pass rate for an empty run', () => {
    const source: ResultSource = {
      results: [],
      counts: emptyCounts(),
      startedAt: new Date(START_MS),
      stoppedAt: undefined,
    };

    expect(summarizeRun(source)).toEqual({
      counts: emptyCounts(),
      total: 0,
      startedAt: new Date(START_MS),
      stoppedAt: undefined,
      passRate: 0,
    });
  });

  it('rounds the pass rate to two places', () => {
    const source: ResultSource = {
      results: [],
      counts: counts({ pass: 2, fail: 1 }),
      startedAt: new Date(START_MS),
      stoppedAt: undefined,
    };

    expect(summarizeRun(source).passRate).toBe(66.67);
  });
});
