import { describe, expect, it } from 'vitest';
import { summarizeSyncMap } from '../src/inspect.js';
import { NESTED_FIXTURE, makeFragment, makeSyncMap } from './helpers.js';

describe('summarizeSyncMap', () => {
  it('summarizes an empty map', () => {
    expect(summarizeSyncMap(makeSyncMap())).toEqual({
      topLevelFragments: 0,
      totalFragments: 0,
      height: 1,
      singleLevel: true,
      languages: [],
      firstBegin: null,
      lastEnd: null,
      durationMin: 0,
      durationAvg: 0,
      durationMax: 0,
      gaps: [],
      overlaps: 0,
    });
  });

  it('computes timing stats over the leaves of a nested map', () => {
    const syncMap = makeSyncMap();
    syncMap.read('json', NESTED_FIXTURE);

    const summary = summarizeSyncMap(syncMap);

    expect(summary).toMatchObject({
      topLevelFragments: 2,
      totalFragments: 4,
      height: 3,
      singleLevel: false,
      languages: ['de', 'en'],
      firstBegin: 0,
      lastEnd: 9.5,
      durationMin: 2.25,
      durationMax: 4.5,
      gaps: [],
      overlaps: 0,
    });
    expect(summary.durationAvg).toBeCloseTo(3.1667, 4);
  });

  it('reports gaps and overlaps between consecutive fragments', () => {
    const syncMap = makeSyncMap();
    syncMap.addFragment(makeFragment('f1', 0, 1));
    syncMap.addFragment(makeFragment('f2', 1.5, 3));
    syncMap.addFragment(makeFragment('f3', 2.5, 4));

    const summary = summarizeSyncMap(syncMap);

    expect(summary.gaps).toEqual([{ seconds: 0.5, fromId: 'f1', toId: 'f2' }]);
    expect(summary.overlaps).toBe(1);
  });

  it('handles word-level maps with many fragments', () => {
    const syncMap = makeSyncMap();
    const count = 200_000;
    for (let i = 0; i < count; i++) {
      syncMap.addFragment(makeFragment(`w${i}`, i, i + (i % 2 === 0 ? 0.5 : 1)));
    }

    const summary = summarizeSyncMap(syncMap);

    expect(summary.totalFragments).toBe(count);
    expect(summary.durationMin).toBe(0.5);
    expect(summary.durationMax).toBe(1);
    expect(summary.durationAvg).toBe(0.75);
    expect(summary.gaps).toHaveLength(count / 2);
    expect(summary.overlaps).toBe(0);
  });
});
