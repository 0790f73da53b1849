import { describe, expect, it } from 'vitest';

import { summarizeBatch } from '@/lib/runner/summary';
import type { TrialRecord } from '@/lib/runner/types';

function rec(trial: number, influencerCount: number, fraction: number, staticIllusion: number, finalIllusion: number): TrialRecord {
  return { trial, seed: trial, influencerCount, fraction, staticIllusion, finalIllusion };
}

describe('summarizeBatch', () => {
  const records = [
    rec(0, 3, 0.1, 10, 5),
    rec(1, 3, 0.1, 14, 7),
    rec(0, 3, 0.3, 20, 20),
    rec(2, 1, 0.1, 4, 4),
  ];

  it('groups by influencer count in ascending order', () => {
    const table = summarizeBatch(records, [0.1, 0.3]);
    expect(table.fractions).toEqual([0.1, 0.3]);
    expect(table.rows.map(r => r.influencerCount)).toEqual([1, 3]);
  });

  it('gives single-sample cells their own value and sd 0, and null for empty cells', () => {
    const [row] = summarizeBatch(records, [0.1, 0.3]).rows;
    expect(row.cells).toEqual([
      { fraction: 0.1, samples: 1, static: { mean: 4, sd: 0 }, final: { mean: 4, sd: 0 } },
      null,
    ]);
  });

  it('computes mean and sample sd inside a group', () => {
    const cell = summarizeBatch(records, [0.1, 0.3]).rows[1].cells[0];
    expect(cell?.samples).toBe(2);
    expect(cell?.static.mean).toBe(12);
    expect(cell?.static.sd).toBeCloseTo(Math.sqrt(8), 12);
    expect(cell?.final.mean).toBe(6);
    expect(cell?.final.sd).toBeCloseTo(Math.sqrt(2), 12);
  });

  it('reports sd 0 for identical values', () => {
    const same = [rec(0, 2, 0.4, 9, 3), rec(1, 2, 0.4, 9, 3), rec(2, 2, 0.4, 9, 3)];
    const cell = summarizeBatch(same, [0.4]).rows[0].cells[0];
    expect(cell).toEqual({ fraction: 0.4, samples: 3, static: { mean: 9, sd: 0 }, final: { mean: 3, sd: 0 } });
  });

  it('returns no rows for no records', () => {
    expect(summarizeBatch([], [0.1]).rows).toEqual([]);
  });
});
