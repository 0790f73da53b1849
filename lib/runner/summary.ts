// lib/runner/summary.ts
import { meanSd } from '../util/stats';
import type { BatchTable, SummaryCell, SummaryRow, TrialRecord } from './types';

/**
 * Groups trial records by influencer count (ascending) and, inside a group,
 * by fraction. Mean and sample sd of the static and final illusion counts.
 */
export function summarizeBatch(records: readonly TrialRecord[], fractions: readonly number[]): BatchTable {
  const byCount = new Map<number, TrialRecord[]>();
  for (const r of records) {
    const group = byCount.get(r.influencerCount) ?? [];
    group.push(r);
    byCount.set(r.influencerCount, group);
  }

  const rows: SummaryRow[] = Array.from(byCount.keys())
    .sort((a, b) => a - b)
    .map(influencerCount => {
      const group = byCount.get(influencerCount) ?? [];
      const cells = fractions.map((fraction): SummaryCell | null => {
        const subset = group.filter(r => r.fraction === fraction);
        if (subset.length === 0) return null;
        return {
          fraction,
          samples: subset.length,
          static: meanSd(subset.map(r => r.staticIllusion)),
          final: meanSd(subset.map(r => r.finalIllusion)),
        };
      });
      return { influencerCount, cells };
    });

  return { fractions: fractions.slice(), rows };
}
