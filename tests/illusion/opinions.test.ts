import { describe, expect, it } from 'vitest';

import { createRng } from '@/lib/core/rng';
import { graphFromEdges, starGraph } from '@/lib/graph/graph';
import { generatePreferentialAttachment } from '@/lib/graph/preferentialAttachment';
import { countRed } from '@/lib/illusion/detect';
import { selectInfluencers } from '@/lib/illusion/influencers';
import { assignOpinions, influencerOpinions, labelingFromMinority } from '@/lib/illusion/opinions';

import { expectPrecondition } from '../helpers';

// node 0: degree 6, node 6: degree 4, everything else degree 1
const twoHubs = graphFromEdges(10, [
  [0, 1], [0, 2], [0, 3], [0, 4], [0, 5],
  [6, 7], [6, 8], [6, 9],
  [0, 6],
]);

describe('assignOpinions', () => {
  it('keeps the highest-degree influencers when there are too many', () => {
    const res = assignOpinions(twoHubs, new Set([1, 6, 0]), 0.2, createRng('t'));

    expect(res.targetCount).toBe(2);
    expect(res.seeded).toEqual([0, 6]);
    expect(res.fill).toEqual([]);
    expect(res.minority).toEqual([0, 6]);
    expect(res.labeling[1]).toBe('blue');
    expect(countRed(res.labeling)).toBe(2);
  });

  it('breaks degree ties by node id', () => {
    const res = assignOpinions(twoHubs, new Set([5, 3, 2]), 0.1, createRng('t'));
    expect(res.seeded).toEqual([2]);
  });

  it('fills a deficit from non-influencers without replacement', () => {
    const res = assignOpinions(twoHubs, new Set([0]), 0.5, createRng('fill'));

    expect(res.targetCount).toBe(5);
    expect(res.seeded).toEqual([0]);
    expect(res.fill).toHaveLength(4);
    expect(res.fill).not.toContain(0);
    expect(new Set(res.fill).size).toBe(4);
    expect(countRed(res.labeling)).toBe(5);
  });

  it('uses the influencer set as is when sizes match', () => {
    const res = assignOpinions(twoHubs, new Set([6, 0]), 0.2, createRng('t'));
    expect(res.seeded).toEqual([0, 6]);
    expect(res.fill).toEqual([]);
  });

  it('rounds the target', () => {
    const res = assignOpinions(twoHubs, new Set<number>(), 0.25, createRng('t'));
    expect(res.targetCount).toBe(3);
    expect(countRed(res.labeling)).toBe(3);
  });

  it('is reproducible for the same rng seed', () => {
    const a = assignOpinions(twoHubs, new Set([0]), 0.6, createRng(5));
    const b = assignOpinions(twoHubs, new Set([0]), 0.6, createRng(5));
    expect(a.labeling).toEqual(b.labeling);
  });

  it('hits round(fraction * n) red nodes on generated graphs', () => {
    const g = generatePreferentialAttachment({ n: 300, m: 2, seed: 21 });
    const influencers = selectInfluencers(g);
    for (const fraction of [0, 0.01, 0.1, 0.5, 1]) {
      const res = assignOpinions(g, influencers, fraction, createRng(`f${fraction}`));
      expect(countRed(res.labeling)).toBe(Math.round(fraction * 300));
      expect(res.labeling).toHaveLength(300);
    }
  });

  it('rejects fractions outside [0, 1]', () => {
    for (const fraction of [-0.1, 1.5, Number.NaN]) {
      expectPrecondition(() => assignOpinions(twoHubs, new Set<number>(), fraction, createRng('t')), 'fraction-out-of-range');
    }
  });
});

describe('assignOpinions influencer ids', () => {
  it('rejects an unknown influencer when filling a deficit', () => {
    expectPrecondition(() => assignOpinions(starGraph(4), new Set([9]), 0.4, createRng('t')), 'invalid-labeling');
  });

  it('rejects an unknown influencer when cutting a surplus', () => {
    expectPrecondition(() => assignOpinions(starGraph(4), new Set([0, 9]), 0.2, createRng('t')), 'invalid-labeling');
  });

  it('rejects negative and fractional ids', () => {
    expectPrecondition(() => assignOpinions(starGraph(4), new Set([-1]), 0.4, createRng('t')), 'invalid-labeling');
    expectPrecondition(() => assignOpinions(starGraph(4), new Set([1.5]), 0.4, createRng('t')), 'invalid-labeling');
  });
});

describe('influencerOpinions', () => {
  it('labels exactly the influencers red', () => {
    const res = influencerOpinions(twoHubs, new Set([6, 0]));
    expect(res.minority).toEqual([0, 6]);
    expect(res.targetCount).toBe(2);
    expect(countRed(res.labeling)).toBe(2);
  });
});

describe('labelingFromMinority', () => {
  it('rejects ids outside the graph', () => {
    expectPrecondition(() => labelingFromMinority(3, [3]), 'invalid-labeling');
  });
});
