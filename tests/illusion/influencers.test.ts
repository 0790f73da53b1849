import { describe, expect, it } from 'vitest';

import { cycleGraph, graphFromEdges, starGraph } from '@/lib/graph/graph';
import { generatePreferentialAttachment } from '@/lib/graph/preferentialAttachment';
import { degreeThreshold, selectInfluencers } from '@/lib/illusion/influencers';

import { expectPrecondition } from '../helpers';

describe('selectInfluencers', () => {
  it('flags the centre of a star', () => {
    const g = starGraph(4);
    expect(degreeThreshold(g)).toEqual({ meanDegree: 1.6, threshold: 3.2 });
    expect([...selectInfluencers(g)]).toEqual([0]);
  });

  it('counts isolated nodes in the mean degree', () => {
    const g = graphFromEdges(10, [[0, 1], [0, 2], [0, 3], [0, 4]]);
    expect(degreeThreshold(g).threshold).toBeCloseTo(1.6, 12);
    expect([...selectInfluencers(g)]).toEqual([0]);
  });

  it('finds none on a regular graph', () => {
    expect(selectInfluencers(cycleGraph(6)).size).toBe(0);
  });

  it('uses a strict inequality', () => {
    // mean 1.5, threshold 3: the hub has degree exactly 3
    const g = graphFromEdges(4, [[0, 1], [0, 2], [0, 3]]);
    expect(degreeThreshold(g).threshold).toBe(3);
    expect(selectInfluencers(g).size).toBe(0);
  });

  it('only returns nodes above twice the mean on a scale-free graph', () => {
    const g = generatePreferentialAttachment({ n: 300, m: 2, seed: 11 });
    const { threshold } = degreeThreshold(g);
    const influencers = selectInfluencers(g);
    g.adjacency.forEach((list, v) => {
      expect(influencers.has(v)).toBe(list.length > threshold);
    });
  });

  it('fails fast on an empty graph', () => {
    expectPrecondition(() => selectInfluencers(graphFromEdges(0, [])), 'empty-graph');
  });
});
