import { describe, expect, it } from 'vitest';

import { cycleGraph, degreeOf, edgeList, graphFromEdges, isConnected, neighbors, starGraph } from '@/lib/graph/graph';

describe('graph construction', () => {
  it('builds a star with the centre at node 0', () => {
    const g = starGraph(4);
    expect(g.size).toBe(5);
    expect(g.edgeCount).toBe(4);
    expect(neighbors(g, 0)).toEqual([1, 2, 3, 4]);
    expect(degreeOf(g, 3)).toBe(1);
  });

  it('lists every edge once with the lower id first', () => {
    expect(edgeList(cycleGraph(4))).toEqual([
      [0, 1],
      [0, 3],
      [1, 2],
      [2, 3],
    ]);
  });

  it('freezes adjacency', () => {
    const g = cycleGraph(5);
    expect(Object.isFrozen(g.adjacency)).toBe(true);
    expect(Object.isFrozen(g.adjacency[0])).toBe(true);
  });

  it('rejects self-loops, duplicates and unknown nodes', () => {
    expect(() => graphFromEdges(3, [[1, 1]])).toThrow(/Self-loop/);
    expect(() => graphFromEdges(3, [[0, 1], [1, 0]])).toThrow(/Duplicate edge/);
    expect(() => graphFromEdges(3, [[0, 3]])).toThrow(/outside 0\.\.2/);
  });

  it('reports connectivity', () => {
    expect(isConnected(graphFromEdges(3, [[0, 1]]))).toBe(false);
    expect(isConnected(graphFromEdges(3, [[0, 1], [1, 2]]))).toBe(true);
    expect(isConnected(graphFromEdges(0, []))).toBe(true);
  });
});
