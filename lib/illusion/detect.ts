// lib/illusion/detect.ts
import { PreconditionError } from '../errors';
import type { Graph, NodeId } from '../graph/types';
import type { IllusionResult, Labeling, Opinion } from './types';

export function assertLabeling(graph: Graph, labeling: Labeling): void {
  if (labeling.length !== graph.size) {
    throw new PreconditionError(
      'invalid-labeling',
      `Labeling covers ${labeling.length} nodes, graph has ${graph.size}`,
      { labeling: labeling.length, graph: graph.size }
    );
  }
}

export function countRed(labeling: Labeling): number {
  let red = 0;
  for (const op of labeling) if (op === 'red') red++;
  return red;
}

/** Red neighbours of v under the given labeling. */
export function redNeighbours(graph: Graph, labeling: Labeling, v: NodeId): number {
  let red = 0;
  for (const u of graph.adjacency[v]) if (labeling[u] === 'red') red++;
  return red;
}

/**
 * Strict local majority among v's neighbours; null when v is isolated or its
 * neighbourhood is split evenly.
 */
export function localMajority(graph: Graph, labeling: Labeling, v: NodeId): Opinion | null {
  const deg = graph.adjacency[v].length;
  if (deg === 0) return null;
  const red = redNeighbours(graph, labeling, v);
  const blue = deg - red;
  if (red === blue) return null;
  return red > blue ? 'red' : 'blue';
}

/**
 * Majority illusion: nodes whose neighbourhood majority differs from the
 * whole-graph majority. A red/blue count tie resolves the global majority to
 * blue and sets `globalTie`. Linear in V + E.
 */
export function detectIllusion(graph: Graph, labeling: Labeling): IllusionResult {
  assertLabeling(graph, labeling);

  const redCount = countRed(labeling);
  const blueCount = labeling.length - redCount;
  const globalMajority: Opinion = redCount > blueCount ? 'red' : 'blue';

  const illusioned: NodeId[] = [];
  for (let v = 0; v < graph.size; v++) {
    const local = localMajority(graph, labeling, v);
    if (local !== null && local !== globalMajority) illusioned.push(v);
  }

  return {
    globalMajority,
    globalTie: redCount === blueCount,
    redCount,
    blueCount,
    illusioned,
  };
}
