// lib/illusion/influencers.ts
import { PreconditionError } from '../errors';
import type { Graph, NodeId } from '../graph/types';
import { log } from '../util/logger';
import type { DegreeThreshold } from './types';

const illusionLog = log.withScope('illusion');

export function degreeThreshold(graph: Graph): DegreeThreshold {
  if (graph.size === 0) {
    throw new PreconditionError('empty-graph', 'Mean degree is undefined on a graph with no nodes');
  }
  const meanDegree = (2 * graph.edgeCount) / graph.size;
  return { meanDegree, threshold: 2 * meanDegree };
}

/** Influencers: degree strictly above twice the mean degree. */
export function selectInfluencers(graph: Graph): ReadonlySet<NodeId> {
  const { meanDegree, threshold } = degreeThreshold(graph);
  const influencers = new Set<NodeId>();
  graph.adjacency.forEach((list, v) => {
    if (list.length > threshold) influencers.add(v);
  });
  illusionLog.debug('selected influencers', {
    meanDegree: Number(meanDegree.toFixed(3)),
    threshold: Number(threshold.toFixed(3)),
    count: influencers.size,
  });
  return influencers;
}
