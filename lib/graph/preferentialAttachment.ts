// lib/graph/preferentialAttachment.ts
import { createRng } from '../core/rng';
import { PreconditionError } from '../errors';
import { log } from '../util/logger';
import { GraphBuilder } from './graph';
import type { AttachmentParams, Graph, NodeId } from './types';

const graphLog = log.withScope('graph');

/**
 * Scale-free graph by preferential attachment.
 *
 * Starts from a clique on nodes 0..m-1. Node m links to every core node; each
 * later node links to m distinct existing nodes, drawn with probability
 * proportional to their current degree. Edge count is m(m-1)/2 + (n-m)m and
 * every node ends with degree >= m.
 */
export function generatePreferentialAttachment({ n, m, seed }: AttachmentParams): Graph {
  if (!Number.isInteger(n) || !Number.isInteger(m) || m < 1 || m >= n) {
    throw new PreconditionError('invalid-attachment', `Preferential attachment needs integers n > m >= 1 (n=${n}, m=${m})`, { n, m });
  }

  const rng = createRng(seed);
  const builder = new GraphBuilder(n);

  // Every edge endpoint appears once here, so a uniform pick is degree-proportional.
  const repeated: NodeId[] = [];
  const link = (u: NodeId, v: NodeId) => {
    builder.addEdge(u, v);
    repeated.push(u, v);
  };

  for (let i = 0; i < m; i++) {
    for (let j = i + 1; j < m; j++) link(i, j);
  }

  for (let v = m; v < n; v++) {
    const targets = new Set<NodeId>();
    if (v === m) {
      // m = 1 leaves the core without edges; the first newcomer takes the whole core.
      for (let c = 0; c < m; c++) targets.add(c);
    } else {
      while (targets.size < m) {
        targets.add(repeated[rng.int(repeated.length)]);
      }
    }
    // Set order is draw order, which keeps the adjacency layout reproducible.
    for (const t of targets) link(v, t);
  }

  const graph = builder.freeze();
  graphLog.debug('generated preferential-attachment graph', { n, m, edges: graph.edgeCount });
  return graph;
}
