// lib/illusion/opinions.ts
import type { Rng } from '../core/rng';
import { PreconditionError } from '../errors';
import type { Graph, NodeId } from '../graph/types';
import type { Opinion, OpinionAssignment } from './types';

export function assertFraction(fraction: number): void {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new PreconditionError('fraction-out-of-range', `Minority fraction must lie in [0, 1], got ${fraction}`, { fraction });
  }
}

/** Degree descending, node id ascending on ties. */
export function rankByDegree(graph: Graph, nodes: Iterable<NodeId>): NodeId[] {
  return Array.from(nodes).sort((a, b) => graph.adjacency[b].length - graph.adjacency[a].length || a - b);
}

/**
 * Forced-fraction labeling: exactly round(fraction * n) red nodes whatever the
 * number of influencers. Surplus influencers are cut by degree rank; a deficit
 * is filled from non-influencers drawn without replacement.
 */
export function assignOpinions(
  graph: Graph,
  influencers: ReadonlySet<NodeId>,
  fraction: number,
  rng: Rng
): OpinionAssignment {
  assertFraction(fraction);
  for (const v of influencers) {
    if (!Number.isInteger(v) || v < 0 || v >= graph.size) {
      throw new PreconditionError('invalid-labeling', `Influencer ${v} is outside 0..${graph.size - 1}`, { node: v });
    }
  }
  const targetCount = Math.round(fraction * graph.size);

  let seeded: NodeId[];
  let fill: NodeId[] = [];

  if (influencers.size > targetCount) {
    seeded = rankByDegree(graph, influencers).slice(0, targetCount);
  } else {
    seeded = Array.from(influencers).sort((a, b) => a - b);
    const deficit = targetCount - influencers.size;
    if (deficit > 0) {
      const rest: NodeId[] = [];
      for (let v = 0; v < graph.size; v++) if (!influencers.has(v)) rest.push(v);
      // Guard only: with validated ids and fraction the deficit never exceeds rest.length.
      if (deficit > rest.length) {
        throw new PreconditionError(
          'insufficient-population',
          `Need ${deficit} fill nodes but only ${rest.length} non-influencers exist`,
          { deficit, available: rest.length }
        );
      }
      fill = rng.sample(rest, deficit);
    }
  }

  const labeling: Opinion[] = new Array<Opinion>(graph.size).fill('blue');
  for (const v of seeded) labeling[v] = 'red';
  for (const v of fill) labeling[v] = 'red';

  const minority = [...seeded, ...fill].sort((a, b) => a - b);
  return { labeling: Object.freeze(labeling), targetCount, minority, seeded, fill };
}

/** Labeling from an explicit red set; for hand-built scenarios. */
export function labelingFromMinority(size: number, red: Iterable<NodeId>): Opinion[] {
  const labeling: Opinion[] = new Array<Opinion>(size).fill('blue');
  for (const v of red) {
    if (!Number.isInteger(v) || v < 0 || v >= size) {
      throw new PreconditionError('invalid-labeling', `Node ${v} is outside 0..${size - 1}`);
    }
    labeling[v] = 'red';
  }
  return labeling;
}

/** Only the influencers hold the minority opinion; no target fraction. */
export function influencerOpinions(graph: Graph, influencers: ReadonlySet<NodeId>): OpinionAssignment {
  const seeded = Array.from(influencers).sort((a, b) => a - b);
  const labeling = Object.freeze(labelingFromMinority(graph.size, seeded));
  return { labeling, targetCount: seeded.length, minority: seeded.slice(), seeded, fill: [] };
}
