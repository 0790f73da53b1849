// lib/dynamics/rules.ts
import { PreconditionError } from '../errors';
import type { Graph, NodeId } from '../graph/types';
import { localMajority, redNeighbours } from '../illusion/detect';
import type { Labeling, Opinion } from '../illusion/types';

export type DiffusionKind = 'threshold' | 'majority-vote';

/**
 * One update policy. `next` reads only the frozen snapshot of the current
 * round; the simulator writes the result into a fresh labeling.
 */
export interface DiffusionRule {
  readonly kind: DiffusionKind;
  /** red never turns back to blue, so the red count cannot fall */
  readonly monotone: boolean;
  next(graph: Graph, current: Labeling, v: NodeId): Opinion;
}

export interface ThresholdOptions {
  /** adoption threshold on the red share of neighbours */
  phi?: number;
}

/** Blue adopts red once red neighbours exceed phi * degree. */
export function thresholdAdoption({ phi = 0.5 }: ThresholdOptions = {}): DiffusionRule {
  if (!Number.isFinite(phi) || phi < 0 || phi > 1) {
    throw new PreconditionError('invalid-parameter', `Adoption threshold must lie in [0, 1], got ${phi}`, { phi });
  }
  return {
    kind: 'threshold',
    monotone: true,
    next(graph, current, v) {
      if (current[v] === 'red') return 'red';
      const deg = graph.adjacency[v].length;
      if (deg === 0) return current[v];
      return redNeighbours(graph, current, v) > phi * deg ? 'red' : 'blue';
    },
  };
}

/** Every node takes its strict local majority; ties and isolated nodes stay put. */
export function majorityVote(): DiffusionRule {
  return {
    kind: 'majority-vote',
    monotone: false,
    next(graph, current, v) {
      return localMajority(graph, current, v) ?? current[v];
    },
  };
}

export function ruleFor(kind: DiffusionKind, phi?: number): DiffusionRule {
  switch (kind) {
    case 'threshold':
      return thresholdAdoption({ phi });
    case 'majority-vote':
      return majorityVote();
  }
}
