// lib/illusion/types.ts
import type { NodeId } from '../graph/types';

/**
 * Binary opinion. `red` is the seeded minority opinion, `blue` the opinion the
 * bulk of the network starts with.
 */
export type Opinion = 'red' | 'blue';

/** Indexed by node id, so every node always carries a label. */
export type Labeling = ReadonlyArray<Opinion>;

export interface DegreeThreshold {
  meanDegree: number;
  threshold: number;
}

export interface OpinionAssignment {
  labeling: Labeling;
  targetCount: number;
  /** all red nodes, ascending */
  minority: NodeId[];
  /** influencers that kept the minority opinion */
  seeded: NodeId[];
  /** non-influencers drawn at random to reach the target */
  fill: NodeId[];
}

export interface IllusionResult {
  globalMajority: Opinion;
  /** red and blue counts were equal; globalMajority fell back to blue */
  globalTie: boolean;
  redCount: number;
  blueCount: number;
  /** nodes whose local majority disagrees with globalMajority, ascending */
  illusioned: NodeId[];
}
