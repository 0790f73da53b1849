// lib/graph/types.ts

/** Node ids are the dense integers 0..size-1. */
export type NodeId = number;

export type Edge = readonly [NodeId, NodeId];

/**
 * Undirected simple graph. Adjacency lists are frozen once built;
 * the graph never changes within a trial.
 */
export interface Graph {
  readonly size: number;
  readonly edgeCount: number;
  readonly adjacency: ReadonlyArray<ReadonlyArray<NodeId>>;
}

export interface AttachmentParams {
  /** total node count */
  n: number;
  /** edges per new node, also the size of the seed clique */
  m: number;
  seed: number | string;
}
