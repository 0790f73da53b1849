// lib/graph/graph.ts
import { PreconditionError } from '../errors';
import type { Edge, Graph, NodeId } from './types';

/**
 * Mutable adjacency used while a graph grows. `freeze()` hands out the
 * read-only Graph and the builder must not be used afterwards.
 */
export class GraphBuilder {
  private readonly sets: Set<NodeId>[];
  private edges = 0;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 0) {
      throw new PreconditionError('invalid-graph', `Graph size must be a non-negative integer, got ${size}`);
    }
    this.sets = Array.from({ length: size }, () => new Set<NodeId>());
  }

  hasEdge(a: NodeId, b: NodeId): boolean {
    return this.sets[a]?.has(b) ?? false;
  }

  degree(v: NodeId): number {
    return this.sets[v].size;
  }

  addEdge(a: NodeId, b: NodeId): void {
    if (!this.inRange(a) || !this.inRange(b)) {
      throw new PreconditionError('invalid-graph', `Edge ${a}-${b} references a node outside 0..${this.size - 1}`);
    }
    if (a === b) {
      throw new PreconditionError('invalid-graph', `Self-loop on node ${a}`);
    }
    if (this.sets[a].has(b)) {
      throw new PreconditionError('invalid-graph', `Duplicate edge ${a}-${b}`);
    }
    this.sets[a].add(b);
    this.sets[b].add(a);
    this.edges++;
  }

  freeze(): Graph {
    const adjacency = this.sets.map(s => Object.freeze(Array.from(s)));
    return Object.freeze({
      size: this.size,
      edgeCount: this.edges,
      adjacency: Object.freeze(adjacency),
    });
  }

  private inRange(v: NodeId): boolean {
    return Number.isInteger(v) && v >= 0 && v < this.size;
  }
}

export function graphFromEdges(size: number, edges: readonly Edge[]): Graph {
  const b = new GraphBuilder(size);
  for (const [u, v] of edges) b.addEdge(u, v);
  return b.freeze();
}

export function neighbors(graph: Graph, v: NodeId): ReadonlyArray<NodeId> {
  return graph.adjacency[v] ?? [];
}

export function degreeOf(graph: Graph, v: NodeId): number {
  return neighbors(graph, v).length;
}

export function degrees(graph: Graph): number[] {
  return graph.adjacency.map(list => list.length);
}

/** Each undirected edge once, as [lower, higher]. */
export function edgeList(graph: Graph): Edge[] {
  const out: Edge[] = [];
  graph.adjacency.forEach((list, u) => {
    for (const v of list) if (u < v) out.push([u, v]);
  });
  return out;
}

export function isConnected(graph: Graph): boolean {
  if (graph.size === 0) return true;
  const seen = new Uint8Array(graph.size);
  const stack: NodeId[] = [0];
  seen[0] = 1;
  let visited = 1;
  while (stack.length) {
    const u = stack.pop();
    if (u === undefined) break;
    for (const v of graph.adjacency[u]) {
      if (!seen[v]) {
        seen[v] = 1;
        visited++;
        stack.push(v);
      }
    }
  }
  return visited === graph.size;
}

// Test fixtures and small scenarios.
export function starGraph(leaves: number): Graph {
  return graphFromEdges(leaves + 1, Array.from({ length: leaves }, (_, i): Edge => [0, i + 1]));
}

export function cycleGraph(size: number): Graph {
  return graphFromEdges(size, Array.from({ length: size }, (_, i): Edge => [i, (i + 1) % size]));
}
