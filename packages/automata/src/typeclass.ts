/**
 * GraphLike Typeclass
 *
 * Abstracts graph structure so traversal algorithms work on any graph-like
 * type. Node identity comes from Eq<N> + Hash<N> constraints on the
 * algorithms, NOT from the typeclass itself.
 */

import type { DirectedGraph, GraphEdge } from "./graph.js";

/**
 * @typeParam G - The graph type
 * @typeParam N - The node type
 * @typeParam E - The edge type
 */
export interface GraphLike<G, N, E> {
  nodes(g: G): Iterable<N>;
  edges(g: G): Iterable<E>;

  /** Outgoing neighbors. */
  successors(g: G, node: N): Iterable<N>;

  /** Incoming neighbors. */
  predecessors(g: G, node: N): Iterable<N>;

  edgeSource(e: E): N;
  edgeTarget(e: E): N;
}

/** GraphLike instance for `DirectedGraph<N, W>`. */
export function directedGraphLike<N, W>(): GraphLike<DirectedGraph<N, W>, N, GraphEdge<N, W>> {
  return {
    nodes: (g) => g.nodes(),
    edges: (g) => g.edges(),
    successors: (g, node) => g.neighbors(node, "outgoing"),
    predecessors: (g, node) => g.neighbors(node, "incoming"),
    edgeSource: (e) => e.from,
    edgeTarget: (e) => e.to,
  };
}
