/**
 * Reachability algorithms parameterized over GraphLike<G, N, E>.
 *
 * All algorithms take Eq<N> + Hash<N> for node identity tracking.
 */

import { HashSet, type Eq, type Hash } from "@automata-diagrams/collections";
import type { GraphLike } from "./typeclass.js";

// ============================================================================
// Successors (BFS)
// ============================================================================

/**
 * Every node discovered by following at least one outgoing edge from
 * `start`, in breadth-first discovery order. `start` itself is included only
 * when some cycle leads back to it.
 */
export function successorsG<G, N, E>(
  g: G,
  start: N,
  GL: GraphLike<G, N, E>,
  eq: Eq<N>,
  hash: Hash<N>
): HashSet<N> {
  const discovered = new HashSet<N>(eq, hash);
  const queue: N[] = [start];

  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    for (const neighbor of GL.successors(g, node)) {
      if (discovered.insert(neighbor)) queue.push(neighbor);
    }
  }
  return discovered;
}

/** `start` plus everything `successorsG` discovers from it. */
export function closureG<G, N, E>(
  g: G,
  start: N,
  GL: GraphLike<G, N, E>,
  eq: Eq<N>,
  hash: Hash<N>
): HashSet<N> {
  const result = new HashSet<N>(eq, hash, [start]);
  for (const n of successorsG(g, start, GL, eq, hash)) result.add(n);
  return result;
}

// ============================================================================
// Productivity
// ============================================================================

/**
 * True iff some node of `targets` is among the successors of `start`.
 * A target with no path back to itself does not count for itself.
 */
export function isProductiveG<G, N, E>(
  g: G,
  start: N,
  targets: HashSet<N>,
  GL: GraphLike<G, N, E>,
  eq: Eq<N>,
  hash: Hash<N>
): boolean {
  return successorsG(g, start, GL, eq, hash).intersection(targets).size > 0;
}
