import { HashMap, HashSet, type Eq, type Hash } from "@automata-diagrams/collections";

export type Direction = "outgoing" | "incoming";

/** A directed edge carrying a single weight. */
export interface GraphEdge<N, E> {
  readonly from: N;
  readonly to: N;
  readonly weight: E;
}

/**
 * A mutable directed graph keyed by node identity (Eq<N> + Hash<N>).
 * At most one edge exists per ordered `(from, to)` pair; adding it again
 * overwrites the weight.
 */
export class DirectedGraph<N, E> {
  private readonly _nodes: HashSet<N>;
  private readonly _outgoing: HashMap<N, HashMap<N, E>>;
  private readonly _incoming: HashMap<N, HashSet<N>>;
  private _edgeCount = 0;

  constructor(
    private readonly eq: Eq<N>,
    private readonly hash: Hash<N>
  ) {
    this._nodes = new HashSet(eq, hash);
    this._outgoing = new HashMap(eq, hash);
    this._incoming = new HashMap(eq, hash);
  }

  get nodeCount(): number {
    return this._nodes.size;
  }

  get edgeCount(): number {
    return this._edgeCount;
  }

  /** Add `node` if absent and return the canonical stored node. */
  addNode(node: N): N {
    const existing = this._nodes.get(node);
    if (existing !== undefined) return existing;
    this._nodes.add(node);
    this._outgoing.set(node, new HashMap(this.eq, this.hash));
    this._incoming.set(node, new HashSet(this.eq, this.hash));
    return node;
  }

  /**
   * Add an edge `from -> to`, creating missing endpoints. Returns the weight
   * the edge carried before, if it already existed.
   */
  addEdge(from: N, to: N, weight: E): E | undefined {
    const source = this.addNode(from);
    const target = this.addNode(to);
    const out = this._outgoing.getOrInsert(source, () => new HashMap(this.eq, this.hash));
    const previous = out.get(target);
    const existed = out.has(target);
    out.set(target, weight);
    this._incoming.getOrInsert(target, () => new HashSet(this.eq, this.hash)).add(source);
    if (!existed) this._edgeCount++;
    return previous;
  }

  containsNode(node: N): boolean {
    return this._nodes.has(node);
  }

  containsEdge(from: N, to: N): boolean {
    return this._outgoing.get(from)?.has(to) ?? false;
  }

  edgeWeight(from: N, to: N): E | undefined {
    return this._outgoing.get(from)?.get(to);
  }

  /** Neighbors of `node` in the given direction, in edge insertion order. */
  neighbors(node: N, direction: Direction = "outgoing"): N[] {
    if (direction === "outgoing") {
      const out = this._outgoing.get(node);
      return out ? [...out.keys()] : [];
    }
    return this._incoming.get(node)?.toArray() ?? [];
  }

  nodes(): N[] {
    return this._nodes.toArray();
  }

  edges(): GraphEdge<N, E>[] {
    const result: GraphEdge<N, E>[] = [];
    for (const [from, out] of this._outgoing) {
      for (const [to, weight] of out) result.push({ from, to, weight });
    }
    return result;
  }
}
