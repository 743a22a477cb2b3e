import { HashSet, type Keyed } from "@automata-diagrams/collections";
import { DirectedGraph } from "./graph.js";
import { directedGraphLike } from "./typeclass.js";
import { closureG, isProductiveG, successorsG } from "./algorithms.js";
import { Nfa } from "./labeled.js";
import {
  stateInstances,
  symbolInstances,
  transitionInstances,
  type InputSymbol,
  type State,
  type Transition,
} from "./state.js";

/**
 * An edge-list finite automaton: state, initial and final sets plus a
 * transition relation kept both as a flat set and as an adjacency graph.
 *
 * States and transitions are only ever added. Every state referenced by the
 * initial/final sets or by a transition is in the state set.
 */
export class FiniteAutomaton<S, T> {
  readonly stateKey: Keyed<State<S>>;
  readonly symbolKey: Keyed<InputSymbol<T>>;

  private readonly _states: HashSet<State<S>>;
  private readonly _initial: HashSet<State<S>>;
  private readonly _final: HashSet<State<S>>;
  private readonly _transitions: HashSet<Transition<S, T>>;
  private readonly _graph: DirectedGraph<State<S>, InputSymbol<T>>;
  private readonly _graphLike = directedGraphLike<State<S>, InputSymbol<T>>();

  constructor(states: Keyed<S>, symbols: Keyed<T>) {
    this.stateKey = stateInstances(states);
    this.symbolKey = symbolInstances(symbols);
    const K = this.stateKey;
    this._states = new HashSet(K, K);
    this._initial = new HashSet(K, K);
    this._final = new HashSet(K, K);
    const TK = transitionInstances(K, this.symbolKey);
    this._transitions = new HashSet(TK, TK);
    this._graph = new DirectedGraph(K, K);
  }

  /** Add a state and return the canonical stored handle. */
  addState(state: State<S>): State<S> {
    this._states.add(state);
    return this._graph.addNode(state);
  }

  /** Add an initial state; it also joins the state set. */
  addInitialState(state: State<S>): State<S> {
    this._initial.add(state);
    return this.addState(state);
  }

  /** Add a final state; it also joins the state set. */
  addFinalState(state: State<S>): State<S> {
    this._final.add(state);
    return this.addState(state);
  }

  /**
   * Add a transition. The graph keeps one symbol per (source, destination)
   * pair: a second transition between the same states overwrites the edge
   * label, and the previous symbol is returned.
   */
  addTransition(t: Transition<S, T>): InputSymbol<T> | undefined {
    this._transitions.add(t);
    this.addState(t.source);
    this.addState(t.destination);
    return this._graph.addEdge(t.source, t.destination, t.symbol);
  }

  /**
   * States discovered by following at least one outgoing edge from `state`.
   * `state` itself is part of the result only if a cycle returns to it.
   */
  reachable(state: State<S>): HashSet<State<S>> {
    return successorsG(this._graph, state, this._graphLike, this.stateKey, this.stateKey);
  }

  /**
   * True iff some final state is in `reachable(state)`. A final state with no
   * path back to itself is therefore not productive.
   */
  isProductive(state: State<S>): boolean {
    return isProductiveG(
      this._graph,
      state,
      this._final,
      this._graphLike,
      this.stateKey,
      this.stateKey
    );
  }

  /** Initial states together with everything reachable from them. */
  accessibleStates(): HashSet<State<S>> {
    const result = new HashSet(this.stateKey, this.stateKey);
    for (const initial of this._initial) {
      for (const s of closureG(this._graph, initial, this._graphLike, this.stateKey, this.stateKey)) {
        result.add(s);
      }
    }
    return result;
  }

  /** States for which `isProductive` holds, in state insertion order. */
  productiveStates(): HashSet<State<S>> {
    return new HashSet(
      this.stateKey,
      this.stateKey,
      this._states.toArray().filter((s) => this.isProductive(s))
    );
  }

  isInitial(state: State<S>): boolean {
    return this._initial.has(state);
  }

  isFinal(state: State<S>): boolean {
    return this._final.has(state);
  }

  get states(): ReadonlyArray<State<S>> {
    return this._states.toArray();
  }

  get initialStates(): ReadonlyArray<State<S>> {
    return this._initial.toArray();
  }

  get finalStates(): ReadonlyArray<State<S>> {
    return this._final.toArray();
  }

  get transitions(): ReadonlyArray<Transition<S, T>> {
    return this._transitions.toArray();
  }

  get graph(): DirectedGraph<State<S>, InputSymbol<T>> {
    return this._graph;
  }

  /**
   * The labeled export form. Initial and final states carry no labels; every
   * stored transition becomes one relation entry, including transitions that
   * share a (source, destination) pair in the graph.
   */
  toNfa(): Nfa<State<S>, InputSymbol<T>> {
    const nfa = new Nfa(this.stateKey, this.symbolKey);
    for (const s of this._initial) nfa.addInitialState(s);
    for (const s of this._final) nfa.addFinalState(s);
    for (const t of this._transitions) nfa.addTransition(t.source, t.symbol, t.destination);
    return nfa;
  }
}
