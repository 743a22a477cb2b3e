/**
 * Intermediate Automaton
 *
 * The export-ready model for automata derived from state-transition
 * declarations that may branch. Transitions are keyed by an optional source
 * state (absent = the initial pseudo-state) and the transition symbol, and
 * lead to either a single state or a decision between several states.
 *
 * @example
 * ```typescript
 * const automaton = new IntermediateAutomaton(stringKey, stringKey);
 * automaton.addState("Open");
 * automaton.addChoice("Checking");
 * automaton.addTransition(undefined, "connect", stateNode("Open"));
 * automaton.addTransition("Open", "check", stateNode("Checking"));
 * automaton.addTransition("Checking", "verify", decision([branch("Open"), branch(undefined, "closed")]));
 * ```
 */

import { HashMap, HashSet, keyedBy, optional, type Keyed } from "@automata-diagrams/collections";
import { createLogger } from "./logger.js";

const log = createLogger("intermediate");

// ============================================================================
// Destination nodes
// ============================================================================

export interface Metadata {
  /**
   * Display override. On a direct destination it renames the drawn target
   * node; on a decision branch it becomes the branch edge's text.
   */
  readonly transitionLabel?: string;
}

/** A destination state; `state === undefined` is the terminal pseudo-state. */
export interface StateNode<S> {
  readonly state: S | undefined;
  readonly metadata: Metadata;
}

export type Node<S> =
  | { readonly kind: "state"; readonly node: StateNode<S> }
  | { readonly kind: "decision"; readonly branches: ReadonlyArray<StateNode<S>> };

function metadata(transitionLabel: string | undefined): Metadata {
  return transitionLabel === undefined ? {} : { transitionLabel };
}

/** A decision branch (or the inner part of a direct destination). */
export function branch<S>(state: S | undefined, transitionLabel?: string): StateNode<S> {
  return { state, metadata: metadata(transitionLabel) };
}

/** A direct destination, optionally drawn under another name. */
export function stateNode<S>(state: S, transitionLabel?: string): Node<S> {
  return { kind: "state", node: branch(state, transitionLabel) };
}

/** A direct transition into the terminal pseudo-state. */
export function finalNode<S>(): Node<S> {
  return { kind: "state", node: branch<S>(undefined) };
}

/** A branch point reached without consuming further input. */
export function decision<S>(branches: ReadonlyArray<StateNode<S>>): Node<S> {
  return { kind: "decision", branches: [...branches] };
}

function isBranchList<S>(value: S | undefined | ReadonlyArray<S | undefined>): value is ReadonlyArray<S | undefined> {
  return Array.isArray(value);
}

/**
 * Build a node from plain states: a state (or `undefined`, the terminal
 * pseudo-state) becomes a direct destination, a list becomes a decision
 * with one unlabeled branch per entry. Use `decision` with `branch` for
 * labeled branches. An array is always read as a list, so array-valued
 * states go through `stateNode` instead.
 */
export function toNode<S>(value: S | undefined | ReadonlyArray<S | undefined>): Node<S> {
  if (isBranchList(value)) {
    return decision(value.map((v) => branch(v)));
  }
  return { kind: "state", node: branch(value) };
}

// ============================================================================
// Transitions
// ============================================================================

/** A transition symbol. Identity is the symbol alone. */
export interface Transition<T> {
  readonly transition: T;
}

export function intermediateTransition<T>(transition: T): Transition<T> {
  return { transition };
}

// ============================================================================
// Automaton
// ============================================================================

export type IntermediateEntry<S, T> = readonly [
  source: S | undefined,
  transition: Transition<T>,
  destination: Node<S>,
];

export class IntermediateAutomaton<S, T> {
  readonly kind = "intermediate";
  readonly sourceKey: Keyed<S | undefined>;
  readonly transitionKey: Keyed<Transition<T>>;

  private readonly _states: HashSet<S>;
  private readonly _choices: HashSet<S>;
  private readonly _delta: HashMap<S | undefined, HashMap<Transition<T>, Node<S>>>;

  constructor(
    readonly stateKey: Keyed<S>,
    readonly symbolKey: Keyed<T>
  ) {
    this.sourceKey = optional(stateKey);
    this.transitionKey = keyedBy((t: Transition<T>) => t.transition, symbolKey);
    this._states = new HashSet(stateKey, stateKey);
    this._choices = new HashSet(stateKey, stateKey);
    this._delta = new HashMap(this.sourceKey, this.sourceKey);
  }

  /** Returns whether the state was newly added. */
  addState(state: S): boolean {
    return this._states.insert(state);
  }

  /** Mark a state as a choice (decision) point. Returns whether it was newly added. */
  addChoice(choice: S): boolean {
    return this._choices.insert(choice);
  }

  /**
   * Set the destination of `(source, transition)`. A second destination for
   * the same key replaces the first.
   */
  addTransition(source: S | undefined, transition: T, destination: Node<S>): void {
    const t = intermediateTransition(transition);
    const transitions = this._delta.getOrInsert(
      source,
      () => new HashMap(this.transitionKey, this.transitionKey)
    );
    if (transitions.has(t)) {
      log.debug(
        `replacing destination of ${this.sourceKey.show(source) || "[initial]"} on ${this.transitionKey.show(t)}`
      );
    }
    transitions.set(t, destination);
  }

  destination(source: S | undefined, transition: T): Node<S> | undefined {
    return this._delta.get(source)?.get(intermediateTransition(transition));
  }

  isChoice(state: S): boolean {
    return this._choices.has(state);
  }

  get states(): ReadonlyArray<S> {
    return this._states.toArray();
  }

  get choices(): ReadonlyArray<S> {
    return this._choices.toArray();
  }

  /** Every (source, transition, destination) triple, sources and symbols in insertion order. */
  *entries(): IterableIterator<IntermediateEntry<S, T>> {
    for (const [source, transitions] of this._delta) {
      for (const [transition, destination] of transitions) {
        yield [source, transition, destination];
      }
    }
  }

}
