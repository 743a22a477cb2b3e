import {
  combineHashes,
  keyed,
  keyedBy,
  makeEq,
  ordBy,
  type Keyed,
  type Ord,
} from "@automata-diagrams/collections";

/** An automaton state wrapping a caller-supplied identifier. */
export interface State<T> {
  readonly kind: "state";
  readonly value: T;
}

/**
 * An automaton transition symbol. Named `InputSymbol` so it does not shadow
 * the global `Symbol`.
 */
export interface InputSymbol<T> {
  readonly kind: "symbol";
  readonly value: T;
}

/** A transition from `source` to `destination` through `symbol`. */
export interface Transition<S, T> {
  readonly source: State<S>;
  readonly destination: State<S>;
  readonly symbol: InputSymbol<T>;
}

export function state<T>(value: T): State<T> {
  return { kind: "state", value };
}

export function inputSymbol<T>(value: T): InputSymbol<T> {
  return { kind: "symbol", value };
}

export function transition<S, T>(
  source: State<S>,
  destination: State<S>,
  symbol: InputSymbol<T>
): Transition<S, T> {
  return { source, destination, symbol };
}

/** Eq/Hash/Show for `State<T>`, delegating to the wrapped value. */
export function stateInstances<T>(K: Keyed<T>): Keyed<State<T>> {
  return keyedBy((s: State<T>) => s.value, K);
}

/** Eq/Hash/Show for `InputSymbol<T>`, delegating to the wrapped value. */
export function symbolInstances<T>(K: Keyed<T>): Keyed<InputSymbol<T>> {
  return keyedBy((s: InputSymbol<T>) => s.value, K);
}

export function stateOrd<T>(O: Ord<T>): Ord<State<T>> {
  return ordBy((s: State<T>) => s.value, O);
}

export function symbolOrd<T>(O: Ord<T>): Ord<InputSymbol<T>> {
  return ordBy((s: InputSymbol<T>) => s.value, O);
}

/** Transitions are identified by all three components. */
export function transitionInstances<S, T>(
  states: Keyed<State<S>>,
  symbols: Keyed<InputSymbol<T>>
): Keyed<Transition<S, T>> {
  return keyed<Transition<S, T>>(
    makeEq(
      (a, b) =>
        states.equals(a.source, b.source) &&
        states.equals(a.destination, b.destination) &&
        symbols.equals(a.symbol, b.symbol)
    ),
    {
      hash: (t) =>
        combineHashes([states.hash(t.source), states.hash(t.destination), symbols.hash(t.symbol)]),
    },
    {
      show: (t) =>
        `${states.show(t.source)} -${symbols.show(t.symbol)}-> ${states.show(t.destination)}`,
    }
  );
}
