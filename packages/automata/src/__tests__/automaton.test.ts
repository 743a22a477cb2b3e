import { describe, it, expect } from "vitest";
import { stringKey, type HashSet } from "@automata-diagrams/collections";
import {
  FiniteAutomaton,
  inputSymbol,
  state,
  stateInstances,
  symbolInstances,
  transition,
  transitionInstances,
  type State,
} from "../index.js";

const A = state("A");
const B = state("B");
const C = state("C");
const x = inputSymbol("x");
const y = inputSymbol("y");

function values(states: HashSet<State<string>> | ReadonlyArray<State<string>>): string[] {
  return [...states].map((s) => s.value);
}

/** A -x-> B -y-> C, A initial, C final. */
function chain(): FiniteAutomaton<string, string> {
  const fa = new FiniteAutomaton(stringKey, stringKey);
  fa.addInitialState(A);
  fa.addFinalState(C);
  fa.addTransition(transition(A, B, x));
  fa.addTransition(transition(B, C, y));
  return fa;
}

describe("primitives", () => {
  it("compares states and symbols by value", () => {
    const K = stateInstances(stringKey);
    expect(K.equals(state("A"), A)).toBe(true);
    expect(K.equals(A, B)).toBe(false);
    expect(K.hash(state("A"))).toBe(K.hash(A));
    expect(K.show(A)).toBe("A");
    expect(symbolInstances(stringKey).show(x)).toBe("x");
  });

  it("identifies transitions by all three components", () => {
    const T = transitionInstances(stateInstances(stringKey), symbolInstances(stringKey));
    expect(T.equals(transition(A, B, x), transition(state("A"), state("B"), inputSymbol("x")))).toBe(
      true
    );
    expect(T.equals(transition(A, B, x), transition(A, B, y))).toBe(false);
    expect(T.equals(transition(A, B, x), transition(B, A, x))).toBe(false);
    expect(T.show(transition(A, B, x))).toBe("A -x-> B");
  });
});

describe("FiniteAutomaton", () => {
  describe("construction", () => {
    it("collects states from initial, final and transition registrations", () => {
      const fa = chain();
      expect(values(fa.states)).toEqual(["A", "C", "B"]);
      expect(values(fa.initialStates)).toEqual(["A"]);
      expect(values(fa.finalStates)).toEqual(["C"]);
      expect(fa.isInitial(A)).toBe(true);
      expect(fa.isFinal(C)).toBe(true);
      expect(fa.isFinal(B)).toBe(false);
    });

    it("addState returns the stored handle", () => {
      const fa = new FiniteAutomaton(stringKey, stringKey);
      expect(fa.addState(A)).toBe(A);
      expect(fa.addState(state("A"))).toBe(A);
      expect(fa.states).toHaveLength(1);
    });

    it("stores a repeated transition once", () => {
      const fa = chain();
      fa.addTransition(transition(state("A"), state("B"), inputSymbol("x")));
      expect(fa.transitions).toHaveLength(2);
    });

    it("keeps one graph edge per state pair and returns the replaced symbol", () => {
      const fa = new FiniteAutomaton(stringKey, stringKey);
      expect(fa.addTransition(transition(A, B, x))).toBeUndefined();
      expect(fa.addTransition(transition(A, B, y))).toEqual(x);
      expect(fa.transitions).toHaveLength(2);
      expect(fa.graph.edgeCount).toBe(1);
      expect(fa.graph.edgeWeight(A, B)).toEqual(y);
    });
  });

  describe("reachable", () => {
    it("follows at least one edge", () => {
      const fa = chain();
      expect(values(fa.reachable(A))).toEqual(["B", "C"]);
      expect(values(fa.reachable(B))).toEqual(["C"]);
      expect(values(fa.reachable(C))).toEqual([]);
    });

    it("includes the start state on a cycle", () => {
      const fa = chain();
      fa.addTransition(transition(C, A, x));
      expect(values(fa.reachable(A))).toEqual(["B", "C", "A"]);
    });
  });

  describe("isProductive", () => {
    it("is true for states that lead to a final state", () => {
      const fa = chain();
      expect(fa.isProductive(A)).toBe(true);
      expect(fa.isProductive(B)).toBe(true);
    });

    it("is false for a final state with no outgoing edges", () => {
      expect(chain().isProductive(C)).toBe(false);
    });

    it("is true for a final state with a self-loop", () => {
      const fa = chain();
      fa.addTransition(transition(C, C, y));
      expect(fa.isProductive(C)).toBe(true);
    });

    it("is false for a state whose successors are all dead ends", () => {
      const fa = chain();
      const D = state("D");
      const E = state("E");
      fa.addTransition(transition(D, E, x));
      expect(fa.isProductive(D)).toBe(false);
    });
  });

  describe("derived sets", () => {
    it("computes accessible states from the initial states", () => {
      const fa = chain();
      fa.addTransition(transition(state("D"), C, x));
      expect(values(fa.accessibleStates())).toEqual(["A", "B", "C"]);
    });

    it("computes productive states in state order", () => {
      const fa = chain();
      fa.addTransition(transition(state("D"), C, x));
      expect(values(fa.productiveStates())).toEqual(["A", "B", "D"]);
    });
  });

  describe("toNfa", () => {
    it("registers unlabeled initial and final states", () => {
      const nfa = chain().toNfa();
      expect([...nfa.initialStates.keys()].map((s) => s.value)).toEqual(["A"]);
      expect(nfa.initialStates.get(A)?.size).toBe(0);
      expect([...nfa.finalStates.keys()].map((s) => s.value)).toEqual(["C"]);
    });

    it("keeps every transition, including ones sharing a state pair", () => {
      const fa = chain();
      fa.addTransition(transition(A, B, y));
      const fromA = fa.toNfa().delta.get(A);
      expect(fromA && [...fromA.keys()].map((s) => s.value)).toEqual(["x", "y"]);
      expect(fromA?.get(y)?.toArray()).toEqual([B]);
    });
  });
});
