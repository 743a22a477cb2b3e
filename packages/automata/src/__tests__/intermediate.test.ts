import { describe, it, expect } from "vitest";
import { keyedBy, stringKey } from "@automata-diagrams/collections";
import {
  IntermediateAutomaton,
  branch,
  decision,
  finalNode,
  stateNode,
  toNode,
} from "../index.js";

function mkAutomaton(): IntermediateAutomaton<string, string> {
  return new IntermediateAutomaton(stringKey, stringKey);
}

describe("node constructors", () => {
  it("builds direct destinations", () => {
    expect(stateNode("A")).toEqual({ kind: "state", node: { state: "A", metadata: {} } });
    expect(stateNode("A", "Init")).toEqual({
      kind: "state",
      node: { state: "A", metadata: { transitionLabel: "Init" } },
    });
    expect(finalNode()).toEqual({ kind: "state", node: { state: undefined, metadata: {} } });
  });

  it("builds decisions with branches in order", () => {
    expect(decision([branch("T"), branch(undefined, "timeout")])).toEqual({
      kind: "decision",
      branches: [
        { state: "T", metadata: {} },
        { state: undefined, metadata: { transitionLabel: "timeout" } },
      ],
    });
  });

  it("converts plain values with toNode", () => {
    expect(toNode("A")).toEqual(stateNode("A"));
    expect(toNode<string>(undefined)).toEqual(finalNode());
    expect(toNode<string>(["A", undefined])).toEqual(decision([branch("A"), branch(undefined)]));
  });

  it("reads an object state as a direct destination", () => {
    const node = toNode({ state: "A", metadata: {} });
    expect(node).toEqual({ kind: "state", node: { state: { state: "A", metadata: {} }, metadata: {} } });
  });
});

describe("IntermediateAutomaton", () => {
  it("reports whether states and choices are new", () => {
    const ia = mkAutomaton();
    expect(ia.addState("A")).toBe(true);
    expect(ia.addState("A")).toBe(false);
    expect(ia.addChoice("C")).toBe(true);
    expect(ia.addChoice("C")).toBe(false);
    expect(ia.states).toEqual(["A"]);
    expect(ia.choices).toEqual(["C"]);
    expect(ia.isChoice("C")).toBe(true);
    expect(ia.isChoice("A")).toBe(false);
  });

  it("looks up destinations by symbol", () => {
    const ia = mkAutomaton();
    ia.addTransition("A", "go", stateNode("B"));
    expect(ia.destination("A", "go")).toEqual(stateNode("B"));
    expect(ia.destination("A", "stop")).toBeUndefined();
    expect(ia.destination("B", "go")).toBeUndefined();
  });

  it("keeps object symbols shaped like a wrapped transition as they are", () => {
    interface Labelled {
      readonly transition: string;
    }
    const ia = new IntermediateAutomaton(
      stringKey,
      keyedBy((s: Labelled) => s.transition, stringKey)
    );
    ia.addTransition("A", { transition: "go" }, stateNode("B"));
    expect(ia.destination("A", { transition: "go" })).toEqual(stateNode("B"));
    expect([...ia.entries()].map(([, t]) => t)).toEqual([{ transition: { transition: "go" } }]);
  });

  it("keys start transitions by an absent source", () => {
    const ia = mkAutomaton();
    ia.addTransition(undefined, "begin", stateNode("A"));
    expect(ia.destination(undefined, "begin")).toEqual(stateNode("A"));
    expect(ia.destination("A", "begin")).toBeUndefined();
  });

  it("replaces the destination of an existing (source, symbol) pair", () => {
    const ia = mkAutomaton();
    ia.addTransition("A", "go", stateNode("B"));
    ia.addTransition("A", "go", decision([branch("C"), branch("D")]));
    expect(ia.destination("A", "go")).toEqual(decision([branch("C"), branch("D")]));
    expect([...ia.entries()]).toHaveLength(1);
  });

  it("enumerates entries by source, then symbol, in insertion order", () => {
    const ia = mkAutomaton();
    ia.addTransition("B", "x", stateNode("A"));
    ia.addTransition(undefined, "begin", stateNode("B"));
    ia.addTransition("B", "y", finalNode());
    ia.addTransition("B", "x", stateNode("C"));
    expect(
      [...ia.entries()].map(([source, t, destination]) => [source, t.transition, destination])
    ).toEqual([
      ["B", "x", stateNode("C")],
      ["B", "y", finalNode()],
      [undefined, "begin", stateNode("B")],
    ]);
  });
});
