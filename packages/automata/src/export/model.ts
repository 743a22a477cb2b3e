/**
 * Format-independent diagram model.
 *
 * Both automaton representations are reduced to pseudo-state markers and
 * labeled edges here, so every output format applies the same rules for
 * start and terminal pseudo-states, decisions and label overrides.
 */

import type { Show } from "@automata-diagrams/collections";
import { MalformedAutomatonError } from "../errors.js";
import type { Dfa, Nfa } from "../labeled.js";
import type { IntermediateAutomaton, Node, Transition } from "../intermediate.js";

// ============================================================================
// Edges
// ============================================================================

export type Endpoint =
  | { readonly kind: "initial" }
  | { readonly kind: "final" }
  | { readonly kind: "state"; readonly name: string };

export interface DiagramEdge {
  readonly source: Endpoint;
  readonly destination: Endpoint;
  /** Edge text; absent means the edge is drawn without one. */
  readonly label?: string;
}

const INITIAL: Endpoint = { kind: "initial" };
const FINAL: Endpoint = { kind: "final" };

function named(name: string): Endpoint {
  return { kind: "state", name };
}

function edge(source: Endpoint, destination: Endpoint, label: string | undefined): DiagramEdge {
  return label === undefined ? { source, destination } : { source, destination, label };
}

/**
 * Interpret one `(source, transition, destination)` entry of an intermediate
 * automaton:
 *
 * - a direct destination is drawn with the transition symbol as edge text,
 *   targeting the label override when there is one, the state otherwise,
 *   or the terminal pseudo-node when the state is absent;
 * - a decision is drawn as one edge per branch, in order, to the branch
 *   state (or the terminal pseudo-node) with the branch's override as text
 *   and the outer symbol never shown;
 * - an absent source is the start pseudo-node and must lead to a present
 *   state.
 *
 * @throws MalformedAutomatonError when a start edge leads to the terminal
 * pseudo-state or to a decision
 */
export function interpretTransition<S, T>(
  source: S | undefined,
  transition: Transition<T>,
  destination: Node<S>,
  showState: Show<S>,
  showSymbol: Show<T>
): DiagramEdge[] {
  const symbol = showSymbol.show(transition.transition);
  const from = source === undefined ? INITIAL : named(showState.show(source));

  switch (destination.kind) {
    case "state": {
      const { state, metadata } = destination.node;
      if (state === undefined) {
        if (source === undefined) {
          throw new MalformedAutomatonError(
            `invalid transition "${symbol}": the initial state cannot lead directly to the final state`,
            symbol,
            "final"
          );
        }
        return [edge(from, FINAL, symbol)];
      }
      const target = metadata.transitionLabel ?? showState.show(state);
      return [edge(from, named(target), symbol)];
    }
    case "decision": {
      if (source === undefined) {
        throw new MalformedAutomatonError(
          `invalid transition "${symbol}": the initial state cannot lead to a decision`,
          symbol,
          "decision"
        );
      }
      return destination.branches.map(({ state, metadata }) =>
        edge(
          from,
          state === undefined ? FINAL : named(showState.show(state)),
          metadata.transitionLabel
        )
      );
    }
  }
}

// ============================================================================
// Models
// ============================================================================

/** A start or terminal marker attached to a state of a labeled automaton. */
export interface Marker {
  readonly node: string;
  readonly label?: string;
}

export interface LabeledModel {
  readonly kind: "labeled";
  readonly initial: ReadonlyArray<Marker>;
  /** Final markers, grouped per node in first-registration order. */
  readonly final: ReadonlyArray<{ readonly node: string; readonly labels: ReadonlyArray<string> }>;
  readonly edges: ReadonlyArray<DiagramEdge>;
}

export interface IntermediateModel {
  readonly kind: "intermediate";
  readonly choices: ReadonlyArray<string>;
  /** States that are not choices. */
  readonly states: ReadonlyArray<string>;
  readonly edges: ReadonlyArray<DiagramEdge>;
}

export type DiagramModel = LabeledModel | IntermediateModel;

/** Anything a diagram can be built from directly. */
export type Exportable<N, L> = Dfa<N, L> | Nfa<N, L> | IntermediateAutomaton<N, L>;

function labeledModel<N, L>(automaton: Dfa<N, L> | Nfa<N, L>): LabeledModel {
  const showNode = (n: N): string => automaton.nodeKey.show(n);
  const showLabel = (l: L): string => automaton.labelKey.show(l);

  const initial: Marker[] = [];
  for (const [node, labels] of automaton.initialStates) {
    if (labels.size === 0) {
      initial.push({ node: showNode(node) });
    }
    for (const label of labels) initial.push({ node: showNode(node), label: showLabel(label) });
  }

  const final = [...automaton.finalStates].map(([node, labels]) => ({
    node: showNode(node),
    labels: labels.toArray().map(showLabel),
  }));

  const edges: DiagramEdge[] = [];
  if (automaton.kind === "dfa") {
    for (const [source, transitions] of automaton.delta) {
      for (const [label, destination] of transitions) {
        edges.push(edge(named(showNode(source)), named(showNode(destination)), showLabel(label)));
      }
    }
  } else {
    for (const [source, transitions] of automaton.delta) {
      for (const [label, destinations] of transitions) {
        for (const destination of destinations) {
          edges.push(edge(named(showNode(source)), named(showNode(destination)), showLabel(label)));
        }
      }
    }
  }

  return { kind: "labeled", initial, final, edges };
}

function intermediateModel<S, T>(automaton: IntermediateAutomaton<S, T>): IntermediateModel {
  const { stateKey, symbolKey } = automaton;
  const edges: DiagramEdge[] = [];
  for (const [source, transition, destination] of automaton.entries()) {
    edges.push(...interpretTransition(source, transition, destination, stateKey, symbolKey));
  }
  return {
    kind: "intermediate",
    choices: automaton.choices.map((c) => stateKey.show(c)),
    states: automaton.states.filter((s) => !automaton.isChoice(s)).map((s) => stateKey.show(s)),
    edges,
  };
}

/** Reduce an automaton to the format-independent model. */
export function toModel<N, L>(automaton: Exportable<N, L>): DiagramModel {
  switch (automaton.kind) {
    case "dfa":
    case "nfa":
      return labeledModel(automaton);
    case "intermediate":
      return intermediateModel(automaton);
  }
}

// ============================================================================
// Format syntax
// ============================================================================

/** The spellings one output format uses for endpoints and edges. */
export interface EdgeSyntax {
  readonly initial: string;
  readonly final: string;
  node(name: string): string;
  edge(source: string, destination: string, label: string | undefined): string;
}

export function formatEndpoint(endpoint: Endpoint, syntax: EdgeSyntax): string {
  switch (endpoint.kind) {
    case "initial":
      return syntax.initial;
    case "final":
      return syntax.final;
    case "state":
      return syntax.node(endpoint.name);
  }
}

export function formatEdge(e: DiagramEdge, syntax: EdgeSyntax): string {
  return syntax.edge(formatEndpoint(e.source, syntax), formatEndpoint(e.destination, syntax), e.label);
}
