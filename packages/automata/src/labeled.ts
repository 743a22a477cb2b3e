/**
 * Labeled automata: the export-ready edge-list forms.
 *
 * Each initial and final state maps to the labels drawn on its start or
 * terminal marker. A state registered without a label keeps an empty label
 * set and is drawn with one unlabeled marker.
 */

import { HashMap, HashSet, type Keyed } from "@automata-diagrams/collections";

export abstract class LabeledAutomaton<N, L> {
  readonly initialStates: HashMap<N, HashSet<L>>;
  readonly finalStates: HashMap<N, HashSet<L>>;

  constructor(
    readonly nodeKey: Keyed<N>,
    readonly labelKey: Keyed<L>
  ) {
    this.initialStates = new HashMap(nodeKey, nodeKey);
    this.finalStates = new HashMap(nodeKey, nodeKey);
  }

  protected labels(): HashSet<L> {
    return new HashSet(this.labelKey, this.labelKey);
  }

  addInitialState(node: N, label?: L): this {
    const labels = this.initialStates.getOrInsert(node, () => this.labels());
    if (label !== undefined) labels.add(label);
    return this;
  }

  addFinalState(node: N, label?: L): this {
    const labels = this.finalStates.getOrInsert(node, () => this.labels());
    if (label !== undefined) labels.add(label);
    return this;
  }
}

/** Deterministic: at most one destination per (source, label). */
export class Dfa<N, L> extends LabeledAutomaton<N, L> {
  readonly kind = "dfa";
  readonly delta: HashMap<N, HashMap<L, N>>;

  constructor(nodeKey: Keyed<N>, labelKey: Keyed<L>) {
    super(nodeKey, labelKey);
    this.delta = new HashMap(nodeKey, nodeKey);
  }

  /** Set the destination of `(source, label)`, replacing any previous one. */
  addTransition(source: N, label: L, destination: N): this {
    this.delta
      .getOrInsert(source, () => new HashMap(this.labelKey, this.labelKey))
      .set(label, destination);
    return this;
  }
}

/** Nondeterministic: a set of destinations per (source, label). */
export class Nfa<N, L> extends LabeledAutomaton<N, L> {
  readonly kind = "nfa";
  readonly delta: HashMap<N, HashMap<L, HashSet<N>>>;

  constructor(nodeKey: Keyed<N>, labelKey: Keyed<L>) {
    super(nodeKey, labelKey);
    this.delta = new HashMap(nodeKey, nodeKey);
  }

  addTransition(source: N, label: L, destination: N): this {
    this.delta
      .getOrInsert(source, () => new HashMap(this.labelKey, this.labelKey))
      .getOrInsert(label, () => new HashSet(this.nodeKey, this.nodeKey))
      .add(destination);
    return this;
  }
}
