/**
 * State-diagram statements shared by PlantUML and Mermaid. Both draw the
 * start and terminal pseudo-states as `[*]` and edges as `a --> b : text`.
 *
 * Neither format accepts arbitrary text as a state identifier, so a state
 * whose name is not a plain identifier is declared once as
 * `state "Door Open" as Door_Open` and referenced by its alias.
 */

import { formatEdge, type DiagramModel, type EdgeSyntax } from "./model.js";

const PSEUDO_STATE = "[*]";
const PLAIN_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

function edge(source: string, destination: string, label: string | undefined): string {
  return label === undefined ? `${source} --> ${destination}` : `${source} --> ${destination} : ${label}`;
}

/** Every state name the model mentions, in order of first appearance. */
function stateNames(model: DiagramModel): string[] {
  const names: string[] = [];
  if (model.kind === "intermediate") {
    names.push(...model.choices, ...model.states);
  } else {
    names.push(...model.initial.map((m) => m.node), ...model.final.map((m) => m.node));
  }
  for (const e of model.edges) {
    if (e.source.kind === "state") names.push(e.source.name);
    if (e.destination.kind === "state") names.push(e.destination.name);
  }
  return names;
}

/**
 * Identifier for every state name. Plain names stand for themselves; others
 * get an alias built from their identifier characters, suffixed until it
 * clashes with no other identifier.
 */
export function umlIds(names: Iterable<string>): Map<string, string> {
  const ids = new Map<string, string>();
  const taken = new Set<string>();
  const pending: string[] = [];

  for (const name of names) {
    if (ids.has(name) || pending.includes(name)) continue;
    if (PLAIN_ID.test(name)) {
      ids.set(name, name);
      taken.add(name);
    } else {
      pending.push(name);
    }
  }

  for (const name of pending) {
    let base = name.replace(/[^A-Za-z0-9_]/g, "_");
    if (!/^[A-Za-z_]/.test(base)) base = `_${base}`;
    let alias = base;
    for (let i = 1; taken.has(alias); i++) alias = `${base}_${i}`;
    ids.set(name, alias);
    taken.add(alias);
  }
  return ids;
}

/** Display text of a `state "..." as X` declaration; the formats have no quote escape. */
function display(name: string): string {
  return name.replace(/"/g, "'").replace(/\r?\n/g, " ");
}

/** Edge text stays on its line. */
function labelText(label: string | undefined): string | undefined {
  return label?.replace(/\r?\n/g, " ");
}

export interface UmlBodyOptions {
  /** Also declare every non-choice state with a plain `state X` line. */
  declareStates: boolean;
}

export function umlBody(model: DiagramModel, options: UmlBodyOptions): string[] {
  const ids = umlIds(stateNames(model));
  const id = (name: string): string => ids.get(name) ?? name;
  const syntax: EdgeSyntax = {
    initial: PSEUDO_STATE,
    final: PSEUDO_STATE,
    node: id,
    edge: (source, destination, label) => edge(source, destination, labelText(label)),
  };

  const lines: string[] = [];
  const declared = new Set<string>();
  const declare = (name: string): void => {
    const alias = id(name);
    lines.push(alias === name ? `state ${name}` : `state "${display(name)}" as ${alias}`);
    declared.add(name);
  };

  if (model.kind === "intermediate") {
    for (const choice of model.choices) {
      lines.push(`state ${id(choice)} <<choice>>`);
      declared.add(choice);
    }
    if (options.declareStates) {
      for (const state of model.states) declare(state);
    }
  }
  for (const [name, alias] of ids) {
    if (alias !== name && !declared.has(name)) declare(name);
  }

  if (model.kind === "labeled") {
    for (const { node, label } of model.initial) {
      lines.push(syntax.edge(PSEUDO_STATE, id(node), label));
    }
    for (const { node, labels } of model.final) {
      if (labels.length === 0) lines.push(syntax.edge(id(node), PSEUDO_STATE, undefined));
      for (const label of labels) lines.push(syntax.edge(id(node), PSEUDO_STATE, label));
    }
  }

  for (const e of model.edges) lines.push(formatEdge(e, syntax));
  return lines;
}
