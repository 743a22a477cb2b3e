/**
 * Graphviz DOT output.
 *
 * The start and terminal pseudo-states are the reserved nodes `_initial_`
 * and `_final_` (labeled automata get one `_initial_<i>` per start marker
 * and draw final states bold with a dashed self-loop per label).
 */

import { config, type DotConfig } from "../config.js";
import { Diagram, modelOf, type DiagramSource } from "./diagram.js";
import {
  formatEdge,
  type DiagramModel,
  type EdgeSyntax,
  type IntermediateModel,
  type LabeledModel,
} from "./model.js";

const INITIAL = "_initial_";
const FINAL = "_final_";
const PSEUDO_STATE = `label="", fillcolor=black, fixedsize=true, height=0.25, style=filled`;

const PLAIN_ID = /^(?:[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*|-?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?))$/;
const KEYWORDS = new Set(["node", "edge", "graph", "digraph", "subgraph", "strict"]);

/** A quoted DOT string; line breaks become `\n` escapes. */
function quote(text: string): string {
  const escaped = text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, "\\n");
  return `"${escaped}"`;
}

/** `text` as a DOT identifier, quoted unless it is a plain ID. */
export function dotId(text: string): string {
  return PLAIN_ID.test(text) && !KEYWORDS.has(text.toLowerCase()) ? text : quote(text);
}

const syntax: EdgeSyntax = {
  initial: INITIAL,
  final: FINAL,
  node: dotId,
  edge: (source, destination, label) =>
    label === undefined
      ? `${source} -> ${destination};`
      : `${source} -> ${destination} [label=${dotId(label)}];`,
};

function intermediateBody(model: IntermediateModel): string[] {
  return [
    `${INITIAL} [${PSEUDO_STATE}, shape=circle];`,
    ...model.choices.map((c) => `${dotId(c)} [shape=diamond];`),
    ...model.edges.map((e) => formatEdge(e, syntax)),
    `${FINAL} [${PSEUDO_STATE}, shape=doublecircle];`,
  ];
}

function labeledBody(model: LabeledModel): string[] {
  const lines: string[] = [];

  model.initial.forEach(({ node, label }, i) => {
    const marker = `${INITIAL}${i}`;
    lines.push(`${marker} [label="", shape="plaintext"];`);
    lines.push(
      label === undefined
        ? `${marker} -> ${dotId(node)};`
        : `${marker} -> ${dotId(node)} [label=${quote(label)}];`
    );
  });

  for (const { node, labels } of model.final) {
    const id = dotId(node);
    lines.push(`${id} [style="bold"];`);
    if (labels.length === 0) {
      lines.push(`${id} -> ${id} [style=dashed];`);
    }
    for (const label of labels) {
      lines.push(`${id} -> ${id} [label=${quote(label)}, style=dashed];`);
    }
  }

  for (const e of model.edges) lines.push(formatEdge(e, syntax));
  return lines;
}

export function renderDot(model: DiagramModel, options: DotConfig): string {
  const { indent } = options;
  const body = model.kind === "intermediate" ? intermediateBody(model) : labeledBody(model);
  return [
    `digraph ${dotId(options.graphName)} {`,
    `${indent}graph [pad=${quote(options.pad)}, nodesep=${quote(options.nodesep)}, ranksep=${quote(options.ranksep)}];`,
    ...body.map((line) => indent + line),
    "}",
    "",
  ].join("\n");
}

export class Dot extends Diagram<DotConfig> {
  readonly format = "dot";

  static from<N, L>(source: DiagramSource<N, L>): Dot {
    return new Dot(modelOf(source));
  }

  render(options: Partial<DotConfig> = {}): string {
    return renderDot(this.model, { ...config.get().dot, ...options });
  }
}
