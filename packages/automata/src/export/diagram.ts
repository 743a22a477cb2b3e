import { FiniteAutomaton } from "../automaton.js";
import { toModel, type DiagramModel, type Exportable } from "./model.js";
import { writeDiagram } from "./write.js";

export type DiagramFormat = "dot" | "plantuml" | "mermaid";

/** Either automaton representation, or the edge-list automaton via its labeled form. */
export type DiagramSource<N, L> = Exportable<N, L> | FiniteAutomaton<N, L>;

export function modelOf<N, L>(source: DiagramSource<N, L>): DiagramModel {
  return source instanceof FiniteAutomaton ? toModel(source.toNfa()) : toModel(source);
}

/**
 * A diagram built from an automaton. The model is captured once; rendering
 * reads configuration at call time and has no other inputs.
 */
export abstract class Diagram<O extends object = object> {
  abstract readonly format: DiagramFormat;

  protected constructor(readonly model: DiagramModel) {}

  /** Render the diagram text. `options` override the configured defaults. */
  abstract render(options?: Partial<O>): string;

  toString(): string {
    return this.render();
  }

  /** Render with default options and write the text to `path`. */
  writeTo(path: string): Promise<void> {
    return writeDiagram(this, path);
  }
}
