import { config, type MermaidConfig } from "../config.js";
import { Diagram, modelOf, type DiagramSource } from "./diagram.js";
import type { DiagramModel } from "./model.js";
import { umlBody } from "./uml.js";

/** Mermaid declares only choice states; plain states appear through their edges. */
export function renderMermaid(model: DiagramModel, options: MermaidConfig): string {
  return [options.header, ...umlBody(model, { declareStates: false }), ""].join("\n");
}

export class Mermaid extends Diagram<MermaidConfig> {
  readonly format = "mermaid";

  static from<N, L>(source: DiagramSource<N, L>): Mermaid {
    return new Mermaid(modelOf(source));
  }

  render(options: Partial<MermaidConfig> = {}): string {
    return renderMermaid(this.model, { ...config.get().mermaid, ...options });
  }
}
