import type { DiagramFormat, DiagramSource } from "./diagram.js";
import { Dot } from "./dot.js";
import { Mermaid } from "./mermaid.js";
import { PlantUml } from "./plantuml.js";

export function toDiagram<N, L>(source: DiagramSource<N, L>, format: "dot"): Dot;
export function toDiagram<N, L>(source: DiagramSource<N, L>, format: "plantuml"): PlantUml;
export function toDiagram<N, L>(source: DiagramSource<N, L>, format: "mermaid"): Mermaid;
export function toDiagram<N, L>(
  source: DiagramSource<N, L>,
  format: DiagramFormat
): Dot | PlantUml | Mermaid;
export function toDiagram<N, L>(
  source: DiagramSource<N, L>,
  format: DiagramFormat
): Dot | PlantUml | Mermaid {
  switch (format) {
    case "dot":
      return Dot.from(source);
    case "plantuml":
      return PlantUml.from(source);
    case "mermaid":
      return Mermaid.from(source);
  }
}
