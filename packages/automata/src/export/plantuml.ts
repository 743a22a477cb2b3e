import { config, type PlantUmlConfig } from "../config.js";
import { Diagram, modelOf, type DiagramSource } from "./diagram.js";
import type { DiagramModel } from "./model.js";
import { umlBody } from "./uml.js";

export function renderPlantUml(model: DiagramModel, options: PlantUmlConfig): string {
  return [
    "@startuml",
    ...(options.hideEmptyDescription ? ["hide empty description"] : []),
    ...umlBody(model, { declareStates: true }),
    "@enduml",
    "",
  ].join("\n");
}

/** PlantUML state diagram. */
export class PlantUml extends Diagram<PlantUmlConfig> {
  readonly format = "plantuml";

  static from<N, L>(source: DiagramSource<N, L>): PlantUml {
    return new PlantUml(modelOf(source));
  }

  render(options: Partial<PlantUmlConfig> = {}): string {
    return renderPlantUml(this.model, { ...config.get().plantuml, ...options });
  }
}
