/**
 * @automata-diagrams/automata
 *
 * Finite automata as directed graphs, with reachability and productivity
 * queries, and diagram export to Graphviz DOT, PlantUML and Mermaid.
 */

// Primitives
export type { State, InputSymbol, Transition } from "./state.js";
export {
  state,
  inputSymbol,
  transition,
  stateInstances,
  symbolInstances,
  stateOrd,
  symbolOrd,
  transitionInstances,
} from "./state.js";

// Graph
export type { Direction, GraphEdge } from "./graph.js";
export { DirectedGraph } from "./graph.js";
export type { GraphLike } from "./typeclass.js";
export { directedGraphLike } from "./typeclass.js";
export { successorsG, closureG, isProductiveG } from "./algorithms.js";

// Automata
export { FiniteAutomaton } from "./automaton.js";
export { LabeledAutomaton, Dfa, Nfa } from "./labeled.js";
export type {
  Metadata,
  StateNode,
  Node,
  IntermediateEntry,
  Transition as IntermediateTransition,
} from "./intermediate.js";
export {
  IntermediateAutomaton,
  branch,
  stateNode,
  finalNode,
  decision,
  toNode,
  intermediateTransition,
} from "./intermediate.js";

// Export
export type {
  Endpoint,
  DiagramEdge,
  DiagramModel,
  LabeledModel,
  IntermediateModel,
  Marker,
  Exportable,
  EdgeSyntax,
} from "./export/model.js";
export { interpretTransition, toModel } from "./export/model.js";
export type { DiagramFormat, DiagramSource } from "./export/diagram.js";
export { Diagram, modelOf } from "./export/diagram.js";
export { toDiagram } from "./export/to-diagram.js";
export { Dot, dotId, renderDot } from "./export/dot.js";
export { PlantUml, renderPlantUml } from "./export/plantuml.js";
export { Mermaid, renderMermaid } from "./export/mermaid.js";
export { writeDiagram } from "./export/write.js";

// Ambient
export type {
  AutomataConfig,
  AutomataConfigInput,
  DotConfig,
  PlantUmlConfig,
  MermaidConfig,
} from "./config.js";
export { config, DEFAULT_CONFIG, loadConfigFromEnv, normalizeConfig } from "./config.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger } from "./logger.js";
export { AutomatonError, MalformedAutomatonError, DiagramWriteError } from "./errors.js";
