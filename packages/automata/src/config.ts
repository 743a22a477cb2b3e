/**
 * Configuration
 *
 * Rendering defaults and the debug switch are loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: AUTOMATA_*
 * 3. Config files: .automatarc, .automatarc.json, automata.config.js, etc.
 *    (the loader is synchronous, so ES module config files are not searched)
 * 4. package.json: "automata" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@automata-diagrams/automata";
 *
 * config.get().dot.graphName          // → "Automata"
 * config.set({ dot: { ranksep: "2" } });
 * ```
 *
 * @example Config file (.automatarc.json)
 * ```json
 * { "debug": true, "mermaid": { "header": "stateDiagram" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export interface DotConfig {
  /** Name after the `digraph` keyword */
  graphName: string;
  /** Prefix of every statement inside the graph block */
  indent: string;
  pad: string;
  nodesep: string;
  ranksep: string;
}

export interface PlantUmlConfig {
  /** Emit `hide empty description` after `@startuml` */
  hideEmptyDescription: boolean;
}

export interface MermaidConfig {
  /** Diagram-type header line */
  header: string;
}

export interface AutomataConfig {
  /** Enable debug logging */
  debug: boolean;
  dot: DotConfig;
  plantuml: PlantUmlConfig;
  mermaid: MermaidConfig;
}

/** Partial configuration, as accepted by `config.set()` and config files. */
export interface AutomataConfigInput {
  debug?: boolean;
  dot?: Partial<DotConfig>;
  plantuml?: Partial<PlantUmlConfig>;
  mermaid?: Partial<MermaidConfig>;
}

export const DEFAULT_CONFIG: AutomataConfig = {
  debug: false,
  dot: {
    graphName: "Automata",
    indent: "  ",
    pad: "0.25",
    nodesep: "0.75",
    ranksep: "1",
  },
  plantuml: {
    hideEmptyDescription: true,
  },
  mermaid: {
    header: "stateDiagram-v2",
  },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: AutomataConfig = DEFAULT_CONFIG;
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "automata";
const ENV_PREFIX = "AUTOMATA_";

// ============================================================================
// Normalization
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Case-insensitive property lookup, so `AUTOMATA_DOT_GRAPHNAME` finds `graphName`. */
function pick(record: Record<string, unknown>, key: string): unknown {
  if (key in record) return record[key];
  const lower = key.toLowerCase();
  for (const [k, v] of Object.entries(record)) {
    if (k.toLowerCase() === lower) return v;
  }
  return undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  return undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = pick(raw, key);
  return isRecord(value) ? value : {};
}

/** Keep only the known keys of an untrusted config object, coerced to their types. */
export function normalizeConfig(raw: unknown): AutomataConfigInput {
  if (!isRecord(raw)) return {};
  const dot = section(raw, "dot");
  const plantuml = section(raw, "plantuml");
  const mermaid = section(raw, "mermaid");
  return {
    debug: asBoolean(pick(raw, "debug")),
    dot: {
      graphName: asString(pick(dot, "graphName")),
      indent: asString(pick(dot, "indent")),
      pad: asString(pick(dot, "pad")),
      nodesep: asString(pick(dot, "nodesep")),
      ranksep: asString(pick(dot, "ranksep")),
    },
    plantuml: {
      hideEmptyDescription: asBoolean(pick(plantuml, "hideEmptyDescription")),
    },
    mermaid: {
      header: asString(pick(mermaid, "header")),
    },
  };
}

/** Overlay `input` on `base`; undefined fields keep the base value. */
function merge(base: AutomataConfig, input: AutomataConfigInput): AutomataConfig {
  const { dot = {}, plantuml = {}, mermaid = {} } = input;
  return {
    debug: input.debug ?? base.debug,
    dot: {
      graphName: dot.graphName ?? base.dot.graphName,
      indent: dot.indent ?? base.dot.indent,
      pad: dot.pad ?? base.dot.pad,
      nodesep: dot.nodesep ?? base.dot.nodesep,
      ranksep: dot.ranksep ?? base.dot.ranksep,
    },
    plantuml: {
      hideEmptyDescription: plantuml.hideEmptyDescription ?? base.plantuml.hideEmptyDescription,
    },
    mermaid: {
      header: mermaid.header ?? base.mermaid.header,
    },
  };
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): AutomataConfigInput {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      return normalizeConfig(loaded);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    const reason = error instanceof Error ? error.message : String(error);
    createLogger("config").warn(`failed to load config file: ${reason}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   AUTOMATA_DEBUG=1                 → { debug: true }
 *   AUTOMATA_DOT_GRAPHNAME=Machine   → { dot: { graphName: "Machine" } }
 *   AUTOMATA_MERMAID_HEADER=stateDiagram
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AutomataConfigInput {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const parts = key.slice(ENV_PREFIX.length).toLowerCase().split("_").filter(Boolean);
    let current = raw;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    const leaf = parts[parts.length - 1];
    if (leaf !== undefined) current[leaf] = value;
  }

  return normalizeConfig(raw);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;
  configStore = merge(merge(DEFAULT_CONFIG, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

/** The resolved configuration. */
function get(): Readonly<AutomataConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Set configuration values programmatically.
 * Merges with the existing configuration.
 */
function set(values: AutomataConfigInput): void {
  initializeConfig();
  configStore = merge(configStore, values);
}

function isDebug(): boolean {
  return get().debug;
}

/** Path of the loaded config file, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Forget loaded state so the next read reloads every source (mainly for testing). */
function reset(): void {
  configStore = DEFAULT_CONFIG;
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  isDebug,
  getConfigFilePath,
  reset,
};
