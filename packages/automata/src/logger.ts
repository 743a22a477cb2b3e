import { config } from "./config.js";

export interface Logger {
  /** Emitted only when `config.isDebug()` is true. */
  debug(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/** A console-backed logger whose lines are prefixed with `[automata:<scope>]`. */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const prefix = `[automata:${scope}]`;
  return {
    debug(message) {
      if (config.isDebug()) writer(`${prefix} ${message}`);
    },
    warn(message) {
      writer(`${prefix} warning: ${message}`);
    },
  };
}
