/**
 * Automaton Error Types
 */

/**
 * Base class for all errors raised by this package.
 */
export class AutomatonError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AutomatonError";
  }
}

/**
 * Thrown when an intermediate automaton holds an edge that cannot exist: a
 * transition out of the start pseudo-state into the terminal pseudo-state
 * or into a decision. This is a defect in whatever built the automaton, not
 * a condition to recover from.
 */
export class MalformedAutomatonError extends AutomatonError {
  constructor(
    message: string,
    public readonly transition: string,
    public readonly destination: "final" | "decision"
  ) {
    super(message);
    this.name = "MalformedAutomatonError";
  }
}

/**
 * Thrown when rendered diagram text cannot be written. `cause` is the
 * underlying system error.
 */
export class DiagramWriteError extends AutomatonError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to write diagram to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "DiagramWriteError";
  }
}
