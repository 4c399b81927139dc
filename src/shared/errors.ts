/**
 * Error types surfaced to callers of the analytics engine.
 */

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "AnalysisError";
  }
}

/**
 * The incident snapshot cannot be analyzed at all: a required field is
 * missing or malformed, or an identifier repeats.
 */
export class InputShapeError extends AnalysisError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly recordIndex?: number
  ) {
    super(message, "INPUT_SHAPE");
    this.name = "InputShapeError";
  }
}

/** Malformed category mapping, SLA table or CLI option. */
export class ConfigError extends AnalysisError {
  constructor(message: string) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}
