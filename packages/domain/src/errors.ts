/**
 * Failures raised while talking to the simulation or interpreting its payloads.
 * None of these are recovered from: an experiment is only meaningful when both
 * phases complete, so every error propagates to the entry point.
 */
export class SimulationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection refused, reset or timed out before a response arrived. */
export class NetworkError extends SimulationError {}

/** The simulation answered with a non-success HTTP status. */
export class ServerError extends SimulationError {
  constructor(
    readonly status: number,
    readonly path: string,
    readonly body: string,
  ) {
    super(`${path} responded ${status}: ${body}`);
  }
}

export interface DataShapeIssue {
  path: (string | number)[];
  message: string;
}

/** A payload or value is missing a field, has the wrong type, or cannot be aggregated. */
export class DataShapeError extends SimulationError {
  constructor(
    message: string,
    readonly issues: DataShapeIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
