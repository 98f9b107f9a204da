export class OrchestratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised inside the classifier when the model path cannot produce a route.
 * Never leaves the classifier: it is logged and the keyword rule answers.
 */
export class ClassificationFallback extends OrchestratorError {}

/** SQL or completion text could not be produced or failed validation. */
export class GenerationError extends OrchestratorError {}

/** The warehouse rejected or failed a generated query. */
export class ExecutionError extends OrchestratorError {
  constructor(
    message: string,
    readonly sql: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Embedding or similarity search failed, or nothing was retrieved. */
export class RetrievalError extends OrchestratorError {}

export class TimeoutError extends OrchestratorError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export function describeError(err: unknown): { name: string; message: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
