export type PipelineErrorCode =
  | "INVALID_CONFIG"
  | "DIMENSION_MISMATCH"
  | "INVALID_VECTOR"
  | "EMBEDDING_SERVICE"
  | "GENERATION_SERVICE"
  | "MISSING_VARIABLE"
  | "MALFORMED_RESPONSE"
  | "ABORTED"
  | "TRANSCRIPT_SOURCE"
  | "INDEX_NOT_READY";

/**
 * Base class for every failure raised by the pipeline. Stages never catch
 * these; they travel unchanged up to whoever called `invoke`.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends PipelineError {
  readonly code = "INVALID_CONFIG";
}

export class DimensionMismatchError extends PipelineError {
  readonly code = "DIMENSION_MISMATCH";

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, received ${actual}.`);
  }
}

export class InvalidVectorError extends PipelineError {
  readonly code = "INVALID_VECTOR";
}

/** Embedding model call failed (network, quota, model). Not retried. */
export class EmbeddingServiceError extends PipelineError {
  readonly code = "EMBEDDING_SERVICE";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Generation model call failed. Not retried. */
export class GenerationServiceError extends PipelineError {
  readonly code = "GENERATION_SERVICE";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MissingVariableError extends PipelineError {
  readonly code = "MISSING_VARIABLE";

  constructor(readonly variable: string) {
    super(`Prompt variable "${variable}" is missing from the input bundle.`);
  }
}

export class MalformedResponseError extends PipelineError {
  readonly code = "MALFORMED_RESPONSE";
}

export class PipelineAbortedError extends PipelineError {
  readonly code = "ABORTED";

  constructor(options?: { cause?: unknown }) {
    super("Pipeline invocation was aborted.", options);
  }
}

export class TranscriptSourceError extends PipelineError {
  readonly code = "TRANSCRIPT_SOURCE";
}

export class IndexNotReadyError extends PipelineError {
  readonly code = "INDEX_NOT_READY";

  constructor() {
    super("No transcript has been indexed yet. Index a transcript before asking questions.");
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
