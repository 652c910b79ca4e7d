export type MatchingErrorCode =
  | "missing_embedding"
  | "dimension_mismatch"
  | "invalid_parameter"
  | "gateway_error"
  | "gateway_timeout";

export class MatchingError extends Error {
  constructor(
    readonly code: MatchingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingEmbeddingError extends MatchingError {
  constructor(
    readonly candidateId: string,
    message = `Candidate ${candidateId} has no primary embedding.`,
  ) {
    super("missing_embedding", message);
  }
}

export class DimensionMismatchError extends MatchingError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super("dimension_mismatch", `Vector dimension mismatch: expected ${expected}, got ${actual}.`);
  }
}

export class InvalidParameterError extends MatchingError {
  constructor(
    readonly parameter: string,
    value: unknown,
  ) {
    super("invalid_parameter", `Invalid ${parameter} value: ${String(value)}`);
  }
}

export class GatewayError extends MatchingError {
  constructor(
    readonly gateway: string,
    message: string,
  ) {
    super("gateway_error", `${gateway}: ${message}`);
  }
}

export class GatewayTimeoutError extends MatchingError {
  constructor(
    readonly gateway: string,
    readonly timeoutMs: number,
  ) {
    super("gateway_timeout", `${gateway}: timeout after ${timeoutMs}ms`);
  }
}

export function isPreconditionError(error: unknown): boolean {
  return (
    error instanceof MissingEmbeddingError ||
    error instanceof DimensionMismatchError ||
    error instanceof InvalidParameterError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
