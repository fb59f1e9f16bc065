export type EvaluationErrorCode =
  | "parse_error"
  | "external_service"
  | "timeout"
  | "validation_error"
  | "configuration_error";

export class EvaluationError extends Error {
  constructor(
    readonly code: EvaluationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Profile or requirement could not be validated at all. Fatal for the candidate. */
export class ParseError extends EvaluationError {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super("parse_error", message);
  }
}

export class ExternalServiceError extends EvaluationError {
  constructor(
    message: string,
    readonly attempts = 1,
    code: "external_service" | "timeout" = "external_service",
  ) {
    super(code, message);
  }
}

export class GeneratorTimeoutError extends ExternalServiceError {
  constructor(
    readonly timeoutMs: number,
    attempts = 1,
  ) {
    super(`Generator call timed out after ${timeoutMs}ms`, attempts, "timeout");
  }
}

/** Structured stage input or generator output of the wrong shape. Fails one stage only. */
export class ValidationError extends EvaluationError {
  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super("validation_error", message);
  }
}

export class ConfigurationError extends EvaluationError {
  constructor(message: string) {
    super("configuration_error", message);
  }
}

export function describeError(error: unknown): { code: EvaluationErrorCode | "unexpected"; message: string } {
  if (error instanceof EvaluationError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: "unexpected",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}
