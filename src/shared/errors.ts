export type IntakeErrorCode =
  | "extraction_failure"
  | "generation_failure"
  | "rate_limit_exceeded"
  | "persistence_failure";

export class IntakeError extends Error {
  constructor(
    readonly code: IntakeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Adapter response was malformed or the adapter was unavailable. */
export class ExtractionFailure extends IntakeError {
  constructor(message: string) {
    super("extraction_failure", message);
  }
}

export class GenerationFailure extends IntakeError {
  constructor(message: string) {
    super("generation_failure", message);
  }
}

export class RateLimitExceeded extends IntakeError {
  constructor(readonly key: string) {
    super("rate_limit_exceeded", `Rate limit exceeded for ${key}`);
  }
}

export class PersistenceFailure extends IntakeError {
  constructor(message: string) {
    super("persistence_failure", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export class SessionNotFound extends Error {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFound";
  }
}
