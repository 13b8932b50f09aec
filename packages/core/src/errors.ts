export type ErrorKind = "validation" | "not_found" | "dependency" | "ingestion" | "internal";

/**
 * Base error for every failure the services classify.
 * `kind` decides how a failure surfaces: HTTP status, job status or log level.
 */
export class LolqaError extends Error {
  public readonly kind: ErrorKind;

  constructor(message: string, options: { kind?: ErrorKind; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "LolqaError";
    this.kind = options.kind ?? "internal";
  }
}

/** Bad caller input. Reported immediately, never retried. */
export class ValidationError extends LolqaError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, { kind: "validation" });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends LolqaError {
  constructor(message: string) {
    super(message, { kind: "not_found" });
    this.name = "NotFoundError";
  }
}

/** A collaborator (queue, embedding or chat model) could not be reached. */
export class DependencyUnavailableError extends LolqaError {
  public readonly dependency: string;

  constructor(dependency: string, message: string, cause?: unknown) {
    super(`${dependency} unavailable: ${message}`, { kind: "dependency", cause });
    this.name = "DependencyUnavailableError";
    this.dependency = dependency;
  }
}

export class IngestionError extends LolqaError {
  constructor(message: string, cause?: unknown) {
    super(message, { kind: "ingestion", cause });
    this.name = "IngestionError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isLolqaError(err: unknown): err is LolqaError {
  return err instanceof LolqaError;
}
