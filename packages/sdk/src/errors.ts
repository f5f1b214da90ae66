export type ErrorCode = "validation" | "forbidden" | "not_found" | "infrastructure";

export class BoardchatError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BoardchatError";
    this.code = code;
  }
}

export class ValidationError extends BoardchatError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

/** Raised for missing rights, and for boards the actor cannot see at all. */
export class ForbiddenError extends BoardchatError {
  constructor(message: string) {
    super("forbidden", message);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends BoardchatError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

/** Storage or model backend failure; aborts the request. */
export class InfrastructureError extends BoardchatError {
  constructor(message: string, cause?: unknown) {
    super("infrastructure", message, { cause });
    this.name = "InfrastructureError";
  }
}

export function isDomainError(err: unknown): err is BoardchatError {
  return err instanceof BoardchatError && err.code !== "infrastructure";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
