/**
 * Error taxonomy shared by the services and both transport adapters.
 *
 * Every failure the services raise on purpose is a DomainError with a `kind`.
 * Adapters translate the kind (not the concrete class) into a status code,
 * see errors/status.ts. Anything that is not a DomainError is internal.
 */

export type ErrorKind =
  | "not_found"
  | "invalid_input"
  | "unauthorized"
  | "duplicate_key"
  | "invalid_credentials"
  | "invalid_token"
  | "invalid_transition"
  | "timeout"
  | "internal";

export class DomainError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class NotFoundError extends DomainError {
  constructor(message = "resource not found", context?: Record<string, unknown>) {
    super("not_found", message, context);
    this.name = "NotFoundError";
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super("user not found", { userId });
    this.name = "UserNotFoundError";
  }
}

export class CreatorNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super("creator user not found", { userId });
    this.name = "CreatorNotFoundError";
  }
}

export class AssigneeNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super("assignee user not found", { userId });
    this.name = "AssigneeNotFoundError";
  }
}

export class InvalidInputError extends DomainError {
  constructor(message = "invalid input", context?: Record<string, unknown>) {
    super("invalid_input", message, context);
    this.name = "InvalidInputError";
  }
}

export class UnknownResourceKindError extends InvalidInputError {
  constructor(kind: string) {
    super(`unknown resource kind: ${kind}`, { kind });
    this.name = "UnknownResourceKindError";
  }
}

export class UnauthorizedError extends DomainError {
  constructor(message = "unauthorized access", context?: Record<string, unknown>) {
    super("unauthorized", message, context);
    this.name = "UnauthorizedError";
  }
}

/**
 * Raised by repositories on a unique-constraint violation. `field` names the
 * unique key that collided ("email", "username", ...).
 */
export class DuplicateKeyError extends DomainError {
  constructor(
    public readonly field: string,
    message = `duplicate value for ${field}`
  ) {
    super("duplicate_key", message, { field });
    this.name = "DuplicateKeyError";
  }
}

export class DuplicateEmailError extends DuplicateKeyError {
  constructor() {
    super("email", "email already registered");
    this.name = "DuplicateEmailError";
  }
}

export class DuplicateUsernameError extends DuplicateKeyError {
  constructor() {
    super("username", "username already taken");
    this.name = "DuplicateUsernameError";
  }
}

/** Same message for unknown login and wrong password. */
export class InvalidCredentialsError extends DomainError {
  constructor() {
    super("invalid_credentials", "invalid login credentials");
    this.name = "InvalidCredentialsError";
  }
}

/** Structural, signature and expiry failures all look the same to callers. */
export class InvalidTokenError extends DomainError {
  constructor(message = "invalid or expired token") {
    super("invalid_token", message);
    this.name = "InvalidTokenError";
  }
}

export class InvalidTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super("invalid_transition", `invalid status transition from ${from} to ${to}`, { from, to });
    this.name = "InvalidTransitionError";
  }
}

export class InternalError extends DomainError {
  constructor(message = "internal server error", cause?: unknown) {
    super("internal", message);
    this.name = "InternalError";
    this.cause = cause;
  }
}

export class HashingError extends InternalError {
  constructor(cause?: unknown) {
    super("failed to hash password", cause);
    this.name = "HashingError";
  }
}

export class SigningError extends InternalError {
  constructor(cause?: unknown) {
    super("failed to sign token", cause);
    this.name = "SigningError";
  }
}

export class RequestTimeoutError extends DomainError {
  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
    this.name = "RequestTimeoutError";
  }
}

export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof DomainError ? err.kind : "internal";
}
