export class DomainError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "NotFoundError";
  }
}

export class AuthorizationError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "AuthorizationError";
  }
}

export class ConflictError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "ConflictError";
  }
}

/** The caller's own lease lapsed; the client should re-acquire it. */
export class LeaseExpiredError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "LeaseExpiredError";
  }
}

export class RateLimitedError extends DomainError {
  constructor(
    code: string,
    message: string,
    public readonly retryAfterSeconds: number
  ) {
    super(code, message);
    this.name = "RateLimitedError";
  }
}

export class UnavailableError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "UnavailableError";
  }
}
