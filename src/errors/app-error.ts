/**
 * Base request error with an HTTP status code.
 * Throw this (or a subclass) from a route handler and the router's
 * catch-all handler will map it to the matching HTTP response.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.details = details;
    // Restore prototype chain (required when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Convenience subclasses ─────────────────────────────────────────────

export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Source is not allowed") {
    super(403, message);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(message: string, allowedTypes?: string[]) {
    super(415, message, { allowedTypes });
    this.name = "UnsupportedMediaTypeError";
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal server error") {
    super(500, message);
    this.name = "InternalError";
  }
}

export class BadGatewayError extends AppError {
  constructor(message: string) {
    super(502, message);
    this.name = "BadGatewayError";
  }
}
