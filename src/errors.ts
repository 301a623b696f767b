/**
 * Domain errors. Each carries the HTTP status and machine-readable code the
 * error middleware responds with.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Resource is absent or owned by someone else. The two cases share one message. */
export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = "not_found";
}

export class InvalidValueError extends AppError {
  readonly status = 400;
  readonly code = "invalid_value";
}

/** Workout Mode operation that needs a running session, called without one. */
export class NoSuchStateError extends AppError {
  readonly status = 409;
  readonly code = "no_active_session";
}

export class AuthError extends AppError {
  readonly status = 401;
  readonly code = "unauthorized";
}

export class RateLimitError extends AppError {
  readonly status = 429;
  readonly code = "too_many_requests";
}
