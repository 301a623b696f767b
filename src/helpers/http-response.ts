import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, AuthError } from "../errors.js";

interface ErrorBody {
  error: string;
  message: string;
}

/** PostgreSQL SQLSTATE of a driver error, if it carries one. */
export function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

/** Client error raised by express middleware itself (body too large, bad charset). */
function exposedClientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (!("status" in err) || !("expose" in err) || err.expose !== true) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status <= 499 ? status : undefined;
}

/**
 * Maps an error that is not an AppError to a status and client-safe message.
 * PostgreSQL constraint codes become client errors; connectivity problems 503.
 */
export function classifyError(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof AppError) {
    return { status: err.status, body: { error: err.code, message: err.message } };
  }

  if (err instanceof SyntaxError && "body" in err) {
    return { status: 400, body: { error: "invalid_value", message: "Request body is not valid JSON" } };
  }

  const clientStatus = exposedClientStatus(err);
  if (clientStatus !== undefined) {
    const message = err instanceof Error ? err.message : "Invalid request";
    return { status: clientStatus, body: { error: "invalid_request", message } };
  }

  const code = errorCode(err);
  if (code === "23505") {
    return { status: 409, body: { error: "conflict", message: "A duplicate entry already exists." } };
  }
  if (code === "23503") {
    return { status: 404, body: { error: "not_found", message: "Referenced record not found." } };
  }
  if (code === "23514" || code === "22003") {
    return { status: 400, body: { error: "invalid_value", message: "Value is out of the allowed range." } };
  }

  const msg = err instanceof Error ? err.message.toLowerCase() : "";
  if (msg.includes("timeout") || msg.includes("timed out") || msg.includes("econnrefused") || msg.includes("enotfound")) {
    return { status: 503, body: { error: "unavailable", message: "The service is temporarily unavailable. Please try again." } };
  }

  return { status: 500, body: { error: "internal_error", message: "An unexpected error occurred" } };
}

/**
 * Wraps an async route so a rejection reaches the error middleware instead of
 * becoming an unhandled rejection (express 4 ignores returned promises).
 */
export function asyncRoute(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => handler(req, res, next).catch(next);
}

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  const { status, body } = classifyError(err);

  if (status >= 500) {
    console.error(`[http] ${req.method} ${req.originalUrl} failed:`, err instanceof Error ? err.stack : err);
  }
  if (err instanceof AuthError) {
    res.setHeader("WWW-Authenticate", 'Bearer realm="lift-log"');
  }
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(status).json(body);
};

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: "not_found", message: `No route for ${req.method} ${req.path}` });
};
