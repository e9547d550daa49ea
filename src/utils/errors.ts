import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "RATE_LIMITED" | "UNAVAILABLE" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Missing or invalid startup configuration. The only fatal error class:
 * raised once before the server accepts any turn.
 */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * The caller's AbortSignal fired while a turn was running. Nothing from the
 * turn is persisted.
 */
export class TurnCancelledError extends Error {
  readonly name = "TurnCancelledError";

  constructor(
    public readonly sessionId: string,
    public readonly stage: string
  ) {
    super(`Turn for session cancelled during ${stage}`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TurnCancelledError);
    }
  }
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    { validation_errors: error.flatten() },
    requestId
  );
}

function numericProp(error: Error, key: "statusCode" | "status"): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof TurnCancelledError) {
    return buildErrorV1("UNAVAILABLE", "Turn was cancelled before completion", { recoverable: true }, requestId);
  }

  if (error instanceof Error) {
    const status = numericProp(error, "statusCode") ?? numericProp(error, "status");

    if (status === 429 || error.message.toLowerCase().includes("rate limit")) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: 60 }, requestId);
    }

    // Fastify's own 4xx errors (malformed JSON, body too large, ...)
    if (status !== undefined && status >= 400 && status < 500) {
      return buildErrorV1(status === 404 ? "NOT_FOUND" : "BAD_INPUT", error.message, undefined, requestId);
    }

    // Sanitize error message - remove potential paths, secrets and emails
    let message = error.message || "An unexpected error occurred";
    message = message.replace(/\/[\w/.@-]+/g, "[path]");
    message = message.replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]");
    message = message.replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");

    return buildErrorV1("INTERNAL", message, undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Map error code to HTTP status code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "UNAVAILABLE":
      return 503;
    case "INTERNAL":
      return 500;
  }
}
