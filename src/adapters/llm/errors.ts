/**
 * Shared error types for LLM adapter failures.
 * Unified across all adapters (OpenAI, Anthropic, fixtures).
 */

/**
 * Upstream timeout error - thrown when an LLM API call times out
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when an LLM API returns a non-2xx status
 *
 * Captures the HTTP status code, provider-specific error code, and request ID
 * for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

/**
 * The provider cannot honour a strict JSON-object response mode.
 * Callers retry once without the constraint.
 */
export class StrictJsonUnsupportedError extends Error {
  readonly name = "StrictJsonUnsupportedError";

  constructor(public readonly provider: string) {
    super(`${provider} does not support strict JSON response mode`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StrictJsonUnsupportedError);
    }
  }
}

export type UpstreamModelError = UpstreamTimeoutError | UpstreamHTTPError | StrictJsonUnsupportedError;

export function isUpstreamModelError(error: unknown): error is UpstreamModelError {
  return (
    error instanceof UpstreamTimeoutError ||
    error instanceof UpstreamHTTPError ||
    error instanceof StrictJsonUnsupportedError
  );
}

interface ProviderErrorShape {
  status?: number;
  code?: string;
  type?: string;
}

function readProviderError(error: Error): ProviderErrorShape {
  const status: unknown = Reflect.get(error, "status");
  const code: unknown = Reflect.get(error, "code");
  const type: unknown = Reflect.get(error, "type");
  return {
    status: typeof status === "number" ? status : undefined,
    code: typeof code === "string" ? code : undefined,
    type: typeof type === "string" ? type : undefined,
  };
}

/**
 * Translate an SDK/transport error into the shared taxonomy.
 * Errors that match neither timeout nor HTTP status are returned unchanged.
 */
export function toUpstreamError(
  error: unknown,
  provider: string,
  operation: string,
  elapsedMs: number,
  requestId: string
): unknown {
  if (!(error instanceof Error)) {
    return error;
  }

  const apiError = readProviderError(error);
  const isTimeout =
    error.name === "AbortError" ||
    error.name === "APIConnectionTimeoutError" ||
    apiError.code === "ETIMEDOUT" ||
    error.message.toLowerCase().includes("timeout") ||
    error.message.toLowerCase().includes("timed out");

  if (isTimeout) {
    return new UpstreamTimeoutError(
      `${provider} ${operation} timed out after ${elapsedMs}ms`,
      provider,
      operation,
      elapsedMs,
      error
    );
  }

  if (apiError.status !== undefined && apiError.status >= 400) {
    return new UpstreamHTTPError(
      `${provider} ${operation} failed: ${error.message || "unknown error"}`,
      provider,
      apiError.status,
      apiError.code ?? apiError.type,
      requestId,
      elapsedMs,
      error
    );
  }

  return error;
}
