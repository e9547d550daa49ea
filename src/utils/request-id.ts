import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Extract request ID from incoming headers or generate a new one
 */
export function getOrGenerateRequestId(request: FastifyRequest): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === "string" && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}

const requestIds = new WeakMap<FastifyRequest, string>();

/**
 * Attach request ID to Fastify request object
 */
export function attachRequestId(request: FastifyRequest): string {
  const requestId = getOrGenerateRequestId(request);
  requestIds.set(request, requestId);
  return requestId;
}

/**
 * Get request ID from Fastify request (attached in onRequest, else generated)
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return "unknown";
  }
  return requestIds.get(request) ?? attachRequestId(request);
}
