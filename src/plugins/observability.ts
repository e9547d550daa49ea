import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { env } from "node:process";
import { getRequestId } from "../utils/request-id.js";
import { safeLog } from "../utils/redaction.js";

/**
 * Observability Plugin
 *
 * Structured request logging:
 * - Request/response sampling (INFO_SAMPLE_RATE, default 0.1)
 * - Redaction of donor PII and auth headers
 * - Duration tracking
 */

const INFO_SAMPLE_RATE = Number(env.INFO_SAMPLE_RATE) || 0.1;

const startTimes = new WeakMap<FastifyRequest, number>();

/**
 * Always log errors (4xx, 5xx), sample successful requests.
 */
function shouldSampleInfoLog(statusCode: number): boolean {
  if (statusCode >= 400) return true;
  return Math.random() < INFO_SAMPLE_RATE;
}

function elapsed(request: FastifyRequest): number {
  return Date.now() - (startTimes.get(request) ?? Date.now());
}

async function observabilityPlugin(fastify: FastifyInstance) {
  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    if (!startTimes.has(request)) {
      startTimes.set(request, Date.now());
    }
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    if (!shouldSampleInfoLog(statusCode)) {
      return;
    }

    const safeData = safeLog({
      request_id: getRequestId(request),
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: elapsed(request),
      user_agent: request.headers["user-agent"],
    });

    if (statusCode >= 500) {
      fastify.log.error(safeData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(safeData, "Request completed with client error");
    } else {
      fastify.log.info(safeData, "Request completed");
    }
  });

  fastify.addHook("onError", async (request: FastifyRequest, _reply: FastifyReply, error: Error) => {
    fastify.log.error(
      safeLog({
        request_id: getRequestId(request),
        method: request.method,
        url: request.url,
        duration_ms: elapsed(request),
        error: {
          name: error.name,
          message: error.message,
          // Stacks stay out of logs unless explicitly enabled
          ...(env.LOG_STACK === "1" ? { stack: error.stack } : {}),
        },
      }),
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});
