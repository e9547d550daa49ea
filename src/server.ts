// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import turnRoute from "./routes/eligibility.v1.turn.js";
import sessionRoutes from "./routes/eligibility.v1.sessions.js";
import precheckRoute from "./routes/eligibility.v1.precheck.js";
import healthRoute, { SERVICE_NAME } from "./routes/healthz.js";
import observabilityPlugin from "./plugins/observability.js";
import { assertStartupConfig, type Config } from "./config/index.js";
import { createPipeline, type CreatePipelineOptions, type EligibilityPipeline } from "./orchestrator/index.js";
import { SERVICE_VERSION } from "./version.js";
import { attachRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode, ConfigurationError } from "./utils/errors.js";
import { HTTP_CLIENT_TIMEOUT_MS, ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { closeRedis } from "./platform/redis.js";
import { flushMetrics, log } from "./utils/telemetry.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(cfg: Config): string[] {
  const origins = cfg.server.allowedOrigins ?? DEFAULT_ORIGINS;
  if (cfg.server.nodeEnv === "production" && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new ConfigurationError("ALLOWED_ORIGINS cannot contain '*' in production", ["server.allowedOrigins"]);
  }
  return origins;
}

export interface BuildOptions extends Omit<CreatePipelineOptions, "config"> {
  /** Pre-built pipeline; skips createPipeline() entirely */
  pipeline?: EligibilityPipeline;
  /** Whole-turn budget for the turn route */
  turnTimeoutMs?: number;
}

/**
 * Build and configure the Fastify instance
 * (imported by tests, or run directly below)
 */
export async function build(options: BuildOptions = {}) {
  // Fail fast: missing credentials or a bad env value never reach a turn
  const cfg = assertStartupConfig();
  const allowedOrigins = resolveAllowedOrigins(cfg);
  const pipeline = options.pipeline ?? (await createPipeline({ ...options, config: cfg }));

  const app = Fastify({
    logger: createLoggerConfig(cfg.server.logLevel),
    bodyLimit: cfg.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
  });

  await app.register(cors, {
    origin: allowedOrigins,
  });

  // Pure JSON API: CSP and cross-origin isolation headers do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  await app.register(rateLimit, {
    global: true,
    max: cfg.server.globalRateLimitRpm,
    timeWindow: "1 minute",
    addHeadersOnExceeding: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
    },
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Number.isFinite(context.ttl) ? Math.max(1, Math.ceil(context.ttl / 1000)) : 60;
      app.log.warn({ event: "rate_limit_hit", max: context.max, request_id: requestId }, "Rate limit exceeded");

      // @fastify/rate-limit needs statusCode on the body it throws
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  await app.register(observabilityPlugin);

  app.addHook("onRequest", async (request) => {
    attachRequestId(request);
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  await healthRoute(app, { pipeline, provider: cfg.llm.provider });
  await turnRoute(app, { pipeline, timeoutMs: options.turnTimeoutMs });
  await sessionRoutes(app, { pipeline });
  await precheckRoute(app);

  app.addHook("onClose", async () => {
    await closeRedis();
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const cfg = assertStartupConfig();
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          provider: cfg.llm.provider,
          strict_json: cfg.llm.strictJson,
          global_rate_limit_rpm: cfg.server.globalRateLimitRpm,
          body_limit_mb: (cfg.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: resolveAllowedOrigins(cfg),
          retriever_url: cfg.retrieval.url ? "set" : "not set",
          checkpoint_redis: cfg.checkpoint.redisUrl ? "set" : "not set",
          route_timeout_ms: ROUTE_TIMEOUT_MS,
          http_client_timeout_ms: HTTP_CLIENT_TIMEOUT_MS,
        },
        "Donor eligibility service starting"
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => flushMetrics())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error({ error }, "Shutdown failed");
            process.exit(1);
          });
      };
      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      await app.listen({ port: cfg.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      if (err instanceof ConfigurationError) {
        log.fatal({ issues: err.issues }, err.message);
      } else {
        log.fatal({ error: err }, "Failed to start server");
      }
      process.exit(1);
    });
}
