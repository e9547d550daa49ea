import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * to ensure both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
export type Event = Record<string, unknown>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check avoids a circular import with the config module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  TurnStarted: "eligibility.turn.started",
  TurnCompleted: "eligibility.turn.completed",
  TurnFailed: "eligibility.turn.failed",
  TurnCancelled: "eligibility.turn.cancelled",

  StageCompleted: "eligibility.stage.completed",
  StageDegraded: "eligibility.stage.degraded",

  ClarifyGated: "eligibility.clarify.gated",
  GuardrailBlocked: "eligibility.guardrail.blocked",
  SessionReset: "eligibility.session.reset",

  CheckpointSaved: "eligibility.checkpoint.saved",
  CheckpointFallback: "eligibility.checkpoint.fallback",

  LlmCallCompleted: "llm.call.completed",
  LlmCallFailed: "llm.call.failed",
  StrictJsonRetry: "llm.strict_json.retry",
  JsonExtractionRequired: "llm.json_extraction.required",

  RetrievalFailed: "retrieval.failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST || env.DD_API_KEY) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST || "127.0.0.1",
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "eligibility.",
    globalTags: {
      service: env.DD_SERVICE || "donor-eligibility-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryValue, fallback: string): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : fallback;
}

export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  // Always log to pino
  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.TurnCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("turn.duration_ms", eventData.duration_ms, {
            label: tag(eventData.label, "unknown"),
            path: tag(eventData.path, "unknown"),
          });
        }
        if (typeof eventData.confidence === "number") {
          datadogClient.histogram("turn.confidence", eventData.confidence, {
            label: tag(eventData.label, "unknown"),
          });
        }
        datadogClient.increment("turn.completed", 1, { label: tag(eventData.label, "unknown") });
        break;
      }

      case TelemetryEvents.TurnFailed:
      case TelemetryEvents.TurnCancelled: {
        datadogClient.increment(event === TelemetryEvents.TurnFailed ? "turn.failed" : "turn.cancelled", 1);
        break;
      }

      case TelemetryEvents.StageCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("stage.duration_ms", eventData.duration_ms, {
            stage: tag(eventData.stage, "unknown"),
          });
        }
        break;
      }

      case TelemetryEvents.StageDegraded: {
        datadogClient.increment("stage.degraded", 1, {
          stage: tag(eventData.stage, "unknown"),
          reason: tag(eventData.reason, "unknown"),
        });
        break;
      }

      case TelemetryEvents.ClarifyGated: {
        datadogClient.increment("clarify.gated", 1, {
          outcome: tag(eventData.outcome, "unknown"),
        });
        break;
      }

      case TelemetryEvents.GuardrailBlocked: {
        datadogClient.increment("guardrail.blocked", 1, { kind: tag(eventData.kind, "unknown") });
        break;
      }

      case TelemetryEvents.LlmCallCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("llm.duration_ms", eventData.duration_ms, {
            provider: tag(eventData.provider, "unknown"),
            stage: tag(eventData.stage, "unknown"),
          });
        }
        break;
      }

      case TelemetryEvents.LlmCallFailed:
      case TelemetryEvents.StrictJsonRetry:
      case TelemetryEvents.JsonExtractionRequired: {
        datadogClient.increment(event, 1, { stage: tag(eventData.stage, "unknown") });
        break;
      }

      default:
        // Debug-only events are not forwarded
        break;
    }
  } catch (error) {
    // Never let telemetry break the application
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
