/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * The decision pipeline never reads this module directly: routes call
 * buildPipelineConfig() once and hand the resulting value to each stage.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") {
      return undefined;
    }
    try {
      new URL(val);
      return val;
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid url`,
      });
      return z.NEVER;
    }
  });

/**
 * Comma-separated list, trimmed, empties dropped
 */
const csvList = z
  .union([z.string(), z.undefined()])
  .transform((val) =>
    val
      ? val
          .split(",")
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      : undefined
  );

const Environment = z.enum(["development", "test", "production"]);

export const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);
export type LLMProviderT = z.infer<typeof LLMProvider>;

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * PII Redaction Mode
 * - strict: standard plus capitalised two-word sequences that look like names
 * - standard: emails, phones, donor ids, numeric dates, self-introduced names
 * - off: No redaction
 *
 * Case-insensitive, defaults to "standard" for invalid values
 */
const PIIRedactionMode = z
  .union([z.string(), z.undefined()])
  .transform((val): "strict" | "standard" | "off" => {
    if (!val) return "standard";
    const lower = val.toLowerCase().trim();
    if (lower === "strict") return "strict";
    if (lower === "off") return "off";
    return "standard";
  });

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    allowedOrigins: csvList,
    globalRateLimitRpm: z.coerce.number().int().positive().default(120),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: z.string().optional(),
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: optionalUrl,
    anthropicApiKey: z.string().optional(),
    strictJson: booleanString.default(true),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),

  // Per-stage model selection (falls back to llm.model, then provider default)
  models: z.object({
    extractor: z.string().optional(),
    clarifier: z.string().optional(),
    decision: z.string().optional(),
    reflector: z.string().optional(),
  }),

  pipeline: z.object({
    historyCap: z.coerce.number().int().positive().max(6).default(6),
    maxAsks: z.coerce.number().int().positive().max(3).default(3),
    clarifierEnabled: booleanString.default(true),
    reflectionEnabled: booleanString.default(true),
    clarifyConfidenceCap: z.coerce.number().min(0).max(1).default(0.6),
    piiRedactionMode: PIIRedactionMode,
  }),

  retrieval: z.object({
    url: optionalUrl,
    timeoutMs: z.coerce.number().int().positive().default(15_000),
    faqPath: z.string().default("config/faqs.json"),
    faqMatchThreshold: z.coerce.number().min(0).max(1).default(0.72),
  }),

  checkpoint: z.object({
    redisUrl: z.string().optional(),
    redisTls: booleanString.default(false),
    namespace: z.string().default("eligibility"),
    connectTimeout: z.coerce.number().int().positive().default(10_000),
    commandTimeout: z.coerce.number().int().positive().default(5_000),
    ttlSeconds: z.coerce.number().int().positive().default(14_400),
  }),

  guardrails: z.object({
    path: z.string().default("config/guardrails.json"),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      allowedOrigins: env.ALLOWED_ORIGINS,
      globalRateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      strictJson: env.LLM_STRICT_JSON,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    models: {
      extractor: env.MODEL_EXTRACTOR,
      clarifier: env.MODEL_CLARIFIER,
      decision: env.MODEL_DECISION,
      reflector: env.MODEL_REFLECTOR,
    },
    pipeline: {
      historyCap: env.HISTORY_CAP,
      maxAsks: env.MAX_ASKS,
      clarifierEnabled: env.CLARIFIER_ENABLED,
      reflectionEnabled: env.REFLECTION_ENABLED,
      clarifyConfidenceCap: env.CLARIFY_CONFIDENCE_CAP,
      piiRedactionMode: env.PII_REDACTION_MODE,
    },
    retrieval: {
      url: env.RETRIEVER_URL,
      timeoutMs: env.RETRIEVER_TIMEOUT_MS,
      faqPath: env.FAQ_PATH,
      faqMatchThreshold: env.FAQ_MATCH_THRESHOLD,
    },
    checkpoint: {
      redisUrl: env.REDIS_URL,
      redisTls: env.REDIS_TLS,
      namespace: env.REDIS_NAMESPACE,
      connectTimeout: env.REDIS_CONNECT_TIMEOUT,
      commandTimeout: env.REDIS_COMMAND_TIMEOUT,
      ttlSeconds: env.CHECKPOINT_TTL_SECONDS,
    },
    guardrails: {
      path: env.GUARDRAILS_PATH,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid configuration. Please check environment variables.",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access. This allows tests
 * to set environment variables before the config is parsed.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },
  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },
  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },
  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}

/**
 * Fail fast at startup: credentials for the selected provider must exist.
 * This is the only place a ConfigurationError is raised deliberately; it
 * runs once in build() before any turn is accepted.
 */
export function assertStartupConfig(): Config {
  const cfg = loadConfig();

  if (cfg.llm.provider === "openai" && !cfg.llm.openaiApiKey) {
    throw new ConfigurationError("LLM_PROVIDER=openai but OPENAI_API_KEY is not set", ["llm.openaiApiKey"]);
  }
  if (cfg.llm.provider === "anthropic" && !cfg.llm.anthropicApiKey) {
    throw new ConfigurationError("LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set", ["llm.anthropicApiKey"]);
  }

  return cfg;
}
