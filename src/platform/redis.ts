/**
 * Redis Client Platform Layer
 *
 * Lazy singleton with health probe and graceful fallback.
 * Configuration via environment variables:
 * - REDIS_URL: Connection string (redis://host:port or rediss://host:port for TLS)
 * - REDIS_TLS: true|false (default: auto-detect from URL scheme)
 * - REDIS_NAMESPACE: Key prefix (default: "eligibility")
 * - REDIS_CONNECT_TIMEOUT / REDIS_COMMAND_TIMEOUT: ms
 */

import { Redis, type RedisOptions } from "ioredis";
import { log } from "../utils/telemetry.js";
import { config, isProduction } from "../config/index.js";

let redisClient: Redis | null = null;
let isInitialized = false;

// Log at most every 30s during reconnect storms
let lastReconnectLogTime = 0;
let reconnectAttemptsSinceLastLog = 0;
const RECONNECT_LOG_INTERVAL_MS = 30000;

function getRedisConfig(redisUrl: string): RedisOptions {
  const { checkpoint } = config;
  const enableTLS = checkpoint.redisTls || redisUrl.startsWith("rediss://");

  return {
    connectTimeout: checkpoint.connectTimeout,
    commandTimeout: checkpoint.commandTimeout,

    // Jittered exponential backoff, capped at 30s
    retryStrategy(times: number) {
      const delay = Math.min(times * 100, 30000) + Math.random() * 1000;

      reconnectAttemptsSinceLastLog++;
      const now = Date.now();
      if (now - lastReconnectLogTime >= RECONNECT_LOG_INTERVAL_MS || times === 1) {
        log.warn(
          { attempt: times, delay_ms: Math.round(delay), attempts_since_last_log: reconnectAttemptsSinceLastLog },
          "Redis reconnecting",
        );
        lastReconnectLogTime = now;
        reconnectAttemptsSinceLastLog = 0;
      }

      return delay;
    },

    lazyConnect: true,

    ...(enableTLS && {
      tls: {
        rejectUnauthorized: isProduction(),
      },
    }),

    keyPrefix: `${checkpoint.namespace}:`,
  };
}

async function initializeRedis(): Promise<Redis | null> {
  const redisUrl = config.checkpoint.redisUrl;
  if (!redisUrl) {
    log.info("Redis not configured (REDIS_URL not set), using in-memory checkpoints");
    isInitialized = true;
    return null;
  }

  const redisOptions = getRedisConfig(redisUrl);
  const client = new Redis(redisUrl, redisOptions);

  client.on("error", (error: Error) => {
    log.error({ error }, "Redis error");
  });
  client.on("ready", () => {
    log.info({ namespace: redisOptions.keyPrefix, tls: Boolean(redisOptions.tls) }, "Redis ready");
  });
  client.on("close", () => {
    log.warn("Redis connection closed");
  });

  try {
    await client.connect();
    await client.ping();
    redisClient = client;
    return client;
  } catch (error) {
    log.error({ error }, "Redis initialization failed, falling back to in-memory checkpoints");
    client.disconnect();
    return null;
  } finally {
    isInitialized = true;
  }
}

/**
 * Get Redis client instance (lazy initialization).
 * Returns null if Redis is not configured or failed to connect.
 */
export async function getRedis(): Promise<Redis | null> {
  if (!isInitialized) {
    return initializeRedis();
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (!redisClient) return;
  try {
    await redisClient.quit();
    log.info("Redis connection closed gracefully");
  } catch (error) {
    log.error({ error }, "Error closing Redis connection");
  } finally {
    redisClient = null;
    isInitialized = false;
  }
}
