/**
 * Checkpoint store for conversation state.
 *
 * Key pattern: {REDIS_NAMESPACE}:ckpt:{session_id}
 *
 * Each put writes the whole state under one key, so a reader sees either
 * the previous turn's state or the new one. Redis failures fall back to the
 * in-memory store and are logged, never surfaced to the turn.
 */

import { getRedis } from "../platform/redis.js";
import { getConfig, type Config } from "../config/index.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { ConversationStateSchema, type ConversationState } from "../orchestrator/types.js";

export type CheckpointStoreKind = "redis" | "memory";

export interface CheckpointStore {
  readonly kind: CheckpointStoreKind;
  get(sessionId: string): Promise<ConversationState | null>;
  put(sessionId: string, state: ConversationState): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

const KEY_PREFIX = "ckpt:";

export function checkpointKey(sessionId: string): string {
  return `${KEY_PREFIX}${sessionId}`;
}

function decode(sessionId: string, raw: string): ConversationState | null {
  try {
    const parsed = ConversationStateSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    log.warn({ session_id: sessionId, issues: parsed.error.issues.length }, "Discarding checkpoint that failed validation");
  } catch (error) {
    log.warn({ session_id: sessionId, error }, "Discarding unreadable checkpoint");
  }
  return null;
}

/**
 * In-process store. Values are kept serialized so a reload never shares
 * references with a running turn.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  readonly kind = "memory" as const;
  private readonly entries = new Map<string, { raw: string; expires: number }>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly maxEntries = 1000,
  ) {}

  async get(sessionId: string): Promise<ConversationState | null> {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;
    if (entry.expires < Date.now()) {
      this.entries.delete(sessionId);
      return null;
    }
    return decode(sessionId, entry.raw);
  }

  async put(sessionId: string, state: ConversationState): Promise<void> {
    this.entries.delete(sessionId);
    this.evictIfNeeded();
    this.entries.set(sessionId, { raw: JSON.stringify(state), expires: Date.now() + this.ttlSeconds * 1000 });
  }

  async delete(sessionId: string): Promise<void> {
    this.entries.delete(sessionId);
  }

  get size(): number {
    return this.entries.size;
  }

  // Map iteration order is insertion order, so the first keys are the oldest
  private evictIfNeeded(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (entry.expires < now) this.entries.delete(key);
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

/** The subset of the ioredis client the store uses */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

export class RedisCheckpointStore implements CheckpointStore {
  readonly kind = "redis" as const;

  constructor(
    private readonly client: KeyValueClient,
    private readonly ttlSeconds: number,
    private readonly fallback: MemoryCheckpointStore = new MemoryCheckpointStore(ttlSeconds),
  ) {}

  async get(sessionId: string): Promise<ConversationState | null> {
    try {
      const raw = await this.client.get(checkpointKey(sessionId));
      return raw === null ? this.fallback.get(sessionId) : decode(sessionId, raw);
    } catch (error) {
      this.reportFallback("get", sessionId, error);
      return this.fallback.get(sessionId);
    }
  }

  async put(sessionId: string, state: ConversationState): Promise<void> {
    try {
      await this.client.set(checkpointKey(sessionId), JSON.stringify(state), "EX", this.ttlSeconds);
      await this.fallback.delete(sessionId);
    } catch (error) {
      this.reportFallback("put", sessionId, error);
      await this.fallback.put(sessionId, state);
    }
  }

  async delete(sessionId: string): Promise<void> {
    await this.fallback.delete(sessionId);
    try {
      await this.client.del(checkpointKey(sessionId));
    } catch (error) {
      this.reportFallback("delete", sessionId, error);
    }
  }

  private reportFallback(operation: string, sessionId: string, error: unknown): void {
    log.warn({ error, session_id: sessionId, operation }, "Redis checkpoint operation failed, using in-memory fallback");
    emit(TelemetryEvents.CheckpointFallback, { operation, reason: error instanceof Error ? error.name : "unknown_error" });
  }
}

/**
 * Redis when REDIS_URL is configured and reachable, memory otherwise.
 */
export async function createCheckpointStore(cfg: Config = getConfig()): Promise<CheckpointStore> {
  const redis = await getRedis();
  if (redis) {
    return new RedisCheckpointStore(redis, cfg.checkpoint.ttlSeconds);
  }
  return new MemoryCheckpointStore(cfg.checkpoint.ttlSeconds);
}
