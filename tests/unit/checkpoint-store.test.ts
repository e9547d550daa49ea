import { describe, it, expect, vi, afterEach } from "vitest";
import {
  MemoryCheckpointStore,
  RedisCheckpointStore,
  checkpointKey,
  type KeyValueClient,
} from "../../src/services/checkpoint-store.js";
import { createEmptyState } from "../../src/orchestrator/state.js";
import type { ConversationState } from "../../src/orchestrator/types.js";

function stateWith(question: string): ConversationState {
  return { ...createEmptyState(), question, history: [question], turn_count: 1 };
}

class MapClient implements KeyValueClient {
  readonly values = new Map<string, string>();
  readonly set = vi.fn(async (key: string, value: string, _token: "EX", _seconds: number) => {
    this.values.set(key, value);
    return "OK";
  });

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async del(key: string): Promise<number> {
    return this.values.delete(key) ? 1 : 0;
  }
}

class DownClient implements KeyValueClient {
  async get(): Promise<string | null> {
    throw new Error("ECONNREFUSED");
  }
  async set(): Promise<unknown> {
    throw new Error("ECONNREFUSED");
  }
  async del(): Promise<number> {
    throw new Error("ECONNREFUSED");
  }
}

describe("MemoryCheckpointStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns a copy of what was stored", async () => {
    const store = new MemoryCheckpointStore(60);
    const state = stateWith("Can I donate?");
    await store.put("s1", state);

    const loaded = await store.get("s1");
    expect(loaded).toEqual(state);
    expect(loaded).not.toBe(state);
    await expect(store.get("other")).resolves.toBeNull();
  });

  it("expires entries after the ttl", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-06-01T12:00:00Z"));
    const store = new MemoryCheckpointStore(10);
    await store.put("s1", stateWith("q"));

    vi.setSystemTime(new Date("2024-06-01T12:00:11Z"));
    await expect(store.get("s1")).resolves.toBeNull();
  });

  it("evicts the oldest entry past the cap", async () => {
    const store = new MemoryCheckpointStore(60, 2);
    await store.put("a", stateWith("a"));
    await store.put("b", stateWith("b"));
    await store.put("c", stateWith("c"));

    expect(store.size).toBe(2);
    await expect(store.get("a")).resolves.toBeNull();
    expect((await store.get("c"))?.question).toBe("c");
  });

  it("deletes", async () => {
    const store = new MemoryCheckpointStore(60);
    await store.put("s1", stateWith("q"));
    await store.delete("s1");
    await expect(store.get("s1")).resolves.toBeNull();
  });
});

describe("RedisCheckpointStore", () => {
  it("writes the whole state under one key with a ttl", async () => {
    const client = new MapClient();
    const store = new RedisCheckpointStore(client, 900);
    const state = stateWith("Can I donate?");

    await store.put("s1", state);

    expect(client.set).toHaveBeenCalledWith("ckpt:s1", JSON.stringify(state), "EX", 900);
    await expect(store.get("s1")).resolves.toEqual(state);
  });

  it("discards a stored value that fails validation", async () => {
    const client = new MapClient();
    client.values.set(checkpointKey("s1"), JSON.stringify({ history: "not a list" }));
    await expect(new RedisCheckpointStore(client, 900).get("s1")).resolves.toBeNull();
  });

  it("falls back to memory when redis is down", async () => {
    const fallback = new MemoryCheckpointStore(900);
    const store = new RedisCheckpointStore(new DownClient(), 900, fallback);
    const state = stateWith("Can I donate?");

    await store.put("s1", state);
    expect(fallback.size).toBe(1);
    await expect(store.get("s1")).resolves.toEqual(state);

    await store.delete("s1");
    expect(fallback.size).toBe(0);
  });
});
