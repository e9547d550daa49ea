import { env } from "node:process";

const MIN_TIMEOUT_MS = 1_000; // 1s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

export function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Socket-level ceiling for outbound HTTP (model providers, retriever). */
export const HTTP_CLIENT_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("HTTP_CLIENT_TIMEOUT_MS", 60_000),
);

/** Whole-turn budget; the route aborts the turn when it elapses. */
export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 120_000),
);
