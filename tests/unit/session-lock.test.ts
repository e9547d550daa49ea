import { describe, it, expect } from "vitest";
import { SessionLock } from "../../src/orchestrator/session-lock.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("SessionLock", () => {
  it("runs turns for one session one after another", async () => {
    const lock = new SessionLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = lock.run("s1", () =>
      new Promise<void>((resolve) => {
        order.push("first:start");
        releaseFirst = () => {
          order.push("first:end");
          resolve();
        };
      }),
    );
    const second = lock.run("s1", async () => {
      order.push("second");
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    expect(lock.activeSessions).toBe(1);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.activeSessions).toBe(0);
  });

  it("does not make different sessions wait", async () => {
    const lock = new SessionLock();
    let releaseA: () => void = () => undefined;
    const a = lock.run("a", () => new Promise<string>((resolve) => (releaseA = () => resolve("a"))));

    await expect(lock.run("b", async () => "b")).resolves.toBe("b");
    expect(lock.activeSessions).toBe(1);

    releaseA();
    await expect(a).resolves.toBe("a");
  });

  it("releases the session when a turn throws", async () => {
    const lock = new SessionLock();
    await expect(
      lock.run("s1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run("s1", async () => "next")).resolves.toBe("next");
    expect(lock.activeSessions).toBe(0);
  });
});
