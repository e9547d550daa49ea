import { Mutex } from "async-mutex";

interface LockEntry {
  mutex: Mutex;
  pending: number;
}

/**
 * Per-session mutex.
 *
 * Turns for one session id run one after another; different ids never wait
 * on each other. An id's entry is dropped once its queue drains.
 */
export class SessionLock {
  private readonly entries = new Map<string, LockEntry>();

  async run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(sessionId);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.entries.set(sessionId, entry);
    }
    entry.pending += 1;

    try {
      return await entry.mutex.runExclusive(task);
    } finally {
      entry.pending -= 1;
      if (entry.pending === 0 && this.entries.get(sessionId) === entry) {
        this.entries.delete(sessionId);
      }
    }
  }

  /** Sessions with a running or queued turn */
  get activeSessions(): number {
    return this.entries.size;
  }
}
