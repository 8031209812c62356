// TurnLock: per-session lock so two turns of one conversation never interleave

export class TurnLock {
  private locks = new Map<string, Promise<void>>();

  /**
   * Acquire the lock for a session. Returns a release function.
   * If the lock is held, waits for it to be released first.
   */
  async acquire(sessionId: string): Promise<() => void> {
    while (this.locks.has(sessionId)) {
      await this.locks.get(sessionId);
    }

    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
      release = () => {
        this.locks.delete(sessionId);
        resolve();
      };
    });

    this.locks.set(sessionId, promise);
    return release;
  }

  /**
   * Run `task` while holding the session's lock
   */
  async run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(sessionId);
    try {
      return await task();
    } finally {
      release();
    }
  }
}
