/**
 * Process-wide working-directory lock
 *
 * Serializes code executions in FIFO order. Holders receive the directory
 * they asked for; the lock never changes the host process's cwd, the runner
 * passes the directory to the child instead.
 */

export class WorkdirLock {
  private static instance: WorkdirLock | null = null;

  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  static getInstance(): WorkdirLock {
    if (!WorkdirLock.instance) {
      WorkdirLock.instance = new WorkdirLock();
    }
    return WorkdirLock.instance;
  }

  /** Reset singleton (for testing) */
  static resetInstance(): void {
    WorkdirLock.instance = null;
  }

  /** Number of holders and waiters */
  get size(): number {
    return this.pending;
  }

  async withDirectory<T>(dir: string, fn: (dir: string) => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);
    this.pending++;

    await previous;
    try {
      return await fn(dir);
    } finally {
      this.pending--;
      release();
    }
  }
}
