/**
 * Per-token mutual exclusion within this process.
 *
 * Work queued for the same token runs one after another; different tokens
 * never wait on each other. Entries are dropped once their queue drains.
 */
export class TokenLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(token: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(token) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(token, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(token) === tail) {
        this.tails.delete(token);
      }
    }
  }

  isLocked(token: string): boolean {
    return this.tails.has(token);
  }
}
