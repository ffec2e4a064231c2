/**
 * Runs async critical sections one at a time, in the order they were
 * requested.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Number of sections queued or running */
  get pending(): number {
    return this.waiting;
  }

  async runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;

    try {
      await previous;
      return await section();
    } finally {
      this.waiting--;
      release();
    }
  }
}
