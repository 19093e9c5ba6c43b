/**
 * Tracks detached work so shutdown can wait for it. Work is never awaited by
 * the caller that starts it and never cancelled.
 */
export class DispatchGroup {
  private inFlight = new Set<Promise<void>>();

  constructor(private readonly tag: string) {}

  get size(): number {
    return this.inFlight.size;
  }

  run(label: string, work: () => Promise<void>): void {
    const settled: Promise<void> = Promise.resolve()
      .then(work)
      .catch((err: unknown) => {
        console.error(`[${this.tag}] Dispatch for "${label}" failed:`, err);
      })
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }

  /** Like `run`, but the caller awaits the result and handles its failure. */
  track<T>(work: () => Promise<T>): Promise<T> {
    const result = Promise.resolve().then(work);
    const settled: Promise<void> = result
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
    return result;
  }

  /** Resolves once everything started so far, and anything started meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }
}
