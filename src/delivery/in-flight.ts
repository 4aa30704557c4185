/**
 * Runs deliveries in the background so the update loop can move on to the
 * next message. There is no limit and no queue; every task starts at once.
 */
export class InFlightDeliveries {
  private readonly pending = new Set<Promise<void>>();

  run(label: string, task: () => Promise<unknown>): void {
    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          console.error(`[delivery] Unexpected failure for ${label}:`, error);
        }
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Wait for every delivery started so far. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }
}
