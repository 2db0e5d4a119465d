/**
 * Runs handlers strictly one at a time, in submission order. A failing handler rejects only its own
 * promise; the queue moves on to the next one.
 */
export class EventQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(label: string, handler: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(async () => {
      console.info(`Handling event ${label}`);
      try {
        return await handler();
      } finally {
        this.pending -= 1;
      }
    });

    // The submitter receives the rejection through `result`; the chain itself keeps going.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }
}
