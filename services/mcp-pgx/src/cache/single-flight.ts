export type FlightResult<T> = {
  value: T;
  shared: boolean;
};

/**
 * Collapses concurrent calls for the same key into one underlying call.
 * The key is released when that call settles, whether it resolved or not.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();
  private joined = 0;

  async run(key: string, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.inflight.get(key);
    if (existing) {
      this.joined += 1;
      return { value: await existing, shared: true };
    }

    const promise = fn().finally(() => {
      if (this.inflight.get(key) === promise) this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return { value: await promise, shared: false };
  }

  inFlight(): number {
    return this.inflight.size;
  }

  joinedCount(): number {
    return this.joined;
  }
}
