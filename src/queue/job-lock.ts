/**
 * Single-pass lock: at most one run at a time, and a call made while a
 * run is in flight is dropped instead of queued.
 */
export class SinglePassLock {
  private current: Promise<unknown> | null = null;

  constructor(readonly name: string) {}

  get busy(): boolean {
    return this.current !== null;
  }

  /**
   * Runs `fn` unless a run is already in flight. Resolves
   * `{ ran: false }` for a collapsed call.
   */
  async tryRun<T>(fn: () => Promise<T>): Promise<{ ran: true; value: T } | { ran: false }> {
    if (this.current) {
      return { ran: false };
    }

    const run = fn();
    this.current = run;
    try {
      return { ran: true, value: await run };
    } finally {
      this.current = null;
    }
  }

  /** Resolves once the in-flight run (if any) settles. Never rejects. */
  async idle(): Promise<void> {
    const inFlight = this.current;
    if (!inFlight) return;
    await inFlight.then(
      () => undefined,
      () => undefined,
    );
  }
}
