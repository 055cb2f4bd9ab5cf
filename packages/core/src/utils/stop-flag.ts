/**
 * StopFlag -- one-shot signal shared between the foreground control flow and
 * the background stop-phrase monitor.
 *
 * The monitor is the only writer (`set`), the foreground the only reader
 * (`isSet` / `wait`). Once set it stays set.
 */
export class StopFlag {
  private flagged = false;
  private readonly waiters: Array<() => void> = [];

  set(): void {
    if (this.flagged) return;
    this.flagged = true;
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }

  get isSet(): boolean {
    return this.flagged;
  }

  /** Resolves once the flag is set. */
  wait(): Promise<void> {
    if (this.flagged) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
