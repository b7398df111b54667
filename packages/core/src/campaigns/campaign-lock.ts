/**
 * Per-campaign critical section
 *
 * Operations queued on the same lock run strictly one after another, each
 * to completion. A rejected operation does not block the ones behind it.
 * Separate locks never wait on each other.
 */
export class CampaignLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  runExclusive<T>(action: () => Promise<T>): Promise<T> {
    this.queued += 1;
    const run = this.tail.then(action).finally(() => {
      this.queued -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Operations running or waiting */
  get pending(): number {
    return this.queued;
  }
}
