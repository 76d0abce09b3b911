/**
 * Process-wide gate for remote cover fetches: one fetch in flight at a
 * time, and a minimum spacing between fetches that reached the service.
 */
export class FetchGuard {
  private busy = false;
  private lastFetchAt: number | null = null;

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Take the guard without waiting. Returns false when another fetch holds it.
   */
  tryAcquire(): boolean {
    if (this.busy) return false;
    this.busy = true;
    return true;
  }

  release(): void {
    this.busy = false;
  }

  get held(): boolean {
    return this.busy;
  }

  msSinceLastFetch(): number {
    return this.lastFetchAt === null ? Number.POSITIVE_INFINITY : this.clock() - this.lastFetchAt;
  }

  isRateLimited(): boolean {
    return this.msSinceLastFetch() < this.minIntervalMs;
  }

  /**
   * Start the interval over. Only answers the service gave definitively count.
   */
  recordFetch(): void {
    this.lastFetchAt = this.clock();
  }
}
