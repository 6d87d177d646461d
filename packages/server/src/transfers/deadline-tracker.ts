/**
 * Per-transfer inactivity deadlines.
 *
 * Each armed transfer has one pending timer; re-arming replaces it. The
 * expiry callback runs at most once per arm.
 */
export class DeadlineTracker {
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly timeoutMs: number;
  private readonly onExpire: (transferId: string) => void;

  constructor(timeoutMs: number, onExpire: (transferId: string) => void) {
    this.timeoutMs = timeoutMs;
    this.onExpire = onExpire;
  }

  /**
   * Start or restart the deadline for a transfer.
   */
  arm(transferId: string): void {
    this.clear(transferId);

    const timer = setTimeout(() => {
      this.timers.delete(transferId);
      this.onExpire(transferId);
    }, this.timeoutMs);

    this.timers.set(transferId, timer);
  }

  clear(transferId: string): void {
    const timer = this.timers.get(transferId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(transferId);
    }
  }

  has(transferId: string): boolean {
    return this.timers.has(transferId);
  }

  get size(): number {
    return this.timers.size;
  }

  clearAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
