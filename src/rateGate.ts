type Pending = {
  timer: ReturnType<typeof setTimeout>;
  release: () => void;
};

/**
 * Global pacing shared by every worker: one admission per `intervalMs`.
 * Each caller reserves the next free slot synchronously, so two callers can
 * never be granted the same slot.
 */
export class RateGate {
  private nextSlot: number;
  private pending = new Set<Pending>();
  private closed = false;

  constructor(
    readonly intervalMs: number,
    private readonly now: () => number = () => performance.now()
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`rate interval must be >= 0, got ${intervalMs}`);
    }
    this.nextSlot = this.now();
  }

  async acquire(): Promise<void> {
    if (this.closed || this.intervalMs === 0) return;

    const slot = Math.max(this.now(), this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    // timers may fire a little early; keep waiting until the slot is reached
    let wait = slot - this.now();
    while (wait > 0 && !this.closed) {
      await this.delay(Math.ceil(wait));
      wait = slot - this.now();
    }
  }

  // Releases every blocked caller; later acquires pass straight through
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const p of this.pending) {
      clearTimeout(p.timer);
      p.release();
    }
    this.pending.clear();
  }

  get waiting(): number {
    return this.pending.size;
  }

  private delay(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const entry: Pending = {
        timer: setTimeout(() => {
          this.pending.delete(entry);
          resolve();
        }, ms),
        release: resolve
      };
      this.pending.add(entry);
    });
  }
}
