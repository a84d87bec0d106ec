/**
 * Flags a stream as stalled when nothing arrives within `idleTimeoutMs`.
 * Every chunk (keep-alive comments included) should call `touch()`.
 */
export class IdleWatchdog {
  private timer: ReturnType<typeof setTimeout> | undefined;
  private stalled = false;

  constructor(
    private readonly idleTimeoutMs: number,
    private readonly onStall: () => void
  ) {}

  get hasStalled(): boolean {
    return this.stalled;
  }

  start(): void {
    this.stalled = false;
    this.arm();
  }

  touch(): void {
    if (this.timer === undefined) return;
    this.arm();
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private arm(): void {
    this.stop();
    if (this.idleTimeoutMs <= 0) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.stalled = true;
      this.onStall();
    }, this.idleTimeoutMs);
    this.timer.unref?.();
  }
}
