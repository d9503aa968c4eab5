// server/src/pacer.ts
//
// Calls `tick` every `delayMs` until it returns false or stop() is called.
// One pending timer at a time.

export class Pacer {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly tick: () => boolean) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(delayMs: number): void {
    this.stop();
    const loop = () => {
      this.timer = null;
      if (this.tick()) this.timer = setTimeout(loop, delayMs);
    };
    this.timer = setTimeout(loop, delayMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }
}
