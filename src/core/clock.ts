/** Time source for the simulation. Both values are in seconds. */
export interface ClockSource {
  now(): number;
  deltaSinceLastTick(): number;
}

export class SystemClock implements ClockSource {
  private lastTickMs: number;

  constructor(private readonly readMs: () => number = () => performance.now()) {
    this.lastTickMs = this.readMs();
  }

  now(): number {
    return this.readMs() / 1000;
  }

  deltaSinceLastTick(): number {
    const nowMs = this.readMs();
    const deltaSec = (nowMs - this.lastTickMs) / 1000;
    this.lastTickMs = nowMs;
    return deltaSec;
  }
}

/** Host- or test-driven clock: time only moves through `advance`. */
export class ManualClock implements ClockSource {
  private currentSec = 0;
  private pendingSec = 0;

  advance(deltaSec: number): void {
    this.currentSec += deltaSec;
    this.pendingSec += deltaSec;
  }

  now(): number {
    return this.currentSec;
  }

  deltaSinceLastTick(): number {
    const delta = this.pendingSec;
    this.pendingSec = 0;
    return delta;
  }
}
