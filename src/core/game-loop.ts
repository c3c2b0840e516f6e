import type { TimeStepConfig } from "../types";

/**
 * Splits one frame's elapsed time into simulation steps. Non-finite or negative
 * deltas yield no steps; spikes above `maxFrameDelta` are dropped beyond the cap.
 */
export function splitFrameDelta(rawDeltaSec: number, config: TimeStepConfig): number[] {
  if (!Number.isFinite(rawDeltaSec) || rawDeltaSec <= 0) {
    return [];
  }
  let remaining = Math.min(config.maxFrameDelta, rawDeltaSec);
  const steps: number[] = [];
  while (remaining > 1e-9) {
    const step = Math.min(config.maxStepDelta, remaining);
    steps.push(step);
    remaining -= step;
  }
  return steps;
}

export interface LoopCallbacks {
  tick: () => void;
}

/** Drives a simulation from Node, where there is no animation frame callback. */
export class GameLoop {
  private readonly callbacks: LoopCallbacks;
  private readonly frameIntervalMs: number;
  private handle: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(callbacks: LoopCallbacks, frameIntervalMs = 1000 / 60) {
    this.callbacks = callbacks;
    this.frameIntervalMs = frameIntervalMs;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.handle = setTimeout(this.frame, this.frameIntervalMs);
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  private frame = (): void => {
    if (!this.running) {
      return;
    }
    this.callbacks.tick();
    if (this.running) {
      this.handle = setTimeout(this.frame, this.frameIntervalMs);
    }
  };
}
