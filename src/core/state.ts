import type { RunPhase } from "../types";

type Listener = (nextPhase: RunPhase, prevPhase: RunPhase) => void;

export type RunEvent = "start" | "deplete" | "pause" | "resume" | "continue" | "restart";

const TRANSITIONS: Record<RunPhase, Partial<Record<RunEvent, RunPhase>>> = {
  waitingToStart: { start: "playing" },
  playing: { deplete: "gameOver", pause: "paused" },
  paused: { resume: "playing" },
  gameOver: { continue: "playing", restart: "waitingToStart" }
};

export class RunPhaseState {
  private phase: RunPhase = "waitingToStart";
  private readonly listeners = new Set<Listener>();

  get current(): RunPhase {
    return this.phase;
  }

  target(event: RunEvent): RunPhase | null {
    return TRANSITIONS[this.phase][event] ?? null;
  }

  /** Applies `event` if the table allows it from the current phase. */
  fire(event: RunEvent): boolean {
    const nextPhase = this.target(event);
    if (nextPhase === null) {
      return false;
    }
    const previous = this.phase;
    this.phase = nextPhase;
    this.listeners.forEach((listener) => listener(nextPhase, previous));
    return true;
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
