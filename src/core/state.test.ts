import { describe, expect, it } from "vitest";
import { RunPhaseState } from "./state";

describe("run-phase-state", () => {
  it("follows the run transition table", () => {
    const state = new RunPhaseState();
    expect(state.current).toBe("waitingToStart");
    expect(state.fire("start")).toBe(true);
    expect(state.fire("pause")).toBe(true);
    expect(state.fire("resume")).toBe(true);
    expect(state.fire("deplete")).toBe(true);
    expect(state.fire("continue")).toBe(true);
    expect(state.fire("deplete")).toBe(true);
    expect(state.fire("restart")).toBe(true);
    expect(state.current).toBe("waitingToStart");
  });

  it("rejects events the current phase does not accept", () => {
    const state = new RunPhaseState();
    expect(state.target("pause")).toBeNull();
    expect(state.fire("resume")).toBe(false);
    expect(state.fire("restart")).toBe(false);
    expect(state.current).toBe("waitingToStart");

    state.fire("start");
    expect(state.fire("start")).toBe(false);
    expect(state.fire("continue")).toBe(false);
    expect(state.current).toBe("playing");
  });

  it("notifies listeners until they unsubscribe", () => {
    const state = new RunPhaseState();
    const seen: string[] = [];
    const off = state.onChange((next, prev) => seen.push(`${prev}->${next}`));
    state.fire("start");
    off();
    state.fire("pause");
    expect(seen).toEqual(["waitingToStart->playing"]);
  });
});
