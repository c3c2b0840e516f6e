import { describe, expect, it } from "vitest";
import { GAME_CONFIG } from "../config/game-config";
import type { LifeConfig } from "../types";
import { LifeSystem } from "./life-system";

function createLives(over: Partial<LifeConfig> = {}): LifeSystem {
  return new LifeSystem({ ...GAME_CONFIG.lives, ...over });
}

describe("life-system", () => {
  it("loses a single life for repeated hits inside one invulnerability window", () => {
    const lives = createLives();
    expect(lives.applyHit(0)).toEqual({ applied: true, depleted: false });
    expect(lives.applyHit(0.5)).toEqual({ applied: false, depleted: false });
    expect(lives.applyHit(1.99)).toEqual({ applied: false, depleted: false });
    expect(lives.currentLives).toBe(2);

    expect(lives.applyHit(2)).toEqual({ applied: true, depleted: false });
    expect(lives.currentLives).toBe(1);
  });

  it("reports depletion on the hit that takes the last life", () => {
    const lives = createLives({ maxLives: 1 });
    expect(lives.applyHit(10)).toEqual({ applied: true, depleted: true });
    expect(lives.currentLives).toBe(0);
    expect(lives.applyHit(20)).toEqual({ applied: false, depleted: false });
  });

  it("continues with one life and fresh invulnerability", () => {
    const lives = createLives({ maxLives: 1 });
    lives.applyHit(0);

    expect(lives.useContinue(5)).toBe(true);
    expect(lives.state).toEqual({
      lives: 1,
      maxLives: 1,
      invulnerableUntil: 7,
      continuesUsedThisRun: 1,
      maxContinuesPerRun: 5
    });
    expect(lives.isInvulnerable(6.9)).toBe(true);
    expect(lives.isInvulnerable(7)).toBe(false);
  });

  it("refuses continues with lives left or past the per-run limit", () => {
    const lives = createLives({ maxLives: 1, maxContinuesPerRun: 2 });
    expect(lives.useContinue(0)).toBe(false);

    let now = 0;
    for (let i = 0; i < 2; i += 1) {
      now += 10;
      lives.applyHit(now);
      expect(lives.useContinue(now)).toBe(true);
    }
    now += 10;
    lives.applyHit(now);
    expect(lives.continuesRemaining).toBe(0);
    expect(lives.useContinue(now)).toBe(false);
    expect(lives.currentLives).toBe(0);
  });

  it("adds lives up to the cap and ignores invalid amounts", () => {
    const lives = createLives();
    lives.applyHit(0);
    lives.applyHit(5);
    expect(lives.addLife(5)).toBe(2);
    expect(lives.currentLives).toBe(3);
    expect(lives.addLife(0)).toBe(0);
    expect(lives.addLife(1.5)).toBe(0);
  });

  it("applies a heart booster cap", () => {
    const lives = createLives();
    lives.setMaxLives(6);
    expect(lives.currentLives).toBe(3);
    lives.addLife(10);
    expect(lives.currentLives).toBe(6);

    lives.setMaxLives(2);
    expect(lives.currentLives).toBe(2);
    lives.setMaxLives(0);
    expect(lives.maxLives).toBe(2);
    lives.setMaxLives(9);
    expect(lives.maxLives).toBe(6);
  });

  it("lets a configured maximum above the booster cap be restored", () => {
    const lives = createLives({ maxLives: 8 });
    lives.setMaxLives(3);
    expect(lives.maxLives).toBe(3);
    expect(lives.currentLives).toBe(3);

    lives.setMaxLives(8);
    expect(lives.maxLives).toBe(8);
    lives.setMaxLives(9);
    expect(lives.maxLives).toBe(8);
  });

  it("restores run-scoped fields on reset", () => {
    const lives = createLives({ maxLives: 1 });
    lives.applyHit(0);
    lives.useContinue(1);
    lives.resetRun();
    expect(lives.state).toEqual({
      lives: 1,
      maxLives: 1,
      invulnerableUntil: null,
      continuesUsedThisRun: 0,
      maxContinuesPerRun: 5
    });
  });
});
