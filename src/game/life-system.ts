import { HEART_BOOSTER_MAX_LIVES } from "../config/game-config";
import type { LifeConfig, LifeState } from "../types";

export interface HitOutcome {
  applied: boolean;
  depleted: boolean;
}

/**
 * Lives, continues and the post-hit invulnerability window. Time arguments are
 * simulation seconds; expiry is a comparison, never a scheduled callback.
 */
export class LifeSystem {
  private readonly invulnerabilitySec: number;
  private readonly maxContinuesPerRun: number;
  private readonly configuredMaxLives: number;
  private maxLivesValue: number;
  private lives: number;
  private invulnerableUntil: number | null = null;
  private continuesUsed = 0;

  constructor(config: LifeConfig) {
    this.invulnerabilitySec = config.invulnerabilitySec;
    this.maxContinuesPerRun = config.maxContinuesPerRun;
    this.configuredMaxLives = config.maxLives;
    this.maxLivesValue = config.maxLives;
    this.lives = config.maxLives;
  }

  get state(): LifeState {
    return {
      lives: this.lives,
      maxLives: this.maxLivesValue,
      invulnerableUntil: this.invulnerableUntil,
      continuesUsedThisRun: this.continuesUsed,
      maxContinuesPerRun: this.maxContinuesPerRun
    };
  }

  get currentLives(): number {
    return this.lives;
  }

  get maxLives(): number {
    return this.maxLivesValue;
  }

  get continuesRemaining(): number {
    return Math.max(0, this.maxContinuesPerRun - this.continuesUsed);
  }

  isInvulnerable(now: number): boolean {
    return this.invulnerableUntil !== null && now < this.invulnerableUntil;
  }

  canContinue(): boolean {
    return this.lives === 0 && this.continuesUsed < this.maxContinuesPerRun;
  }

  resetRun(): void {
    this.lives = this.maxLivesValue;
    this.invulnerableUntil = null;
    this.continuesUsed = 0;
  }

  applyHit(now: number): HitOutcome {
    if (this.isInvulnerable(now) || this.lives === 0) {
      return { applied: false, depleted: false };
    }
    this.lives -= 1;
    this.invulnerableUntil = now + this.invulnerabilitySec;
    return { applied: true, depleted: this.lives === 0 };
  }

  useContinue(now: number): boolean {
    if (!this.canContinue()) {
      return false;
    }
    this.lives = 1;
    this.continuesUsed += 1;
    this.invulnerableUntil = now + this.invulnerabilitySec;
    return true;
  }

  /** Returns how many lives were actually added. */
  addLife(amount = 1): number {
    if (!Number.isInteger(amount) || amount <= 0) {
      return 0;
    }
    const before = this.lives;
    this.lives = Math.min(this.lives + amount, this.maxLivesValue);
    return this.lives - before;
  }

  /**
   * Heart-booster hook: raises or lowers the cap, clamping current lives. The cap
   * never exceeds the booster maximum or the configured maximum, whichever is larger.
   */
  setMaxLives(maxLives: number): void {
    if (!Number.isInteger(maxLives) || maxLives <= 0) {
      return;
    }
    this.maxLivesValue = Math.min(maxLives, Math.max(HEART_BOOSTER_MAX_LIVES, this.configuredMaxLives));
    this.lives = Math.min(this.lives, this.maxLivesValue);
  }
}
