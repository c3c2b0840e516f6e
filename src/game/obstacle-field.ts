import { PHASE_PROFILES } from "../config/game-config";
import type { DifficultyPhase, ObstacleConfig, ObstacleState, PhaseProfiles, WorldBounds } from "../types";
import { randInRange, type RandomFn } from "../util/random";

export interface GapRange {
  min: number;
  max: number;
}

export function gapCenterRange(gapSize: number, worldHeight: number, margin: number): GapRange {
  const min = gapSize / 2 + margin;
  const max = worldHeight - gapSize / 2 - margin;
  if (max < min) {
    const middle = worldHeight / 2;
    return { min: middle, max: middle };
  }
  return { min, max };
}

export class ObstacleField {
  private readonly config: ObstacleConfig;
  private readonly world: WorldBounds;
  private readonly random: RandomFn;
  private readonly phases: PhaseProfiles;
  private nextId = 1;
  private elapsedSec = 0;

  readonly obstacles: ObstacleState[] = [];

  constructor(
    config: ObstacleConfig,
    world: WorldBounds,
    random: RandomFn = Math.random,
    phases: PhaseProfiles = PHASE_PROFILES
  ) {
    this.config = config;
    this.world = world;
    this.random = random;
    this.phases = phases;
  }

  get spawnElapsedSec(): number {
    return this.elapsedSec;
  }

  reset(): void {
    this.nextId = 1;
    this.elapsedSec = 0;
    this.obstacles.length = 0;
  }

  /**
   * Accumulates time and spawns at most one obstacle. Gap and speed come from
   * `phase` and stay frozen on the obstacle afterwards.
   */
  spawnTick(dt: number, phase: DifficultyPhase): ObstacleState | null {
    this.elapsedSec += dt;
    const profile = this.phases[phase];
    if (this.elapsedSec < profile.spawnInterval) {
      return null;
    }

    if (!this.hasRoomFor(profile.speed)) {
      return null;
    }

    const range = gapCenterRange(profile.gapSize, this.world.height, this.config.gapMargin);
    const obstacle: ObstacleState = {
      id: this.nextId++,
      x: this.world.width,
      gapCenterY: randInRange(this.random, range.min, range.max),
      gapSize: profile.gapSize,
      width: this.config.width,
      speed: profile.speed,
      scored: false,
      struck: false,
      phase,
      obstacleTag: profile.obstacleTag
    };
    this.obstacles.push(obstacle);
    this.elapsedSec = 0;
    return obstacle;
  }

  advance(dt: number): number {
    for (const obstacle of this.obstacles) {
      obstacle.x -= obstacle.speed * dt;
    }
    let removed = 0;
    for (let i = this.obstacles.length - 1; i >= 0; i -= 1) {
      const obstacle = this.obstacles[i];
      if (obstacle.x + obstacle.width < 0) {
        this.obstacles.splice(i, 1);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * A newcomer at the right edge must keep `minSpacing` to the last obstacle now
   * and, when it is faster, until the last obstacle has scrolled off.
   */
  private hasRoomFor(speed: number): boolean {
    const leader = this.obstacles[this.obstacles.length - 1];
    if (!leader) {
      return true;
    }
    const spacingNow = this.world.width - (leader.x + leader.width);
    if (spacingNow < this.config.minSpacing) {
      return false;
    }
    const closingSpeed = speed - leader.speed;
    if (closingSpeed <= 0) {
      return true;
    }
    const leaderExitSec = (leader.x + leader.width) / leader.speed;
    return spacingNow - closingSpeed * leaderExitSec >= this.config.minSpacing;
  }
}
