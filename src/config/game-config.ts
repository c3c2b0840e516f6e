import { z } from "zod";
import type { DifficultyPhase, GameConfig, PhaseProfile, PhaseProfiles } from "../types";
import { defaultLogger, type Logger } from "../util/logger";

// Speeds stay at or below 53 px/s so the spawn edge is at least 6s from the player.
export const PHASE_PROFILES: PhaseProfiles = {
  easy: {
    gapSize: 320,
    speed: 45,
    spawnInterval: 4.0,
    obstacleTag: "sky_rookie"
  },
  medium: {
    gapSize: 300,
    speed: 48,
    spawnInterval: 3.9,
    obstacleTag: "space_cadet"
  },
  hard: {
    gapSize: 290,
    speed: 50,
    spawnInterval: 3.8,
    obstacleTag: "storm_ace"
  },
  expert: {
    gapSize: 280,
    speed: 53,
    spawnInterval: 3.6,
    obstacleTag: "void_master"
  }
};

export const GAME_CONFIG: GameConfig = {
  world: {
    width: 400,
    height: 800,
    groundMargin: 50
  },
  player: {
    visualSize: 77,
    collisionRatio: 0.5,
    gravity: 1200,
    jumpVelocity: -460,
    maxFallSpeed: 500,
    upwardClampFactor: 1,
    startXRatio: 0.2,
    startYRatio: 0.3,
    bobAmount: 10,
    bobSpeed: 2
  },
  obstacles: {
    width: 75,
    gapMargin: 60,
    minSpacing: 40,
    proximityBuffer: 20
  },
  lives: {
    maxLives: 3,
    invulnerabilitySec: 2,
    maxContinuesPerRun: 5
  },
  timeStep: {
    maxFrameDelta: 0.25,
    maxStepDelta: 1 / 30
  },
  phases: PHASE_PROFILES,
  pointsPerObstacle: 1
};

export const HEART_BOOSTER_MAX_LIVES = 6;

// Highest threshold first.
export const PHASE_THRESHOLDS: ReadonlyArray<{ minScore: number; phase: DifficultyPhase }> = [
  { minScore: 100, phase: "expert" },
  { minScore: 50, phase: "hard" },
  { minScore: 25, phase: "medium" },
  { minScore: 0, phase: "easy" }
];

export const MIN_REACTION_TIME_SEC = 6;

export const MILESTONES: ReadonlyMap<number, string> = new Map([
  [1, "First Flight"],
  [3, "Getting Started"],
  [5, "Taking Flight"],
  [8, "Gaining Confidence"],
  [10, "Bronze Pilot"],
  [15, "Steady Flyer"],
  [20, "Silver Aviator"],
  [25, "Space Explorer"],
  [30, "Golden Wings"],
  [40, "Platinum Ace"],
  [50, "Storm Survivor"],
  [75, "Advanced Pilot"],
  [100, "Void Walker"],
  [150, "Legend Master"],
  [200, "Elite Commander"],
  [300, "Impossible Score"],
  [500, "Grand Master"]
]);

const PhaseProfileSchema = z.object({
  gapSize: z.number().positive(),
  speed: z.number().positive(),
  spawnInterval: z.number().positive(),
  obstacleTag: z.string().min(1)
});

const GameConfigSchema = z
  .object({
    world: z.object({
      width: z.number().positive(),
      height: z.number().positive(),
      groundMargin: z.number().nonnegative()
    }),
    player: z.object({
      visualSize: z.number().positive(),
      collisionRatio: z.number().gt(0).max(1),
      gravity: z.number().positive(),
      jumpVelocity: z.number().negative(),
      maxFallSpeed: z.number().positive(),
      upwardClampFactor: z.number().positive(),
      startXRatio: z.number().min(0).max(1),
      startYRatio: z.number().min(0).max(1),
      bobAmount: z.number().nonnegative(),
      bobSpeed: z.number().nonnegative()
    }),
    obstacles: z.object({
      width: z.number().positive(),
      gapMargin: z.number().nonnegative(),
      minSpacing: z.number().nonnegative(),
      proximityBuffer: z.number().nonnegative()
    }),
    lives: z.object({
      maxLives: z.number().int().positive(),
      invulnerabilitySec: z.number().positive(),
      maxContinuesPerRun: z.number().int().nonnegative()
    }),
    timeStep: z.object({
      maxFrameDelta: z.number().positive(),
      maxStepDelta: z.number().positive()
    }),
    phases: z.object({
      easy: PhaseProfileSchema,
      medium: PhaseProfileSchema,
      hard: PhaseProfileSchema,
      expert: PhaseProfileSchema
    }),
    pointsPerObstacle: z.number().int().positive()
  })
  .refine((config) => config.timeStep.maxStepDelta <= config.timeStep.maxFrameDelta, {
    message: "maxStepDelta must not exceed maxFrameDelta",
    path: ["timeStep", "maxStepDelta"]
  });

export interface GameConfigOverrides {
  world?: Partial<GameConfig["world"]>;
  player?: Partial<GameConfig["player"]>;
  obstacles?: Partial<GameConfig["obstacles"]>;
  lives?: Partial<GameConfig["lives"]>;
  timeStep?: Partial<GameConfig["timeStep"]>;
  phases?: Partial<Record<DifficultyPhase, Partial<PhaseProfile>>>;
  pointsPerObstacle?: number;
}

function mergePhases(base: PhaseProfiles, overrides: GameConfigOverrides["phases"] = {}): PhaseProfiles {
  return {
    easy: { ...base.easy, ...overrides.easy },
    medium: { ...base.medium, ...overrides.medium },
    hard: { ...base.hard, ...overrides.hard },
    expert: { ...base.expert, ...overrides.expert }
  };
}

function cloneConfig(config: GameConfig): GameConfig {
  return {
    world: { ...config.world },
    player: { ...config.player },
    obstacles: { ...config.obstacles },
    lives: { ...config.lives },
    timeStep: { ...config.timeStep },
    phases: mergePhases(config.phases),
    pointsPerObstacle: config.pointsPerObstacle
  };
}

/**
 * Merges overrides onto the defaults. An override set that fails validation is
 * discarded as a whole and the defaults are returned.
 */
export function resolveGameConfig(
  overrides: GameConfigOverrides = {},
  logger: Logger = defaultLogger
): GameConfig {
  const merged: GameConfig = {
    world: { ...GAME_CONFIG.world, ...overrides.world },
    player: { ...GAME_CONFIG.player, ...overrides.player },
    obstacles: { ...GAME_CONFIG.obstacles, ...overrides.obstacles },
    lives: { ...GAME_CONFIG.lives, ...overrides.lives },
    timeStep: { ...GAME_CONFIG.timeStep, ...overrides.timeStep },
    phases: mergePhases(GAME_CONFIG.phases, overrides.phases),
    pointsPerObstacle: overrides.pointsPerObstacle ?? GAME_CONFIG.pointsPerObstacle
  };

  const result = GameConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    logger.warn("Rejected config overrides, using defaults", issues);
    return cloneConfig(GAME_CONFIG);
  }
  return merged;
}
