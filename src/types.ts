export type RunPhase = "waitingToStart" | "playing" | "paused" | "gameOver";
export type DifficultyPhase = "easy" | "medium" | "hard" | "expert";
export type ObstaclePart = "top" | "bottom";
export type ContinueSource = "ad" | "currency";

export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface WorldBounds {
  width: number;
  height: number;
  groundMargin: number;
}

export interface PhaseProfile {
  gapSize: number;
  speed: number;
  spawnInterval: number;
  obstacleTag: string;
}

export interface PlayerConfig {
  visualSize: number;
  collisionRatio: number;
  gravity: number;
  jumpVelocity: number;
  maxFallSpeed: number;
  upwardClampFactor: number;
  startXRatio: number;
  startYRatio: number;
  bobAmount: number;
  bobSpeed: number;
}

export interface ObstacleConfig {
  width: number;
  gapMargin: number;
  minSpacing: number;
  proximityBuffer: number;
}

export interface LifeConfig {
  maxLives: number;
  invulnerabilitySec: number;
  maxContinuesPerRun: number;
}

export interface TimeStepConfig {
  maxFrameDelta: number;
  maxStepDelta: number;
}

export type PhaseProfiles = Record<DifficultyPhase, PhaseProfile>;

export interface GameConfig {
  world: WorldBounds;
  player: PlayerConfig;
  obstacles: ObstacleConfig;
  lives: LifeConfig;
  timeStep: TimeStepConfig;
  phases: PhaseProfiles;
  pointsPerObstacle: number;
}

export interface PlayerState {
  position: Vec2;
  velocityY: number;
  visualSize: number;
  collisionRatio: number;
}

export interface ObstacleState {
  id: number;
  x: number;
  gapCenterY: number;
  gapSize: number;
  width: number;
  speed: number;
  scored: boolean;
  struck: boolean;
  phase: DifficultyPhase;
  obstacleTag: string;
}

export type CollisionResult =
  | { kind: "none" }
  | { kind: "obstacle"; part: ObstaclePart; obstacleId: number }
  | { kind: "ground" }
  | { kind: "ceiling" };

export interface VerticalLimits {
  minY: number;
  maxY: number;
}

export interface ScoreState {
  score: number;
  bestScore: number;
  bestStreak: number;
  phase: DifficultyPhase;
}

export interface LifeState {
  lives: number;
  maxLives: number;
  invulnerableUntil: number | null;
  continuesUsedThisRun: number;
  maxContinuesPerRun: number;
}

export interface PersistedRecords {
  bestScore: number;
  bestStreak: number;
}

export interface GameSnapshot {
  runPhase: RunPhase;
  player: PlayerState;
  renderY: number;
  obstacles: ObstacleState[];
  score: ScoreState;
  lives: LifeState;
  invulnerable: boolean;
  elapsedSec: number;
}
