export * from "./types";
export {
  GAME_CONFIG,
  HEART_BOOSTER_MAX_LIVES,
  MILESTONES,
  MIN_REACTION_TIME_SEC,
  PHASE_PROFILES,
  PHASE_THRESHOLDS,
  resolveGameConfig,
  type GameConfigOverrides
} from "./config/game-config";
export { ManualClock, SystemClock, type ClockSource } from "./core/clock";
export { GameLoop, splitFrameDelta, type LoopCallbacks } from "./core/game-loop";
export { RunPhaseState, type RunEvent } from "./core/state";
export {
  checkBoundsCollision,
  checkCollision,
  checkObstacleCollision,
  groundLevel,
  hasPassed,
  isNearObstacle,
  obstacleRects,
  playerHitbox,
  PROXIMITY_BUFFER,
  verticalLimits
} from "./game/collision-system";
export { GameStateMachine, type GameEvents, type GameStateMachineOptions } from "./game/game-state-machine";
export { LifeSystem, type HitOutcome } from "./game/life-system";
export { gapCenterRange, ObstacleField, type GapRange } from "./game/obstacle-field";
export { PlayerBody } from "./game/player-body";
export { phaseForScore, phaseProfile, ScoringSystem, type Milestone, type RunSummary } from "./game/scoring-system";
export {
  EMPTY_RECORDS,
  FileStorage,
  MemoryStorage,
  migrateLegacyRecords,
  RECORDS_STORAGE_KEY,
  StoragePersistenceGateway,
  type KeyValueStorage,
  type PersistenceGateway
} from "./storage/records";
export { createConsoleLogger, defaultLogger, silentLogger, type Logger } from "./util/logger";
export { randInRange, seededRandom, type RandomFn } from "./util/random";
