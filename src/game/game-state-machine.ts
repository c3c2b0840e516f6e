import { resolveGameConfig, type GameConfigOverrides } from "../config/game-config";
import { SystemClock, type ClockSource } from "../core/clock";
import { splitFrameDelta } from "../core/game-loop";
import { RunPhaseState, type RunEvent } from "../core/state";
import { EMPTY_RECORDS, MemoryStorage, StoragePersistenceGateway, type PersistenceGateway } from "../storage/records";
import type {
  CollisionResult,
  ContinueSource,
  DifficultyPhase,
  GameConfig,
  GameSnapshot,
  PersistedRecords,
  RunPhase
} from "../types";
import { defaultLogger, type Logger } from "../util/logger";
import type { RandomFn } from "../util/random";
import { checkCollision, verticalLimits } from "./collision-system";
import { LifeSystem } from "./life-system";
import { ObstacleField } from "./obstacle-field";
import { PlayerBody } from "./player-body";
import { ScoringSystem } from "./scoring-system";

export interface GameEvents {
  onScoreChanged?: (score: number, phase: DifficultyPhase) => void;
  onLifeChanged?: (lives: number) => void;
  onStateChanged?: (nextPhase: RunPhase, prevPhase: RunPhase) => void;
  onGameOver?: (finalScore: number, bestScore: number) => void;
  onPhaseChanged?: (phase: DifficultyPhase, prevPhase: DifficultyPhase) => void;
  onHit?: (collision: CollisionResult, livesLeft: number) => void;
  onMilestone?: (score: number, title: string) => void;
}

export interface GameStateMachineOptions {
  config?: GameConfigOverrides;
  clock?: ClockSource;
  persistence?: PersistenceGateway;
  events?: GameEvents;
  random?: RandomFn;
  logger?: Logger;
}

/**
 * Runs one game: owns every subsystem, turns input events into transitions and
 * advances the simulation from `tick`. Inputs that do not apply to the current
 * phase are ignored.
 */
export class GameStateMachine {
  readonly config: GameConfig;
  readonly player: PlayerBody;
  readonly field: ObstacleField;
  readonly scoring: ScoringSystem;
  readonly lives: LifeSystem;

  private readonly runPhase = new RunPhaseState();
  private readonly clock: ClockSource;
  private readonly persistence: PersistenceGateway;
  private readonly events: GameEvents;
  private readonly logger: Logger;
  private elapsedSec = 0;

  constructor(options: GameStateMachineOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.config = resolveGameConfig(options.config, this.logger);
    this.clock = options.clock ?? new SystemClock();
    this.persistence = options.persistence ?? new StoragePersistenceGateway(new MemoryStorage(), this.logger);
    this.events = options.events ?? {};

    this.player = new PlayerBody(this.config.player, this.config.world);
    this.field = new ObstacleField(this.config.obstacles, this.config.world, options.random, this.config.phases);
    this.scoring = new ScoringSystem(this.config.pointsPerObstacle);
    this.lives = new LifeSystem(this.config.lives);

    this.scoring.loadRecords(this.loadRecords());
    this.runPhase.onChange((next, prev) => {
      this.notify(() => this.events.onStateChanged?.(next, prev));
    });
  }

  get phase(): RunPhase {
    return this.runPhase.current;
  }

  get simulationTimeSec(): number {
    return this.elapsedSec;
  }

  tap(): void {
    if (this.runPhase.current === "playing") {
      this.jump();
      return;
    }
    if (this.runPhase.current === "waitingToStart") {
      this.start();
      return;
    }
    this.ignore("tap");
  }

  start(): void {
    if (!this.canFire("start")) {
      return;
    }
    this.resetRun();
    this.clock.deltaSinceLastTick();
    this.runPhase.fire("start");
    this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
    this.notify(() => this.events.onScoreChanged?.(0, this.scoring.phase));
  }

  jump(): void {
    if (this.runPhase.current !== "playing") {
      this.ignore("jump");
      return;
    }
    this.player.jump();
  }

  pause(): void {
    if (!this.canFire("pause")) {
      return;
    }
    this.runPhase.fire("pause");
  }

  resume(): void {
    if (!this.canFire("resume")) {
      return;
    }
    this.clock.deltaSinceLastTick();
    this.runPhase.fire("resume");
  }

  restart(): void {
    if (!this.canFire("restart")) {
      return;
    }
    this.resetRun();
    this.runPhase.fire("restart");
  }

  continueWithAd(): void {
    this.continueRun("ad");
  }

  continueWithCurrency(): void {
    this.continueRun("currency");
  }

  /** External grant (reward, purchase). Ignored after game over; continues cover that. */
  grantLife(amount = 1): void {
    if (this.runPhase.current === "gameOver") {
      this.ignore("grantLife");
      return;
    }
    if (this.lives.addLife(amount) > 0) {
      this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
    }
  }

  setMaxLives(maxLives: number): void {
    const before = this.lives.currentLives;
    this.lives.setMaxLives(maxLives);
    if (this.runPhase.current === "waitingToStart") {
      this.lives.resetRun();
    }
    if (this.lives.currentLives !== before) {
      this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
    }
  }

  tick(): void {
    const steps = splitFrameDelta(this.clock.deltaSinceLastTick(), this.config.timeStep);
    for (const dt of steps) {
      const phase = this.runPhase.current;
      if (phase === "waitingToStart") {
        this.player.updateWaiting(dt);
      } else if (phase === "playing") {
        this.step(dt);
      } else {
        return;
      }
    }
  }

  getSnapshot(): GameSnapshot {
    return {
      runPhase: this.runPhase.current,
      player: this.player.snapshot,
      renderY: this.player.renderY,
      obstacles: this.field.obstacles.map((obstacle) => ({ ...obstacle })),
      score: this.scoring.state,
      lives: this.lives.state,
      invulnerable: this.lives.isInvulnerable(this.elapsedSec),
      elapsedSec: this.elapsedSec
    };
  }

  private step(dt: number): void {
    this.elapsedSec += dt;
    const world = this.config.world;

    this.player.integrate(dt, verticalLimits(world));
    this.field.spawnTick(dt, this.scoring.phase);
    this.field.advance(dt);

    const collision = checkCollision(
      this.player.snapshot,
      this.field.obstacles,
      world,
      this.config.obstacles.proximityBuffer
    );

    let depleted = false;
    if (collision.kind === "obstacle") {
      this.markStruck(collision.obstacleId);
    }
    if (collision.kind !== "none") {
      const outcome = this.lives.applyHit(this.elapsedSec);
      if (outcome.applied) {
        depleted = outcome.depleted;
        this.notify(() => this.events.onHit?.(collision, this.lives.currentLives));
        this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
      }
    }

    this.updateScore();

    if (depleted) {
      this.endRun();
    }
  }

  /** One obstacle is one collision event, however long the contact lasts. */
  private markStruck(obstacleId: number): void {
    const obstacle = this.field.obstacles.find((candidate) => candidate.id === obstacleId);
    if (obstacle) {
      obstacle.struck = true;
    }
  }

  private updateScore(): void {
    const before = this.scoring.state;
    const scoredIds = this.scoring.onTick(this.player.x, this.field.obstacles);
    if (scoredIds.length === 0) {
      return;
    }
    const after = this.scoring.state;
    this.notify(() => this.events.onScoreChanged?.(after.score, after.phase));
    if (after.phase !== before.phase) {
      this.notify(() => this.events.onPhaseChanged?.(after.phase, before.phase));
    }
    for (const milestone of this.scoring.milestonesBetween(before.score, after.score)) {
      this.notify(() => this.events.onMilestone?.(milestone.score, milestone.title));
    }
  }

  /** Records are final before any listener sees the game-over phase. */
  private endRun(): void {
    const summary = this.scoring.finalizeRun();
    this.saveRecords();
    this.runPhase.fire("deplete");
    this.notify(() => this.events.onGameOver?.(summary.finalScore, summary.bestScore));
  }

  private continueRun(source: ContinueSource): void {
    if (!this.canFire("continue")) {
      return;
    }
    if (!this.lives.useContinue(this.elapsedSec)) {
      this.logger.debug(`Continue (${source}) refused`, {
        lives: this.lives.currentLives,
        continuesRemaining: this.lives.continuesRemaining
      });
      return;
    }
    this.player.stopVertical();
    this.clock.deltaSinceLastTick();
    this.runPhase.fire("continue");
    this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
  }

  private resetRun(): void {
    const scoreBefore = this.scoring.state.score;
    const livesBefore = this.lives.currentLives;
    this.elapsedSec = 0;
    this.scoring.resetRun();
    this.lives.resetRun();
    this.field.reset();
    this.player.reset();
    if (scoreBefore !== 0) {
      this.notify(() => this.events.onScoreChanged?.(0, this.scoring.phase));
    }
    if (this.lives.currentLives !== livesBefore) {
      this.notify(() => this.events.onLifeChanged?.(this.lives.currentLives));
    }
  }

  private loadRecords(): PersistedRecords {
    try {
      return this.persistence.load();
    } catch (error) {
      this.logger.warn("Records unavailable, starting from zero", error);
      return { ...EMPTY_RECORDS };
    }
  }

  private saveRecords(): void {
    try {
      this.persistence.save(this.scoring.records);
    } catch (error) {
      this.logger.warn("Failed to save records", error);
    }
  }

  private canFire(event: RunEvent): boolean {
    if (this.runPhase.target(event) === null) {
      this.ignore(event);
      return false;
    }
    return true;
  }

  private ignore(input: string): void {
    this.logger.debug(`Ignored ${input} while ${this.runPhase.current}`);
  }

  private notify(emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.warn("Event listener threw", error);
    }
  }
}
