import { MILESTONES, PHASE_PROFILES, PHASE_THRESHOLDS } from "../config/game-config";
import type { DifficultyPhase, ObstacleState, PersistedRecords, PhaseProfile, PhaseProfiles, ScoreState } from "../types";
import { hasPassed } from "./collision-system";

export function phaseForScore(score: number): DifficultyPhase {
  for (const threshold of PHASE_THRESHOLDS) {
    if (score >= threshold.minScore) {
      return threshold.phase;
    }
  }
  return "easy";
}

export function phaseProfile(phase: DifficultyPhase, profiles: PhaseProfiles = PHASE_PROFILES): PhaseProfile {
  return profiles[phase];
}

export interface Milestone {
  score: number;
  title: string;
}

export interface RunSummary {
  finalScore: number;
  bestScore: number;
  bestStreak: number;
  isNewBest: boolean;
}

export class ScoringSystem {
  private readonly pointsPerObstacle: number;
  private score = 0;
  private bestScore = 0;
  private bestStreak = 0;

  constructor(pointsPerObstacle = 1) {
    this.pointsPerObstacle = pointsPerObstacle;
  }

  get state(): ScoreState {
    return {
      score: this.score,
      bestScore: this.bestScore,
      bestStreak: this.bestStreak,
      phase: phaseForScore(this.score)
    };
  }

  get phase(): DifficultyPhase {
    return phaseForScore(this.score);
  }

  get records(): PersistedRecords {
    return { bestScore: this.bestScore, bestStreak: this.bestStreak };
  }

  loadRecords(records: PersistedRecords): void {
    this.bestScore = Math.max(0, Math.floor(records.bestScore));
    this.bestStreak = Math.max(0, Math.floor(records.bestStreak));
  }

  resetRun(): void {
    this.score = 0;
  }

  /** Marks every obstacle the player has cleared and returns their ids. */
  onTick(playerX: number, obstacles: readonly ObstacleState[]): number[] {
    const scoredIds: number[] = [];
    for (const obstacle of obstacles) {
      if (obstacle.scored || !hasPassed(playerX, obstacle)) {
        continue;
      }
      obstacle.scored = true;
      this.score += this.pointsPerObstacle;
      scoredIds.push(obstacle.id);
    }
    return scoredIds;
  }

  /** Milestones whose score lies in `(fromScore, toScore]`. */
  milestonesBetween(fromScore: number, toScore: number): Milestone[] {
    const reached: Milestone[] = [];
    MILESTONES.forEach((title, score) => {
      if (score > fromScore && score <= toScore) {
        reached.push({ score, title });
      }
    });
    return reached;
  }

  finalizeRun(): RunSummary {
    const isNewBest = this.score > this.bestScore;
    this.bestScore = Math.max(this.bestScore, this.score);
    this.bestStreak = Math.max(this.bestStreak, this.score);
    return {
      finalScore: this.score,
      bestScore: this.bestScore,
      bestStreak: this.bestStreak,
      isNewBest
    };
  }
}
