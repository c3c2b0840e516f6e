import type {
  CollisionResult,
  ObstaclePart,
  ObstacleState,
  PlayerState,
  Rect,
  VerticalLimits,
  WorldBounds
} from "../types";
import { rectsOverlap, squareAround } from "../util/math";

export const PROXIMITY_BUFFER = 20;

const NO_COLLISION: CollisionResult = { kind: "none" };

export function playerHitbox(player: PlayerState): Rect {
  return squareAround(player.position.x, player.position.y, player.visualSize * player.collisionRatio);
}

export function obstacleLeft(obstacle: ObstacleState): number {
  return obstacle.x;
}

export function obstacleRight(obstacle: ObstacleState): number {
  return obstacle.x + obstacle.width;
}

export function isNearObstacle(playerX: number, obstacle: ObstacleState, buffer = PROXIMITY_BUFFER): boolean {
  return playerX >= obstacleLeft(obstacle) - buffer && playerX <= obstacleRight(obstacle) + buffer;
}

/** The scoring condition. Passed, scored and struck obstacles are never collision-tested. */
export function hasPassed(playerX: number, obstacle: ObstacleState): boolean {
  return playerX > obstacleRight(obstacle);
}

export function obstacleRects(obstacle: ObstacleState, worldHeight: number): Record<ObstaclePart, Rect> {
  const halfGap = obstacle.gapSize / 2;
  return {
    top: {
      left: obstacleLeft(obstacle),
      top: 0,
      right: obstacleRight(obstacle),
      bottom: obstacle.gapCenterY - halfGap
    },
    bottom: {
      left: obstacleLeft(obstacle),
      top: obstacle.gapCenterY + halfGap,
      right: obstacleRight(obstacle),
      bottom: worldHeight
    }
  };
}

export function checkObstacleCollision(
  player: PlayerState,
  obstacles: readonly ObstacleState[],
  worldHeight: number,
  buffer = PROXIMITY_BUFFER
): CollisionResult {
  const hitbox = playerHitbox(player);
  const playerX = player.position.x;
  for (const obstacle of obstacles) {
    if (obstacle.scored || obstacle.struck || hasPassed(playerX, obstacle)) {
      continue;
    }
    if (!isNearObstacle(playerX, obstacle, buffer)) {
      continue;
    }
    const rects = obstacleRects(obstacle, worldHeight);
    if (rectsOverlap(hitbox, rects.top)) {
      return { kind: "obstacle", part: "top", obstacleId: obstacle.id };
    }
    if (rectsOverlap(hitbox, rects.bottom)) {
      return { kind: "obstacle", part: "bottom", obstacleId: obstacle.id };
    }
  }
  return NO_COLLISION;
}

export function groundLevel(bounds: WorldBounds): number {
  return bounds.height - bounds.groundMargin;
}

export function checkBoundsCollision(player: PlayerState, bounds: WorldBounds): CollisionResult {
  const hitbox = playerHitbox(player);
  if (hitbox.bottom > groundLevel(bounds)) {
    return { kind: "ground" };
  }
  if (hitbox.top < 0) {
    return { kind: "ceiling" };
  }
  return NO_COLLISION;
}

export function checkCollision(
  player: PlayerState,
  obstacles: readonly ObstacleState[],
  bounds: WorldBounds,
  buffer = PROXIMITY_BUFFER
): CollisionResult {
  const obstacleHit = checkObstacleCollision(player, obstacles, bounds.height, buffer);
  if (obstacleHit.kind !== "none") {
    return obstacleHit;
  }
  return checkBoundsCollision(player, bounds);
}

/**
 * Range the body centre is held in. It stays wide enough that a body resting on
 * either bound still reports the ground or ceiling contact.
 */
export function verticalLimits(bounds: WorldBounds): VerticalLimits {
  return { minY: 0, maxY: bounds.height };
}
