import type { PlayerConfig, PlayerState, Rect, VerticalLimits, WorldBounds } from "../types";
import { clamp, squareAround } from "../util/math";

/**
 * Authoritative player physics. `position` is written by `integrate` and `reset`
 * only; the idle bob lives in a separate offset that rendering adds on top.
 */
export class PlayerBody {
  private readonly config: PlayerConfig;
  private readonly startX: number;
  private readonly startY: number;
  private readonly state: PlayerState;
  private bobTimeSec = 0;
  private bobOffset = 0;

  constructor(config: PlayerConfig, world: WorldBounds) {
    this.config = config;
    this.startX = world.width * config.startXRatio;
    this.startY = world.height * config.startYRatio;
    this.state = {
      position: { x: this.startX, y: this.startY },
      velocityY: 0,
      visualSize: config.visualSize,
      collisionRatio: config.collisionRatio
    };
  }

  get x(): number {
    return this.state.position.x;
  }

  get y(): number {
    return this.state.position.y;
  }

  get velocityY(): number {
    return this.state.velocityY;
  }

  /** Where to draw the sprite: the authoritative y plus the idle bob. */
  get renderY(): number {
    return this.state.position.y + this.bobOffset;
  }

  get hitboxSize(): number {
    return this.config.visualSize * this.config.collisionRatio;
  }

  get snapshot(): PlayerState {
    return {
      ...this.state,
      position: { ...this.state.position }
    };
  }

  reset(): void {
    this.state.position.x = this.startX;
    this.state.position.y = this.startY;
    this.state.velocityY = 0;
    this.clearBob();
  }

  clearBob(): void {
    this.bobTimeSec = 0;
    this.bobOffset = 0;
  }

  jump(): void {
    this.state.velocityY = this.config.jumpVelocity;
  }

  stopVertical(): void {
    this.state.velocityY = 0;
  }

  integrate(dt: number, limits?: VerticalLimits): void {
    this.state.velocityY += this.config.gravity * dt;
    this.state.position.y += this.state.velocityY * dt;

    const maxRise = Math.abs(this.config.jumpVelocity) * this.config.upwardClampFactor;
    this.state.velocityY = clamp(this.state.velocityY, -maxRise, this.config.maxFallSpeed);

    if (limits) {
      const clampedY = clamp(this.state.position.y, limits.minY, limits.maxY);
      if (clampedY !== this.state.position.y) {
        this.state.position.y = clampedY;
        this.state.velocityY = 0;
      }
    }
  }

  updateWaiting(dt: number): void {
    this.bobTimeSec += dt;
    this.bobOffset = Math.sin(this.bobTimeSec * this.config.bobSpeed) * this.config.bobAmount;
  }

  hitbox(): Rect {
    return squareAround(this.state.position.x, this.state.position.y, this.hitboxSize);
  }
}
