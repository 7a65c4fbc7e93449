import { DEFAULT_TUNING, rectArea, rectTop, type PlayerTuningT, type RectT } from '@beat/runner-spec';

import { systemClock, type Clock } from './clock';
import { RUNNING, isAlive, transition, type PlayerEvent, type PlayerState } from './player-state';

/** Obstacles are tracked by object identity, never by geometry. */
export type Obstacle = RectT;

export interface Vec2 {
  x: number;
  y: number;
}

export interface PlayerBodyOptions {
  tuning?: PlayerTuningT;
  clock?: Clock;
  position?: Vec2;
  /** Forward scroll speed, set by whoever owns the run. */
  vx?: number;
}

export interface PlayerSnapshot {
  x: number;
  y: number;
  vx: number;
  vy: number;
  state: PlayerState;
  health: number;
  score: number;
  displayScore: number;
  scoreMultiplier: number;
  jumpCount: number;
  hitAnimationTimer: number;
  showingHit: boolean;
  deathTime: number | null;
}

type LandingSurface = 'ground' | 'obstacle';

export class PlayerBody {
  readonly tuning: PlayerTuningT;

  readonly position: Vec2;

  readonly velocity: Vec2;

  private readonly clock: Clock;

  private currentState: PlayerState = RUNNING;

  private currentHealth: number;

  private currentScore = 0;

  private multiplier = 1;

  private jumps = 0;

  private hitTimer = 0;

  private pendingHitDamage = 0;

  private readonly hitObstacles = new WeakSet<Obstacle>();

  constructor(options: PlayerBodyOptions = {}) {
    this.tuning = options.tuning ?? DEFAULT_TUNING;
    this.clock = options.clock ?? systemClock;
    this.position = { x: options.position?.x ?? 0, y: options.position?.y ?? 0 };
    this.velocity = { x: options.vx ?? 0, y: 0 };
    this.currentHealth = this.tuning.maxHealth;
  }

  get state(): PlayerState {
    return this.currentState;
  }

  get health(): number {
    return this.currentHealth;
  }

  get score(): number {
    return this.currentScore;
  }

  get displayScore(): number {
    return Math.trunc(this.currentScore);
  }

  get scoreMultiplier(): number {
    return this.multiplier;
  }

  get jumpCount(): number {
    return this.jumps;
  }

  get hitAnimationTimer(): number {
    return this.hitTimer;
  }

  get showingHit(): boolean {
    return this.hitTimer > 0;
  }

  /** Damage dealt by the latest hit that has not been consumed yet. */
  get justHitDamage(): number {
    return this.pendingHitDamage;
  }

  get deathTime(): number | null {
    return this.currentState.kind === 'dead' ? this.currentState.diedAt : null;
  }

  get isDead(): boolean {
    return !isAlive(this.currentState);
  }

  /** Returns whether the jump was taken. */
  requestJump(): boolean {
    if (this.isDead) {
      return false;
    }
    if (this.jumps >= this.tuning.maxJumps || Math.abs(this.velocity.y) > this.tuning.doubleJumpThreshold) {
      return false;
    }

    this.velocity.y = this.tuning.jumpVelocity;
    this.jumps += 1;
    this.apply({ type: 'jump' });
    return true;
  }

  step(deltaTime: number, groundHeight = 0): void {
    if (this.isDead) {
      return;
    }

    this.hitTimer -= deltaTime;
    this.velocity.y += this.tuning.gravity * deltaTime;
    this.position.x += this.velocity.x * deltaTime;
    this.position.y += this.velocity.y * deltaTime;

    if (this.position.y < groundHeight) {
      this.land(groundHeight, 'ground');
    } else if (this.currentState.kind === 'jumping') {
      this.currentScore += this.tuning.scorePerSecond * deltaTime * this.multiplier;
    }
  }

  overlaps(rect: RectT): boolean {
    const { x, y } = this.position;
    return (
      rect.x <= x + this.tuning.width &&
      rect.x + rect.width >= x &&
      rect.y <= y + this.tuning.height &&
      rectTop(rect) >= y
    );
  }

  /**
   * Returns true for a blocking collision, which the caller follows up with `applyHit`.
   * Falling onto the top of the rectangle, or onto a top no more than the climb
   * threshold above the player's feet, lands on it instead.
   */
  resolveCollision(rect: RectT): boolean {
    if (this.isDead || !this.overlaps(rect)) {
      return false;
    }

    const top = rectTop(rect);
    if (this.position.y > top - this.tuning.climbThreshold && this.velocity.y <= 0) {
      this.land(top, 'obstacle');
      return false;
    }

    return true;
  }

  /** Returns the damage dealt, 0 when the obstacle was already charged. */
  applyHit(obstacle: Obstacle): number {
    if (this.isDead) {
      return 0;
    }

    this.hitTimer = this.tuning.hitAnimationDuration;

    if (this.hitObstacles.has(obstacle)) {
      return 0;
    }
    this.hitObstacles.add(obstacle);
    this.multiplier = 1;

    const damage = this.damageFor(obstacle);
    this.currentHealth = Math.max(0, this.currentHealth - damage);
    this.pendingHitDamage = damage;

    if (this.currentHealth === 0) {
      this.velocity.x = 0;
      this.velocity.y = 0;
      this.apply({ type: 'deplete', at: this.clock.now() });
    }

    return damage;
  }

  consumeHitSignal(): number {
    const damage = this.pendingHitDamage;
    this.pendingHitDamage = 0;
    return damage;
  }

  /** Lets a recycled obstacle instance deal damage again. */
  releaseObstacle(obstacle: Obstacle): void {
    this.hitObstacles.delete(obstacle);
  }

  snapshot(): PlayerSnapshot {
    return {
      x: this.position.x,
      y: this.position.y,
      vx: this.velocity.x,
      vy: this.velocity.y,
      state: this.currentState,
      health: this.currentHealth,
      score: this.currentScore,
      displayScore: this.displayScore,
      scoreMultiplier: this.multiplier,
      jumpCount: this.jumps,
      hitAnimationTimer: this.hitTimer,
      showingHit: this.showingHit,
      deathTime: this.deathTime,
    };
  }

  private damageFor(obstacle: Obstacle): number {
    const { areaToDamage, minDamage } = this.tuning;
    const damage = Math.max(minDamage, Math.round(rectArea(obstacle) * areaToDamage));

    if (this.velocity.y <= 0 || obstacle.height <= 0) {
      return damage;
    }

    // Clipping an obstacle on the way up, high above its base, hurts less than running into it.
    const scale = Math.min(1, Math.max(0, 1 - (this.position.y - obstacle.y) / obstacle.height));
    return Math.max(minDamage, Math.round(damage * scale));
  }

  private land(height: number, surface: LandingSurface): void {
    if (surface === 'ground' || height <= 0) {
      this.multiplier = 1;
    } else if (this.currentState.kind === 'jumping') {
      this.multiplier += this.tuning.multiplierStep;
    }

    this.apply({ type: 'land' });
    this.velocity.y = 0;
    this.position.y = height;
    this.jumps = 0;
  }

  private apply(event: PlayerEvent): void {
    this.currentState = transition(this.currentState, event);
  }
}
