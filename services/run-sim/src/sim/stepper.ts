import {
  DEFAULT_TUNING,
  allObstacles,
  terrainHeightAt,
  type PlayerTuningT,
  type RectT,
  type WorldT,
} from '@beat/runner-spec';

import type { Logger } from '@beat/logger';

import { manualClock } from './clock';
import type { JumpController } from './controllers';
import { PlayerBody, type PlayerSnapshot } from './player-body';

export const DEFAULT_TICK_HZ = 60;
export const DEFAULT_SCROLL_SPEED = 4;
export const DEFAULT_MAX_SECONDS = 600;
const BROAD_PHASE_MARGIN = 0.5;

export interface RunOptions {
  tickHz?: number;
  scrollSpeed?: number;
  maxSeconds?: number;
  tuning?: PlayerTuningT;
  /** Called once per tick that produced damage, with the consumed hit signal. */
  onHitSignal?: (damage: number, player: PlayerSnapshot) => void;
}

export type RunOutcome = 'finished' | 'dead' | 'timeout';

export interface HitEvent {
  tick: number;
  time: number;
  x: number;
  y: number;
  damage: number;
  health: number;
}

export interface RunSummary {
  worldId: string;
  outcome: RunOutcome;
  ticks: number;
  elapsed: number;
  distance: number;
  score: number;
  displayScore: number;
  health: number;
  peakMultiplier: number;
  jumps: number;
  hits: HitEvent[];
}

/**
 * Walks the x-sorted obstacle list with a cursor that only moves forward, which holds
 * as long as the player never moves backwards.
 */
class BroadPhase {
  private cursor = 0;

  constructor(
    private readonly obstacles: readonly RectT[],
    private readonly margin: number,
  ) {}

  near(x: number, width: number): RectT[] {
    const left = x - this.margin;
    const right = x + width + this.margin;

    while (this.cursor < this.obstacles.length) {
      const candidate = this.obstacles[this.cursor];
      if (candidate.x + candidate.width >= left) {
        break;
      }
      this.cursor += 1;
    }

    const result: RectT[] = [];
    for (let i = this.cursor; i < this.obstacles.length; i += 1) {
      const obstacle = this.obstacles[i];
      if (obstacle.x > right) {
        break;
      }
      if (obstacle.x + obstacle.width >= left) {
        result.push(obstacle);
      }
    }
    return result;
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function simulateRun(
  world: WorldT,
  controller: JumpController,
  logger: Logger,
  options: RunOptions = {},
): RunSummary {
  const tickHz = positiveOr(options.tickHz, DEFAULT_TICK_HZ);
  const scrollSpeed = positiveOr(options.scrollSpeed, DEFAULT_SCROLL_SPEED);
  const maxSeconds = positiveOr(options.maxSeconds, DEFAULT_MAX_SECONDS);
  const tuning = options.tuning ?? DEFAULT_TUNING;
  const dt = 1 / tickHz;

  const clock = manualClock();
  const body = new PlayerBody({ tuning, clock, vx: scrollSpeed });
  const obstacles = allObstacles(world);
  const broadPhase = new BroadPhase(obstacles, BROAD_PHASE_MARGIN);
  const finishX = world.duration * scrollSpeed;
  const maxTicks = Math.ceil(maxSeconds * tickHz);

  const runLogger = logger.child({ worldId: world.id });
  runLogger.info(
    { obstacles: obstacles.length, finishX, tickHz, scrollSpeed },
    'Starting run',
  );

  const hits: HitEvent[] = [];
  let outcome: RunOutcome = 'timeout';
  let ticks = 0;
  let jumps = 0;
  let peakMultiplier = body.scoreMultiplier;

  while (ticks < maxTicks) {
    const view = { time: clock.now(), player: body.snapshot(), playerWidth: tuning.width, obstacles };
    if (controller.shouldJump(view) && body.requestJump()) {
      jumps += 1;
    }

    clock.advance(dt);
    // Terrain under the position the step moves to, the same x the obstacle checks use.
    body.step(dt, terrainHeightAt(world, body.position.x + body.velocity.x * dt));
    ticks += 1;

    for (const obstacle of broadPhase.near(body.position.x, tuning.width)) {
      if (!body.resolveCollision(obstacle)) {
        continue;
      }
      const damage = body.applyHit(obstacle);
      if (damage > 0) {
        hits.push({
          tick: ticks,
          time: clock.now(),
          x: body.position.x,
          y: body.position.y,
          damage,
          health: body.health,
        });
      }
      if (body.isDead) {
        break;
      }
    }

    peakMultiplier = Math.max(peakMultiplier, body.scoreMultiplier);

    const signal = body.consumeHitSignal();
    if (signal > 0) {
      runLogger.debug({ tick: ticks, damage: signal, health: body.health }, 'Player hit');
      options.onHitSignal?.(signal, body.snapshot());
    }

    if (body.isDead) {
      outcome = 'dead';
      break;
    }
    if (body.position.x >= finishX) {
      outcome = 'finished';
      break;
    }
  }

  const summary: RunSummary = {
    worldId: world.id,
    outcome,
    ticks,
    elapsed: clock.now(),
    distance: body.position.x,
    score: body.score,
    displayScore: body.displayScore,
    health: body.health,
    peakMultiplier,
    jumps,
    hits,
  };

  const level = outcome === 'finished' ? 'info' : 'warn';
  runLogger[level](
    {
      outcome,
      ticks,
      distance: summary.distance,
      score: summary.displayScore,
      health: summary.health,
      hits: hits.length,
    },
    'Run ended',
  );

  return summary;
}
