import { z } from 'zod';

export const PlayerTuning = z.object({
  width: z.number().gt(0),
  height: z.number().gt(0),
  maxHealth: z.number().int().gt(0),
  gravity: z.number().lt(0),
  jumpVelocity: z.number().gt(0),
  /** Second jumps are only allowed while |vy| is at most this, i.e. near the apex. */
  doubleJumpThreshold: z.number().min(0),
  /** Lets the player step onto obstacles of nearly the same height instead of hitting them. */
  climbThreshold: z.number().min(0),
  hitAnimationDuration: z.number().min(0),
  areaToDamage: z.number().min(0),
  minDamage: z.number().int().min(0),
  scorePerSecond: z.number().min(0),
  multiplierStep: z.number().min(0),
  maxJumps: z.number().int().min(1),
});

export type PlayerTuningT = z.infer<typeof PlayerTuning>;

export const DEFAULT_TUNING: Readonly<PlayerTuningT> = Object.freeze({
  width: 0.8,
  height: 0.8,
  maxHealth: 1000,
  gravity: -9.8 * 4,
  jumpVelocity: 10,
  doubleJumpThreshold: 6,
  climbThreshold: 0.4,
  hitAnimationDuration: 0.1,
  areaToDamage: 15,
  minDamage: 1,
  scorePerSecond: 100,
  multiplierStep: 0.5,
  maxJumps: 2,
});

export function parseTuning(overrides: unknown = {}): PlayerTuningT {
  const partial = PlayerTuning.partial().parse(overrides ?? {});
  return PlayerTuning.parse({ ...DEFAULT_TUNING, ...partial });
}
