import { z } from 'zod';

import { PlayerTuning } from './tuning';

export const Rect = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().min(0),
  height: z.number().min(0),
});

export type RectT = z.infer<typeof Rect>;

const HeightPoint = z.object({
  x: z.number(),
  height: z.number(),
});

export const OBSTACLE_BANDS = ['low', 'mid', 'high'] as const;

export const World = z.object({
  id: z.string().min(1),
  track: z.string().optional(),
  duration: z.number().gt(0),
  /** Per-world overrides of the player tuning. */
  tuning: PlayerTuning.partial().optional(),
  heightMap: z.array(HeightPoint).default([]),
  obstacles: z
    .object({
      low: z.array(Rect).default([]),
      mid: z.array(Rect).default([]),
      high: z.array(Rect).default([]),
    })
    .default({}),
});

export type WorldT = z.infer<typeof World>;

export function parseWorld(input: unknown): WorldT {
  const world = World.parse(input);
  return {
    ...world,
    heightMap: [...world.heightMap].sort((a, b) => a.x - b.x),
  };
}

export function rectTop(rect: RectT): number {
  return rect.y + rect.height;
}

export function rectArea(rect: RectT): number {
  return rect.width * rect.height;
}

/**
 * Terrain is piecewise constant: each height-map point holds until the next one.
 * Expects the height map sorted by x, as `parseWorld` leaves it.
 */
export function terrainHeightAt(world: Pick<WorldT, 'heightMap'>, x: number): number {
  let height = 0;
  for (const point of world.heightMap) {
    if (point.x > x) {
      break;
    }
    height = point.height;
  }
  return height;
}

export function allObstacles(world: Pick<WorldT, 'obstacles'>): RectT[] {
  return OBSTACLE_BANDS.flatMap((band) => world.obstacles[band]).sort((a, b) => a.x - b.x);
}
