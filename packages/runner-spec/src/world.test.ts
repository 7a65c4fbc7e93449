import { describe, expect, it } from 'vitest';

import { allObstacles, parseWorld, rectArea, rectTop, terrainHeightAt } from './world';

describe('world', () => {
  it('fills missing bands and sorts the height map', () => {
    const world = parseWorld({
      id: 'w1',
      duration: 30,
      heightMap: [
        { x: 10, height: 1 },
        { x: 0, height: 0.5 },
      ],
      obstacles: { mid: [{ x: 3, y: 0, width: 1, height: 2 }] },
    });

    expect(world.heightMap.map((point) => point.x)).toEqual([0, 10]);
    expect(world.obstacles.low).toEqual([]);
    expect(world.obstacles.high).toEqual([]);
    expect(world.obstacles.mid).toHaveLength(1);
  });

  it('keeps per-world tuning overrides', () => {
    const world = parseWorld({ id: 'tuned', duration: 5, tuning: { jumpVelocity: 12 } });
    expect(world.tuning).toEqual({ jumpVelocity: 12 });
    expect(parseWorld({ id: 'plain', duration: 5 }).tuning).toBeUndefined();
  });

  it('rejects worlds without a positive duration', () => {
    expect(() => parseWorld({ id: 'w2', duration: 0 })).toThrow();
  });

  it('reads terrain as steps between height points', () => {
    const world = parseWorld({
      id: 'steps',
      duration: 10,
      heightMap: [
        { x: 2, height: 1 },
        { x: 5, height: 0.25 },
      ],
    });

    expect(terrainHeightAt(world, 0)).toBe(0);
    expect(terrainHeightAt(world, 2)).toBe(1);
    expect(terrainHeightAt(world, 4.9)).toBe(1);
    expect(terrainHeightAt(world, 7)).toBe(0.25);
  });

  it('treats an empty height map as flat ground', () => {
    expect(terrainHeightAt({ heightMap: [] }, 42)).toBe(0);
  });

  it('merges every band ordered by x', () => {
    const world = parseWorld({
      id: 'bands',
      duration: 10,
      obstacles: {
        low: [{ x: 5, y: 0, width: 1, height: 1 }],
        mid: [{ x: 1, y: 0, width: 1, height: 1 }],
        high: [{ x: 3, y: 0, width: 1, height: 1 }],
      },
    });

    expect(allObstacles(world).map((rect) => rect.x)).toEqual([1, 3, 5]);
  });

  it('computes top edge and area', () => {
    const rect = { x: 0, y: 0.5, width: 2, height: 5 };
    expect(rectTop(rect)).toBe(5.5);
    expect(rectArea(rect)).toBe(10);
  });
});
