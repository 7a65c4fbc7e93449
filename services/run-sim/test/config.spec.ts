import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config';

describe('config loader', () => {
  it('provides defaults when env is missing', () => {
    const config = loadConfig({});
    expect(config.worldPath.endsWith('fixtures/demo-world.json')).toBe(true);
    expect(config.tickHz).toBe(60);
    expect(config.scrollSpeed).toBe(4);
    expect(config.maxSeconds).toBe(600);
    expect(config.lookahead).toBe(1.5);
    expect(config.jumpTimes).toBeNull();
  });

  it('respects environment overrides', () => {
    const config = loadConfig({
      RUN_WORLD_PATH: ' worlds/level-1.json ',
      RUN_TICK_HZ: '120',
      RUN_SCROLL_SPEED: '6.5',
      RUN_MAX_SECONDS: '30',
      RUN_LOOKAHEAD: '2',
      RUN_JUMPS: '0.5, 1.25,,3',
    });
    expect(config.worldPath).toBe('worlds/level-1.json');
    expect(config.tickHz).toBe(120);
    expect(config.scrollSpeed).toBe(6.5);
    expect(config.maxSeconds).toBe(30);
    expect(config.lookahead).toBe(2);
    expect(config.jumpTimes).toEqual([0.5, 1.25, 3]);
  });

  it('falls back on unparsable or non-positive numbers', () => {
    const config = loadConfig({ RUN_TICK_HZ: 'fast', RUN_SCROLL_SPEED: '-1', RUN_MAX_SECONDS: '0' });
    expect(config.tickHz).toBe(60);
    expect(config.scrollSpeed).toBe(4);
    expect(config.maxSeconds).toBe(600);
  });

  it('treats a schedule without valid times as absent', () => {
    expect(loadConfig({ RUN_JUMPS: 'soon, -2' }).jumpTimes).toBeNull();
    expect(loadConfig({ RUN_WORLD_PATH: '   ' }).worldPath.endsWith('demo-world.json')).toBe(true);
  });
});
