import 'dotenv/config';

import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { DEFAULT_MAX_SECONDS, DEFAULT_SCROLL_SPEED, DEFAULT_TICK_HZ } from './sim/stepper';

const DEFAULT_WORLD_PATH = fileURLToPath(new URL('../fixtures/demo-world.json', import.meta.url));
const DEFAULT_LOOKAHEAD = 1.5;

const EnvSchema = z.object({
  RUN_WORLD_PATH: z.string().optional(),
  RUN_TICK_HZ: z.string().optional(),
  RUN_SCROLL_SPEED: z.string().optional(),
  RUN_MAX_SECONDS: z.string().optional(),
  RUN_LOOKAHEAD: z.string().optional(),
  RUN_JUMPS: z.string().optional(),
});

export interface RunConfig {
  worldPath: string;
  tickHz: number;
  scrollSpeed: number;
  maxSeconds: number;
  lookahead: number;
  /** Fixed jump times in seconds; when set, they replace the lookahead controller. */
  jumpTimes: number[] | null;
}

function parsePositive(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value.trim());
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseJumpTimes(value: string | undefined): number[] | null {
  if (!value) {
    return null;
  }
  const times = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => Number.parseFloat(entry))
    .filter((time) => Number.isFinite(time) && time >= 0);
  return times.length > 0 ? times : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  const parsed = EnvSchema.parse(env);
  const worldPath = parsed.RUN_WORLD_PATH?.trim();

  return {
    worldPath: worldPath && worldPath.length > 0 ? worldPath : DEFAULT_WORLD_PATH,
    tickHz: parsePositive(parsed.RUN_TICK_HZ, DEFAULT_TICK_HZ),
    scrollSpeed: parsePositive(parsed.RUN_SCROLL_SPEED, DEFAULT_SCROLL_SPEED),
    maxSeconds: parsePositive(parsed.RUN_MAX_SECONDS, DEFAULT_MAX_SECONDS),
    lookahead: parsePositive(parsed.RUN_LOOKAHEAD, DEFAULT_LOOKAHEAD),
    jumpTimes: parseJumpTimes(parsed.RUN_JUMPS),
  };
}
