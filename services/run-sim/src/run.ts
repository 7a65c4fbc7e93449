import { parseTuning } from '@beat/runner-spec';

import type { Logger } from '@beat/logger';

import type { RunConfig } from './config';
import { lookaheadJumper, scheduledJumps, type JumpController } from './sim/controllers';
import { simulateRun, type RunSummary } from './sim/stepper';
import { loadWorld } from './world-loader';

export function controllerFor(config: RunConfig): JumpController {
  if (config.jumpTimes) {
    return scheduledJumps(config.jumpTimes);
  }
  return lookaheadJumper({ distance: config.lookahead });
}

export async function runWorld(config: RunConfig, logger: Logger): Promise<RunSummary> {
  const world = await loadWorld(config.worldPath);
  logger.info(
    { worldId: world.id, track: world.track, duration: world.duration, controller: config.jumpTimes ? 'scheduled' : 'lookahead' },
    'World loaded',
  );

  return simulateRun(world, controllerFor(config), logger, {
    tuning: parseTuning(world.tuning),
    tickHz: config.tickHz,
    scrollSpeed: config.scrollSpeed,
    maxSeconds: config.maxSeconds,
    onHitSignal: (damage, player) => {
      logger.debug({ damage, health: player.health, x: player.x }, 'Hit signal');
    },
  });
}
