import { closeLogger } from '@beat/logger';

import { loadConfig } from './config';
import { logger } from './logger';
import { runWorld } from './run';

async function main(): Promise<number> {
  const config = loadConfig();
  logger.info(
    { worldPath: config.worldPath, tickHz: config.tickHz, scrollSpeed: config.scrollSpeed },
    'Booting run simulator',
  );

  const summary = await runWorld(config, logger);
  logger.info(
    {
      outcome: summary.outcome,
      score: summary.displayScore,
      health: summary.health,
      peakMultiplier: summary.peakMultiplier,
      jumps: summary.jumps,
      hits: summary.hits.length,
    },
    'Run summary',
  );
  return summary.outcome === 'finished' ? 0 : 1;
}

main()
  .then((code) => {
    closeLogger('run-sim');
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ err: error }, 'Run simulator failed');
    closeLogger('run-sim');
    process.exitCode = 1;
  });
