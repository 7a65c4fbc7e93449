import { rectTop, type RectT } from '@beat/runner-spec';

import type { PlayerSnapshot } from './player-body';

export interface ControllerView {
  time: number;
  player: PlayerSnapshot;
  playerWidth: number;
  /** Every obstacle in the world, ordered by x. */
  obstacles: readonly RectT[];
}

export interface JumpController {
  shouldJump(view: ControllerView): boolean;
}

export function scheduledJumps(times: readonly number[]): JumpController {
  const pending = times.filter((time) => Number.isFinite(time) && time >= 0).sort((a, b) => a - b);
  let cursor = 0;

  return {
    shouldJump({ time }) {
      if (cursor >= pending.length || pending[cursor] > time) {
        return false;
      }
      while (cursor < pending.length && pending[cursor] <= time) {
        cursor += 1;
      }
      return true;
    },
  };
}

export interface LookaheadOptions {
  /** Gap between the player's front edge and the obstacle at which to take off. */
  distance?: number;
}

function nextObstacleAhead(view: ControllerView): RectT | null {
  const front = view.player.x + view.playerWidth;
  for (const obstacle of view.obstacles) {
    if (obstacle.x + obstacle.width < front) {
      continue;
    }
    if (obstacle.x > view.player.x) {
      return obstacle;
    }
  }
  return null;
}

export function lookaheadJumper(options: LookaheadOptions = {}): JumpController {
  const distance = options.distance ?? 1.5;

  return {
    shouldJump(view) {
      const { player } = view;
      const next = nextObstacleAhead(view);
      if (!next || rectTop(next) <= player.y) {
        return false;
      }

      const gap = next.x - (player.x + view.playerWidth);
      if (gap > distance) {
        return false;
      }

      if (player.state.kind === 'running') {
        return true;
      }
      // Second jump once the first one starts to fall short of the obstacle.
      return player.state.kind === 'jumping' && player.vy <= 0 && player.y < rectTop(next);
    },
  };
}
