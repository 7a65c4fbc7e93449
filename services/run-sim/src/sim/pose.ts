import type { PlayerSnapshot } from './player-body';

export type PoseAnimation = 'walk' | 'jump' | 'hit' | 'death';

export interface Pose {
  animation: PoseAnimation;
  frame: number;
}

export interface PoseOptions {
  paused?: boolean;
  walkFrames?: number;
}

export const WALK_FRAME_SECONDS = 0.2;
export const DEATH_FRAME_SECONDS = 0.5;
export const DEATH_FRAMES = 4;

type PoseSource = Pick<PlayerSnapshot, 'state' | 'showingHit'>;

function frameAt(elapsed: number, frameSeconds: number, frameCount: number, loop: boolean): number {
  const index = Math.floor(Math.max(0, elapsed) / frameSeconds);
  return loop ? index % frameCount : Math.min(index, frameCount - 1);
}

export function selectPose(player: PoseSource, clockTime: number, options: PoseOptions = {}): Pose {
  const { state } = player;

  if (state.kind === 'dead') {
    return {
      animation: 'death',
      frame: frameAt(clockTime - state.diedAt, DEATH_FRAME_SECONDS, DEATH_FRAMES, false),
    };
  }

  if (player.showingHit) {
    return { animation: 'hit', frame: 0 };
  }

  if (state.kind === 'running') {
    if (options.paused) {
      return { animation: 'walk', frame: 0 };
    }
    const walkFrames = Math.max(1, Math.floor(options.walkFrames ?? 4));
    return { animation: 'walk', frame: frameAt(clockTime, WALK_FRAME_SECONDS, walkFrames, true) };
  }

  return { animation: 'jump', frame: 0 };
}
