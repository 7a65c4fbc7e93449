export type PlayerState =
  | { readonly kind: 'running' }
  | { readonly kind: 'jumping' }
  | { readonly kind: 'dead'; readonly diedAt: number };

export type PlayerEvent =
  | { type: 'jump' }
  | { type: 'land' }
  | { type: 'deplete'; at: number };

export const RUNNING: PlayerState = Object.freeze({ kind: 'running' });
export const JUMPING: PlayerState = Object.freeze({ kind: 'jumping' });

export function transition(state: PlayerState, event: PlayerEvent): PlayerState {
  if (state.kind === 'dead') {
    return state;
  }

  switch (event.type) {
    case 'jump':
      return JUMPING;
    case 'land':
      return RUNNING;
    case 'deplete':
      return Object.freeze({ kind: 'dead', diedAt: event.at });
  }
}

export function isAlive(state: PlayerState): state is Exclude<PlayerState, { kind: 'dead' }> {
  return state.kind !== 'dead';
}
