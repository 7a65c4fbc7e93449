import { describe, expect, it } from 'vitest';

import { JUMPING, RUNNING, isAlive, transition, type PlayerState } from './player-state';

describe('sim/player-state', () => {
  it('follows the jump and land edges', () => {
    expect(transition(RUNNING, { type: 'jump' })).toEqual({ kind: 'jumping' });
    expect(transition(JUMPING, { type: 'jump' })).toEqual({ kind: 'jumping' });
    expect(transition(JUMPING, { type: 'land' })).toEqual({ kind: 'running' });
    expect(transition(RUNNING, { type: 'land' })).toEqual({ kind: 'running' });
  });

  it('records the time of death when health depletes', () => {
    const dead = transition(JUMPING, { type: 'deplete', at: 4.5 });
    expect(dead).toEqual({ kind: 'dead', diedAt: 4.5 });
    expect(Object.isFrozen(dead)).toBe(true);
  });

  it('never leaves dead', () => {
    const dead: PlayerState = { kind: 'dead', diedAt: 1 };
    expect(transition(dead, { type: 'jump' })).toBe(dead);
    expect(transition(dead, { type: 'land' })).toBe(dead);
    expect(transition(dead, { type: 'deplete', at: 9 })).toBe(dead);
    expect(isAlive(dead)).toBe(false);
    expect(isAlive(RUNNING)).toBe(true);
  });
});
