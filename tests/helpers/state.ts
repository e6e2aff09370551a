import { freezeState, type GameState } from '../../src/state/GameState.js';

export function makeState(overrides: Partial<GameState> = {}): GameState {
  return freezeState({
    snapshotId: 1,
    frame: 0,
    party: [
      { name: 'ZAP', level: 5, hp: 20, maxHp: 20 },
      { name: 'ROCK', level: 3, hp: 5, maxHp: 18 },
    ],
    inventory: [{ name: 'Potion', count: 1 }],
    location: 'Home Town',
    badges: 0,
    money: 3000,
    activeMember: 'ZAP',
    battleIndicator: 0,
    ...overrides,
  });
}
