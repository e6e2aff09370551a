/**
 * Normalized game state shared by the extractor, agents and observers.
 * Snapshots are frozen; each extraction supersedes the previous one.
 */

export interface PartyMember {
  name: string;
  level: number;
  hp: number;
  maxHp: number;
}

export interface InventoryItem {
  name: string;
  count: number;
}

export interface GameState {
  /** Increases by one for every accepted snapshot */
  snapshotId: number;
  /** Emulator frame count when the snapshot was read */
  frame: number;
  party: readonly PartyMember[];
  inventory: readonly InventoryItem[];
  location: string;
  badges: number;
  money: number;
  /** Name of the member currently sent out, null when the party is empty */
  activeMember: string | null;
  /** Non-zero while a battle is in progress */
  battleIndicator: number;
}

/** What a StateReader produces before validation and numbering. */
export type RawGameState = Omit<GameState, 'snapshotId' | 'frame'>;

export type Mode = 'exploring' | 'battling';

export const MAX_PARTY_SIZE = 6;
export const MAX_BADGES = 8;

export const EMPTY_RAW_STATE: RawGameState = {
  party: [],
  inventory: [],
  location: 'Unknown',
  badges: 0,
  money: 0,
  activeMember: null,
  battleIndicator: 0,
};

export function classifyMode(state: Pick<GameState, 'battleIndicator'>): Mode {
  return state.battleIndicator !== 0 ? 'battling' : 'exploring';
}

/** Deep-freezes a snapshot so consumers cannot mutate the orchestrator's copy. */
export function freezeState(state: GameState): GameState {
  for (const member of state.party) Object.freeze(member);
  for (const item of state.inventory) Object.freeze(item);
  Object.freeze(state.party);
  Object.freeze(state.inventory);
  return Object.freeze(state);
}
