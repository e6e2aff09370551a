/**
 * Produces validated GameState snapshots from the running emulation.
 *
 * Reads that fail range checks (mid-transition memory, garbage during screen fades)
 * are discarded and the previous known-good snapshot is returned unchanged.
 */

import { StateExtractionWarning, errorMessage } from '../errors.js';
import type { MemoryView } from '../emulator/EmulatorCore.js';
import {
  EMPTY_RAW_STATE,
  MAX_BADGES,
  MAX_PARTY_SIZE,
  freezeState,
  type GameState,
  type RawGameState,
} from './GameState.js';

/** Title-specific decoding of raw memory. */
export interface StateReader {
  read(memory: MemoryView): RawGameState;
}

/** What the extractor needs from the driver: read-only memory and the frame counter. */
export interface ExtractionSource {
  memory(): MemoryView;
  readonly frameCount: number;
}

/** Returns the same snapshot on every read. Used when no memory layout is configured. */
export class FixedStateReader implements StateReader {
  private state: RawGameState;

  constructor(state: RawGameState = EMPTY_RAW_STATE) {
    this.state = state;
  }

  read(): RawGameState {
    return this.state;
  }
}

export function findViolations(raw: RawGameState): string[] {
  const violations: string[] = [];

  if (raw.party.length > MAX_PARTY_SIZE) {
    violations.push(`party size ${raw.party.length} > ${MAX_PARTY_SIZE}`);
  }
  for (const member of raw.party) {
    if (!Number.isInteger(member.hp) || member.hp < 0) {
      violations.push(`${member.name}: hp ${member.hp} invalid`);
    }
    if (!Number.isInteger(member.maxHp) || member.maxHp < 0) {
      violations.push(`${member.name}: maxHp ${member.maxHp} invalid`);
    }
    if (member.hp > member.maxHp) {
      violations.push(`${member.name}: hp ${member.hp} > maxHp ${member.maxHp}`);
    }
  }
  if (!Number.isInteger(raw.badges) || raw.badges < 0 || raw.badges > MAX_BADGES) {
    violations.push(`badges ${raw.badges} outside 0..${MAX_BADGES}`);
  }
  if (!Number.isFinite(raw.money) || raw.money < 0) {
    violations.push(`money ${raw.money} < 0`);
  }
  for (const item of raw.inventory) {
    if (!Number.isInteger(item.count) || item.count < 0) {
      violations.push(`${item.name}: count ${item.count} invalid`);
    }
  }
  if (raw.activeMember !== null && !raw.party.some((m) => m.name === raw.activeMember)) {
    violations.push(`active member ${raw.activeMember} not in party`);
  }

  return violations;
}

export class StateExtractor {
  private reader: StateReader;
  private lastGood: GameState;
  private nextSnapshotId = 1;
  private _rejected = 0;

  constructor(reader: StateReader) {
    this.reader = reader;
    this.lastGood = emptySnapshot();
  }

  /** Number of reads discarded since construction */
  get rejected(): number {
    return this._rejected;
  }

  get lastKnownGood(): GameState {
    return this.lastGood;
  }

  /** Forgets the last snapshot so a new session never falls back to an old one. Ids keep counting. */
  reset(): void {
    this.lastGood = emptySnapshot();
  }

  extract(source: ExtractionSource): GameState {
    let raw: RawGameState;
    try {
      raw = this.reader.read(source.memory());
    } catch (e) {
      return this.reject([`read failed: ${errorMessage(e)}`]);
    }

    const violations = findViolations(raw);
    if (violations.length > 0) {
      return this.reject(violations);
    }

    this.lastGood = freezeState({
      party: raw.party.map((m) => ({ ...m })),
      inventory: raw.inventory.map((i) => ({ ...i })),
      location: raw.location,
      badges: raw.badges,
      money: raw.money,
      activeMember: raw.activeMember,
      battleIndicator: raw.battleIndicator,
      snapshotId: this.nextSnapshotId++,
      frame: source.frameCount,
    });
    return this.lastGood;
  }

  private reject(violations: string[]): GameState {
    this._rejected++;
    const warning = new StateExtractionWarning(violations);
    console.warn(`[StateExtractor] ${warning.message}; keeping snapshot #${this.lastGood.snapshotId}`);
    return this.lastGood;
  }
}

function emptySnapshot(): GameState {
  return freezeState({ ...EMPTY_RAW_STATE, snapshotId: 0, frame: 0 });
}
