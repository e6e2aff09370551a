/**
 * Layout-driven memory decoding.
 *
 * A layout file describes where a specific title keeps its party, inventory, badges,
 * money, location and battle flag. No layout is bundled; one is passed with --layout.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { InvalidConfigError } from '../errors.js';
import type { MemoryView } from '../emulator/EmulatorCore.js';
import type { InventoryItem, PartyMember, RawGameState } from './GameState.js';
import type { StateReader } from './StateExtractor.js';

const Address = z.number().int().min(0).max(0xffff);
/** JSON object keys are strings; ids are byte values written in decimal */
const ByteKeyedNames = z.record(z.string().regex(/^\d+$/), z.string());

export const MemoryLayoutSchema = z.object({
  /** Byte value → character for in-game text */
  charset: ByteKeyedNames,
  /** Byte that ends a name */
  textTerminator: z.number().int().min(0).max(0xff).default(0x50),
  party: z.object({
    countAddress: Address,
    baseAddress: Address,
    stride: z.number().int().min(1),
    levelOffset: z.number().int().min(0),
    /** 16-bit big-endian */
    hpOffset: z.number().int().min(0),
    /** 16-bit big-endian */
    maxHpOffset: z.number().int().min(0),
    namesAddress: Address,
    nameLength: z.number().int().min(1),
    /** Index of the member currently sent out; 0xff or out of range means none */
    activeIndexAddress: Address.optional(),
  }),
  inventory: z.object({
    countAddress: Address,
    /** Pairs of (item id, count) */
    baseAddress: Address,
    maxEntries: z.number().int().min(0).default(20),
    names: ByteKeyedNames,
  }),
  badgesAddress: Address,
  /** 3 bytes, binary-coded decimal, most significant first */
  moneyAddress: Address,
  locationAddress: Address,
  locations: ByteKeyedNames,
  battleFlagAddress: Address,
});

export type MemoryLayout = z.infer<typeof MemoryLayoutSchema>;

export function parseMemoryLayout(value: unknown): MemoryLayout {
  const parsed = MemoryLayoutSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidConfigError(`Invalid memory layout: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadMemoryLayout(filePath: string): MemoryLayout {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new InvalidConfigError(`Cannot read memory layout ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseMemoryLayout(json);
}

export function readU16(memory: MemoryView, address: number): number {
  return (memory.readByte(address) << 8) | memory.readByte(address + 1);
}

/** Decodes packed BCD; a nibble above 9 yields NaN so the extractor rejects the read. */
export function readBcd(memory: MemoryView, address: number, length: number): number {
  let value = 0;
  for (let i = 0; i < length; i++) {
    const byte = memory.readByte(address + i);
    const hi = byte >> 4;
    const lo = byte & 0x0f;
    if (hi > 9 || lo > 9) return Number.NaN;
    value = value * 100 + hi * 10 + lo;
  }
  return value;
}

export function popcount(byte: number): number {
  let count = 0;
  for (let b = byte & 0xff; b !== 0; b >>= 1) count += b & 1;
  return count;
}

export class LayoutStateReader implements StateReader {
  private layout: MemoryLayout;

  constructor(layout: MemoryLayout) {
    this.layout = layout;
  }

  read(memory: MemoryView): RawGameState {
    const { layout } = this;
    const party = this.readParty(memory);

    let activeMember: string | null = party.length > 0 ? party[0].name : null;
    if (layout.party.activeIndexAddress !== undefined) {
      const index = memory.readByte(layout.party.activeIndexAddress);
      activeMember = index < party.length ? party[index].name : null;
    }

    const locationId = memory.readByte(layout.locationAddress);

    return {
      party,
      inventory: this.readInventory(memory),
      location: layout.locations[String(locationId)] ?? `Map ${locationId}`,
      badges: popcount(memory.readByte(layout.badgesAddress)),
      money: readBcd(memory, layout.moneyAddress, 3),
      activeMember,
      battleIndicator: memory.readByte(layout.battleFlagAddress),
    };
  }

  decodeText(memory: MemoryView, address: number, maxLength: number): string {
    let text = '';
    for (let i = 0; i < maxLength; i++) {
      const byte = memory.readByte(address + i);
      if (byte === this.layout.textTerminator) break;
      text += this.layout.charset[String(byte)] ?? '?';
    }
    return text;
  }

  private readParty(memory: MemoryView): PartyMember[] {
    const p = this.layout.party;
    // An out-of-range count is passed through so validation rejects the read
    const count = memory.readByte(p.countAddress);
    const members: PartyMember[] = [];
    for (let i = 0; i < count; i++) {
      const base = p.baseAddress + i * p.stride;
      members.push({
        name: this.decodeText(memory, p.namesAddress + i * p.nameLength, p.nameLength),
        level: memory.readByte(base + p.levelOffset),
        hp: readU16(memory, base + p.hpOffset),
        maxHp: readU16(memory, base + p.maxHpOffset),
      });
    }
    return members;
  }

  private readInventory(memory: MemoryView): InventoryItem[] {
    const inv = this.layout.inventory;
    const count = Math.min(memory.readByte(inv.countAddress), inv.maxEntries);
    const items: InventoryItem[] = [];
    for (let i = 0; i < count; i++) {
      const id = memory.readByte(inv.baseAddress + i * 2);
      items.push({
        name: inv.names[String(id)] ?? `Item ${id}`,
        count: memory.readByte(inv.baseAddress + i * 2 + 1),
      });
    }
    return items;
  }
}
