/**
 * Cartridge image loading and header validation.
 *
 * Header layout (0x100–0x14F): title at 0x134–0x143, header checksum at 0x14D
 * computed over 0x134–0x14C.
 */

import fs from 'node:fs/promises';
import { ResourceError, errorMessage } from '../errors.js';

export const HEADER_END = 0x150;
const TITLE_START = 0x134;
const TITLE_END = 0x144;
const CHECKSUM_START = 0x134;
const CHECKSUM_END = 0x14d;

export interface RomInfo {
  title: string;
  size: number;
}

export function headerChecksum(rom: Uint8Array): number {
  let x = 0;
  for (let i = CHECKSUM_START; i < CHECKSUM_END; i++) {
    x = (x - rom[i] - 1) & 0xff;
  }
  return x;
}

export function validateRomImage(rom: Uint8Array): RomInfo {
  if (rom.length < HEADER_END) {
    throw new ResourceError(`ROM image too small (${rom.length} bytes, need at least ${HEADER_END})`);
  }
  const expected = rom[CHECKSUM_END];
  const actual = headerChecksum(rom);
  if (actual !== expected) {
    throw new ResourceError(
      `ROM header checksum mismatch (expected 0x${expected.toString(16)}, got 0x${actual.toString(16)})`,
    );
  }

  let title = '';
  for (let i = TITLE_START; i < TITLE_END; i++) {
    const c = rom[i];
    if (c === 0) break;
    title += c >= 0x20 && c < 0x7f ? String.fromCharCode(c) : '?';
  }
  return { title: title.trim(), size: rom.length };
}

export async function loadRomImage(romPath: string): Promise<{ rom: Buffer; info: RomInfo }> {
  let rom: Buffer;
  try {
    rom = await fs.readFile(romPath);
  } catch (e) {
    throw new ResourceError(`ROM image not readable: ${romPath} (${errorMessage(e)})`, { cause: e });
  }
  return { rom, info: validateRomImage(rom) };
}
