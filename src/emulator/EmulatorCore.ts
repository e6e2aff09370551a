/**
 * Backend interface for the emulation driver.
 * Implemented by ServerboyCore; tests supply an in-memory core.
 */

import type { JoypadButton } from './Buttons.js';

export interface MemoryView {
  /** Unsigned byte at `address`; out-of-range reads return 0 */
  readByte(address: number): number;
}

export interface FrameBuffer {
  width: number;
  height: number;
  /** RGBA, row-major, 4 bytes per pixel */
  rgba: ArrayLike<number>;
}

export interface EmulatorCore {
  /** Load a cartridge image. Throws if the core rejects it. */
  loadRom(rom: Buffer): void;

  /** Run one frame with the given buttons held */
  stepFrame(held: readonly JoypadButton[]): void;

  /** Snapshot of addressable memory */
  memory(): MemoryView;

  frameBuffer(): FrameBuffer;

  /** Release emulator resources */
  shutdown(): void;

  /** Backend name for logging */
  readonly name: string;
}

export type EmulatorCoreFactory = () => EmulatorCore;

/** MemoryView over a plain byte array. */
export function memoryFromBytes(bytes: ArrayLike<number>): MemoryView {
  return {
    readByte(address: number): number {
      if (address < 0 || address >= bytes.length) return 0;
      return bytes[address] & 0xff;
    },
  };
}
