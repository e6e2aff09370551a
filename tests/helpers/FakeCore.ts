import type { JoypadButton } from '../../src/emulator/Buttons.js';
import { memoryFromBytes, type EmulatorCore, type FrameBuffer, type MemoryView } from '../../src/emulator/EmulatorCore.js';

/** In-memory EmulatorCore that records every stepped frame. */
export class FakeCore implements EmulatorCore {
  readonly name = 'fake';
  readonly ram = new Uint8Array(0x10000);
  /** Buttons held on each stepped frame, in order */
  readonly frames: JoypadButton[][] = [];
  loadedRom: Buffer | null = null;
  shutDown = false;
  rejectRom = false;
  /** Called after each frame with the number of frames stepped so far */
  onStep: ((frame: number) => void) | null = null;

  loadRom(rom: Buffer): void {
    if (this.rejectRom) throw new Error('bad cartridge type');
    this.loadedRom = rom;
  }

  stepFrame(held: readonly JoypadButton[]): void {
    this.frames.push([...held]);
    this.onStep?.(this.frames.length);
  }

  memory(): MemoryView {
    return memoryFromBytes(this.ram);
  }

  frameBuffer(): FrameBuffer {
    return { width: 2, height: 2, rgba: new Array<number>(16).fill(128) };
  }

  shutdown(): void {
    this.shutDown = true;
  }

  /** One entry per press: consecutive frames holding the same buttons count once. */
  presses(): JoypadButton[] {
    const out: JoypadButton[] = [];
    let previous = '';
    for (const held of this.frames) {
      const key = held.join('+');
      if (key !== '' && key !== previous) out.push(held[0]);
      previous = key;
    }
    return out;
  }
}
