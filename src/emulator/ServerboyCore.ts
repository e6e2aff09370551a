import Gameboy from 'serverboy';
import type { JoypadButton } from './Buttons.js';
import { memoryFromBytes, type EmulatorCore, type FrameBuffer, type MemoryView } from './EmulatorCore.js';

const SCREEN_WIDTH = 160;
const SCREEN_HEIGHT = 144;

/**
 * Headless handheld emulation through the serverboy package.
 * serverboy releases every key after each frame, so held buttons are re-pressed per step.
 */
export class ServerboyCore implements EmulatorCore {
  readonly name = 'serverboy';
  private gameboy: Gameboy | null = null;
  private lastScreen: number[] = [];

  loadRom(rom: Buffer): void {
    const gameboy = new Gameboy();
    if (gameboy.loadRom(rom) === false) {
      throw new Error('serverboy rejected the ROM image');
    }
    this.gameboy = gameboy;
  }

  stepFrame(held: readonly JoypadButton[]): void {
    const gameboy = this.requireGameboy();
    if (held.length > 0) {
      gameboy.pressKeys(held.map((b) => Gameboy.KEYMAP[b]));
    }
    gameboy.doFrame();
  }

  memory(): MemoryView {
    return memoryFromBytes(this.requireGameboy().getMemory());
  }

  frameBuffer(): FrameBuffer {
    const screen = this.requireGameboy().getScreen();
    if (screen.length === SCREEN_WIDTH * SCREEN_HEIGHT * 4) {
      this.lastScreen = screen;
    }
    // Before the first rendered frame serverboy returns an empty array
    const rgba = this.lastScreen.length > 0 ? this.lastScreen : new Array<number>(SCREEN_WIDTH * SCREEN_HEIGHT * 4).fill(0);
    return { width: SCREEN_WIDTH, height: SCREEN_HEIGHT, rgba };
  }

  shutdown(): void {
    this.gameboy = null;
    this.lastScreen = [];
  }

  private requireGameboy(): Gameboy {
    if (!this.gameboy) throw new Error('No ROM loaded');
    return this.gameboy;
  }
}
