// serverboy ships no type declarations and has no @types package.
declare module 'serverboy' {
  interface Keymap {
    RIGHT: number;
    LEFT: number;
    UP: number;
    DOWN: number;
    A: number;
    B: number;
    SELECT: number;
    START: number;
  }

  class Gameboy {
    static KEYMAP: Keymap;
    loadRom(rom: Buffer | Uint8Array): boolean;
    doFrame(): number[];
    pressKeys(keys: Array<number | string>): void;
    getScreen(): number[];
    getMemory(): number[];
  }

  export = Gameboy;
}
