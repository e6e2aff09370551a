import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { EmulationDriver } from '../../src/emulator/EmulationDriver.js';
import { InvalidStateError, ResourceError } from '../../src/errors.js';
import { FakeCore } from '../helpers/FakeCore.js';
import { buildRom, tempDir, writeRom } from '../helpers/rom.js';

describe('EmulationDriver', () => {
  let dir: string;
  let core: FakeCore;
  let driver: EmulationDriver;

  beforeEach(() => {
    dir = tempDir();
    core = new FakeCore();
    driver = new EmulationDriver({ romPath: writeRom(dir, buildRom('DRIVER')), createCore: () => core });
  });

  afterEach(() => {
    driver.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('start', () => {
    it('loads the ROM into the core and runs', async () => {
      await driver.start();
      expect(driver.status).toBe('running');
      expect(driver.frameCount).toBe(0);
      expect(driver.romInfo?.title).toBe('DRIVER');
      expect(core.loadedRom?.length).toBe(0x8000);
    });

    it('returns to stopped when the file is missing', async () => {
      const missing = new EmulationDriver({ romPath: path.join(dir, 'nope.gb'), createCore: () => core });
      await expect(missing.start()).rejects.toBeInstanceOf(ResourceError);
      expect(missing.status).toBe('stopped');
    });

    it('returns to stopped when the header is malformed', async () => {
      const rom = buildRom();
      rom[0x14d] ^= 0xff;
      const bad = new EmulationDriver({ romPath: writeRom(dir, rom, 'bad.gb'), createCore: () => core });
      await expect(bad.start()).rejects.toThrow(/checksum mismatch/);
      expect(bad.status).toBe('stopped');
    });

    it('wraps a core rejection in ResourceError', async () => {
      core.rejectRom = true;
      await expect(driver.start()).rejects.toThrow(
        new ResourceError('Emulator core fake rejected ROM: bad cartridge type'),
      );
      expect(driver.status).toBe('stopped');
    });

    it('refuses to start twice', async () => {
      await driver.start();
      await expect(driver.start()).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('input', () => {
    beforeEach(async () => {
      await driver.start();
    });

    it('holds a button for 5 frames then releases for 5', () => {
      driver.executeAction('confirm');
      expect(driver.frameCount).toBe(10);
      expect(core.frames.slice(0, 5)).toEqual([['A'], ['A'], ['A'], ['A'], ['A']]);
      expect(core.frames.slice(5)).toEqual([[], [], [], [], []]);
    });

    it('executes a plan in order with the delay between actions only', async () => {
      const result = await driver.executePlan({ actions: ['up', 'confirm', 'cancel'], delayFrames: 10, commentary: 'go' });
      expect(result).toEqual({ completed: 3, total: 3, aborted: false });
      expect(core.presses()).toEqual(['UP', 'A', 'B']);
      expect(driver.frameCount).toBe(3 * 10 + 2 * 10);
    });

    it('stops at the next action boundary when aborted', async () => {
      const controller = new AbortController();
      core.onStep = (frame) => {
        if (frame === 3) controller.abort();
      };
      const result = await driver.executePlan(
        { actions: ['left', 'left', 'left'], delayFrames: 4, commentary: 'walk' },
        controller.signal,
      );
      expect(result).toEqual({ completed: 1, total: 3, aborted: true });
      // first action (10 frames) plus the delay before the second
      expect(driver.frameCount).toBe(14);
    });

    it('encodes the frame buffer as PNG', () => {
      const png = driver.screenshot();
      expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });
  });

  describe('stop', () => {
    it('is idempotent and releases the core', async () => {
      await driver.start();
      driver.stop();
      driver.stop();
      expect(driver.status).toBe('stopped');
      expect(core.shutDown).toBe(true);
      expect(() => driver.advance(1)).toThrow(InvalidStateError);
    });
  });
});
