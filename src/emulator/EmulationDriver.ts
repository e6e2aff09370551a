/**
 * Owns the emulation instance: ROM loading, frame stepping, input execution, capture.
 *
 * The driver is single-writer and does no locking of its own. The orchestrator's
 * control loop is its only mutating caller.
 */

import type { ActionPlan, PlanResult } from '../actions/ActionPlan.js';
import { InvalidStateError, ResourceError, errorMessage } from '../errors.js';
import { ACTION_TO_BUTTON, type ButtonAction } from './Buttons.js';
import type { EmulatorCore, EmulatorCoreFactory, MemoryView } from './EmulatorCore.js';
import { encodeFramePng } from './FrameEncoder.js';
import { loadRomImage, type RomInfo } from './RomImage.js';

export type DriverStatus = 'stopped' | 'starting' | 'running';

export interface EmulationDriverConfig {
  romPath: string;
  createCore: EmulatorCoreFactory;
  /** Frames a button stays held. Default: 5 */
  pressFrames?: number;
  /** Frames after release before the action counts as settled. Default: 5 */
  releaseFrames?: number;
  /** Wall-clock pause between plan actions so other work can interleave. Default: 0 */
  actionSpacingMs?: number;
}

export class EmulationDriver {
  private config: Required<EmulationDriverConfig>;
  private core: EmulatorCore | null = null;
  private _status: DriverStatus = 'stopped';
  private _frameCount = 0;
  private _romInfo: RomInfo | null = null;

  constructor(config: EmulationDriverConfig) {
    this.config = {
      pressFrames: 5,
      releaseFrames: 5,
      actionSpacingMs: 0,
      ...config,
    };
  }

  get status(): DriverStatus {
    return this._status;
  }

  get frameCount(): number {
    return this._frameCount;
  }

  get romInfo(): RomInfo | null {
    return this._romInfo;
  }

  async start(): Promise<void> {
    if (this._status !== 'stopped') {
      throw new InvalidStateError(`Emulation driver is already ${this._status}`);
    }
    this._status = 'starting';
    console.log(`[EmulationDriver] Loading ROM: ${this.config.romPath}`);

    try {
      const { rom, info } = await loadRomImage(this.config.romPath);
      const core = this.config.createCore();
      try {
        core.loadRom(rom);
      } catch (e) {
        throw new ResourceError(`Emulator core ${core.name} rejected ROM: ${errorMessage(e)}`, { cause: e });
      }
      this.core = core;
      this._romInfo = info;
      this._frameCount = 0;
      this._status = 'running';
      console.log(`[EmulationDriver] Running "${info.title || 'untitled'}" (${info.size} bytes) on ${core.name}`);
    } catch (e) {
      this._status = 'stopped';
      throw e;
    }
  }

  advance(frameCount: number): void {
    const core = this.requireCore();
    for (let i = 0; i < frameCount; i++) {
      core.stepFrame([]);
      this._frameCount++;
    }
  }

  /** Press, hold, release and let the input settle. */
  executeAction(action: ButtonAction): void {
    const core = this.requireCore();
    const held = [ACTION_TO_BUTTON[action]];
    for (let i = 0; i < this.config.pressFrames; i++) {
      core.stepFrame(held);
      this._frameCount++;
    }
    this.advance(this.config.releaseFrames);
  }

  /**
   * Execute every action in order with the plan's inter-action delay.
   * Abort is checked at action boundaries only, so an action is never cut mid-press.
   */
  async executePlan(plan: ActionPlan, signal?: AbortSignal): Promise<PlanResult> {
    this.requireCore();
    const total = plan.actions.length;
    let completed = 0;

    for (const action of plan.actions) {
      if (signal?.aborted || this._status !== 'running') {
        console.log(`[EmulationDriver] Plan aborted after ${completed}/${total} actions`);
        return { completed, total, aborted: true };
      }
      this.executeAction(action);
      completed++;
      if (completed < total) {
        this.advance(plan.delayFrames);
      }
      await sleep(this.config.actionSpacingMs);
    }

    return { completed, total, aborted: false };
  }

  /** Current frame as PNG */
  screenshot(): Buffer {
    return encodeFramePng(this.requireCore().frameBuffer());
  }

  memory(): MemoryView {
    return this.requireCore().memory();
  }

  stop(): void {
    if (this._status === 'stopped') return;
    console.log(`[EmulationDriver] Stopping after ${this._frameCount} frames`);
    this.core?.shutdown();
    this.core = null;
    this._status = 'stopped';
  }

  private requireCore(): EmulatorCore {
    if (this._status !== 'running' || !this.core) {
      throw new InvalidStateError(`Emulation driver is ${this._status}`);
    }
    return this.core;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
