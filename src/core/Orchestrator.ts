/**
 * Control loop: advance → extract → decide → act.
 *
 * The loop is the only caller of mutating driver methods. Agent requests run as
 * promises alongside it and are rejoined at the top of each iteration, so a slow
 * agent never holds up frame advancement. Manual requests share the same execution
 * path and take priority over agent plans.
 */

import { z } from 'zod';
import { DEFAULT_DELAY_FRAMES, validatePlan, type ActionPlan, type PlanResult } from '../actions/ActionPlan.js';
import type { AgentClient } from '../agents/AgentClient.js';
import type { AgentRegistry } from '../agents/AgentRegistry.js';
import { withDeadline } from '../agents/Deadline.js';
import type { EmulationDriver } from '../emulator/EmulationDriver.js';
import { parseActions, type ButtonAction } from '../emulator/Buttons.js';
import {
  InvalidConfigError,
  InvalidStateError,
  OrchestratorError,
  errorMessage,
  type OrchestratorErrorCode,
} from '../errors.js';
import { classifyMode, type GameState, type Mode } from '../state/GameState.js';
import type { StateExtractor } from '../state/StateExtractor.js';
import { BoundedQueue } from './BoundedQueue.js';
import { describeSelection, selectAgent, type AssignmentConfig } from './DispatchPolicy.js';
import type { CommentaryEntry, EventHub, SessionStatus } from './EventHub.js';

export interface OrchestratorConfig {
  /** Frames advanced per idle iteration. Default: 2 */
  frameQuantum?: number;
  /** Extract and broadcast state every N idle iterations. Default: 15 */
  extractEvery?: number;
  /** Broadcast a frame every N idle iterations. Default: 30 */
  screenshotEvery?: number;
  /** Pause at the end of each iteration. Default: 33 */
  tickIntervalMs?: number;
  /** Deadline for a single agent request. Default: 30000 */
  decisionTimeoutMs?: number;
  /** Attach the current frame to agent requests. Default: true */
  sendScreenshotToAgents?: boolean;
}

/** Executed actions remembered and offered to agents */
export const RECENT_ACTIONS_LIMIT = 20;

export interface OrchestratorDeps {
  driver: EmulationDriver;
  extractor: StateExtractor;
  agents: AgentRegistry;
  hub: EventHub;
  assignment: AssignmentConfig;
  config?: OrchestratorConfig;
}

export type ExecutionResult =
  | ({ success: true } & PlanResult)
  | { success: false; error: string; code: OrchestratorErrorCode };

export interface SessionInfo {
  status: SessionStatus;
  frameCount: number;
  mode: Mode;
  activeAgent: string;
}

export const AssignmentPatchSchema = z
  .object({
    playerAgentId: z.string().min(1),
    battleAgentId: z.string().min(1),
    dispatchMode: z.enum(['single', 'dual']),
  })
  .partial()
  .strict();

export type AssignmentPatch = z.infer<typeof AssignmentPatchSchema>;

interface ManualRequest {
  plan: ActionPlan;
  source: string;
  resolve: (result: ExecutionResult) => void;
}

interface InFlightDecision {
  id: number;
  label: string;
  controller: AbortController;
  done: Promise<void>;
}

type DecisionOutcome = { ok: true; plan: ActionPlan } | { ok: false; error: unknown };

interface SettledDecision {
  id: number;
  label: string;
  outcome: DecisionOutcome;
}

export class Orchestrator {
  private driver: EmulationDriver;
  private extractor: StateExtractor;
  private agents: AgentRegistry;
  private hub: EventHub;
  private assignment: AssignmentConfig;
  private config: Required<OrchestratorConfig>;

  private _status: SessionStatus = 'stopped';
  private session: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  private quanta = 0;
  private lastDecisionMode: Mode | null = null;
  private requestCounter = 0;
  private inFlight: InFlightDecision | null = null;
  private settled: SettledDecision[] = [];
  private pendingPlan: ActionPlan | null = null;
  private manualQueue: ManualRequest[] = [];
  private recentActions = new BoundedQueue<ButtonAction>(RECENT_ACTIONS_LIMIT);

  constructor(deps: OrchestratorDeps) {
    this.driver = deps.driver;
    this.extractor = deps.extractor;
    this.agents = deps.agents;
    this.hub = deps.hub;
    this.config = {
      frameQuantum: 2,
      extractEvery: 15,
      screenshotEvery: 30,
      tickIntervalMs: 33,
      decisionTimeoutMs: 30_000,
      sendScreenshotToAgents: true,
      ...deps.config,
    };
    this.requireRegistered(deps.assignment);
    this.assignment = { ...deps.assignment };
  }

  get status(): SessionStatus {
    return this._status;
  }

  async start(): Promise<void> {
    if (this._status !== 'stopped') {
      throw new InvalidStateError(`Session is already ${this._status}`);
    }
    this.setStatus('starting');

    try {
      await this.driver.start();
    } catch (e) {
      this.setStatus('stopped');
      throw e;
    }

    this.session = new AbortController();
    this.quanta = 0;
    this.lastDecisionMode = null;
    this.pendingPlan = null;
    this.settled = [];
    this.recentActions.clear();
    this.extractor.reset();
    this.setStatus('running');
    console.log(`[Orchestrator] Session running (${describeAssignment(this.assignment)})`);

    this.captureState();
    this.publishFrame();
    this.loopPromise = this.runLoop();
  }

  /**
   * Cancels the in-flight decision, aborts a running plan at its next action boundary,
   * fails queued manual requests and releases the emulator.
   */
  async stop(): Promise<void> {
    if (this._status === 'stopped') return;
    if (this._status === 'starting') {
      throw new InvalidStateError('Session is still starting');
    }
    if (!this.stopping) {
      this.stopping = this.shutdown(true);
    }
    return this.stopping;
  }

  executeAction(action: string, commentary?: string, source: string = 'manual'): Promise<ExecutionResult> {
    return this.executeActionSequence([action], commentary, source);
  }

  /**
   * Every token is validated before anything is queued; one unknown token rejects
   * the whole sequence with no side effects.
   */
  async executeActionSequence(
    tokens: readonly string[],
    commentary?: string,
    source: string = 'manual',
  ): Promise<ExecutionResult> {
    if (tokens.length === 0) {
      return { success: false, error: 'No actions given', code: 'INVALID_ACTION' };
    }

    let actions: ButtonAction[];
    try {
      actions = parseActions(tokens);
    } catch (e) {
      return failure(e);
    }

    if (this._status !== 'running') {
      return failure(new InvalidStateError(`Session is ${this._status}`));
    }

    const plan: ActionPlan = {
      actions,
      delayFrames: DEFAULT_DELAY_FRAMES,
      commentary: commentary?.trim() || `Manual input: ${actions.join(', ')}`,
    };
    return new Promise((resolve) => {
      this.manualQueue.push({ plan, source, resolve });
    });
  }

  /** Latest accepted snapshot; the empty snapshot before the first extraction. */
  currentState(): GameState {
    return this.extractor.lastKnownGood;
  }

  currentScreenshot(): Buffer {
    if (this._status !== 'running') {
      throw new InvalidStateError(`No frame available while ${this._status}`);
    }
    return this.driver.screenshot();
  }

  commentaryHistory(limit?: number): CommentaryEntry[] {
    return this.hub.history(limit);
  }

  info(): SessionInfo {
    const mode = classifyMode(this.extractor.lastKnownGood);
    return {
      status: this._status,
      frameCount: this.driver.frameCount,
      mode,
      activeAgent: this.activeAgentLabel(mode),
    };
  }

  getAssignment(): AssignmentConfig {
    return { ...this.assignment };
  }

  /** Takes effect at the next decision point; an in-flight request is left alone. */
  setAssignment(patch: unknown): AssignmentConfig {
    const parsed = AssignmentPatchSchema.safeParse(patch);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'assignment'}: ${i.message}`);
      throw new InvalidConfigError(`Invalid assignment: ${issues.join('; ')}`);
    }

    const next: AssignmentConfig = { ...this.assignment, ...parsed.data };
    this.requireRegistered(next);
    this.assignment = next;
    console.log(`[Orchestrator] Assignment changed: ${describeAssignment(next)}`);

    const mode = classifyMode(this.extractor.lastKnownGood);
    this.hub.publishAssignment({ assignment: this.getAssignment(), activeAgent: this.activeAgentLabel(mode) });
    return this.getAssignment();
  }

  // ---------------------------------------------------------------------------

  private async runLoop(): Promise<void> {
    try {
      while (this._status === 'running') {
        await this.iterate();
        await sleep(this.config.tickIntervalMs);
      }
    } catch (e) {
      console.error('[Orchestrator] Control loop crashed:', e);
      this.hub.publishCommentary(`Session halted: ${errorMessage(e)}`, 'orchestrator');
      if (this._status === 'running') {
        this.stopping = this.shutdown(false);
        await this.stopping;
      }
    }
  }

  private async iterate(): Promise<void> {
    this.rejoinDecisions();

    const manual = this.manualQueue.shift();
    if (manual) {
      await this.runManual(manual);
      return;
    }

    if (this.pendingPlan) {
      const plan = this.pendingPlan;
      this.pendingPlan = null;
      await this.runPlan(plan);
      return;
    }

    this.driver.advance(this.config.frameQuantum);
    this.quanta++;
    if (this.quanta % this.config.extractEvery === 0) {
      this.captureState();
    }
    if (this.quanta % this.config.screenshotEvery === 0) {
      this.publishFrame();
    }
    if (this.quanta % 1800 === 0) {
      console.log(
        `[Orchestrator] frame=${this.driver.frameCount} snapshot=#${this.extractor.lastKnownGood.snapshotId} ` +
          `rejected=${this.extractor.rejected} inFlight=${this.inFlight?.label ?? 'none'}`,
      );
    }
  }

  private async runManual(request: ManualRequest): Promise<void> {
    this.hub.publishCommentary(request.plan.commentary, request.source);
    let result: PlanResult;
    try {
      result = await this.runPlan(request.plan);
    } catch (e) {
      request.resolve(failure(e));
      throw e;
    }
    request.resolve({ success: true, ...result });
  }

  /** Executes a plan, then extracts and broadcasts exactly once. */
  private async runPlan(plan: ActionPlan): Promise<PlanResult> {
    const result = await this.driver.executePlan(plan, this.session?.signal);
    for (const action of plan.actions.slice(0, result.completed)) {
      this.recentActions.push(action);
    }
    if (this._status === 'running') {
      this.captureState();
    }
    return result;
  }

  private captureState(): void {
    const state = this.extractor.extract(this.driver);
    const mode = classifyMode(state);
    this.hub.publishState({ state, mode, activeAgent: this.activeAgentLabel(mode) });
    this.considerDecision(state, mode);
  }

  private publishFrame(): void {
    if (this.hub.subscriberCount === 0) return;
    this.hub.publishFrame(this.driver.screenshot(), this.driver.frameCount);
  }

  /** Runs after every extraction. */
  private considerDecision(state: GameState, mode: Mode): void {
    const modeChanged = this.lastDecisionMode !== null && mode !== this.lastDecisionMode;
    if (modeChanged) {
      console.log(`[Orchestrator] Mode ${this.lastDecisionMode} → ${mode}`);
      if (this.inFlight) {
        this.inFlight.controller.abort();
        this.inFlight = null;
      }
      this.pendingPlan = null;
    } else if (this.inFlight || this.pendingPlan || this.manualQueue.length > 0) {
      return;
    }
    this.requestDecision(state, mode);
  }

  private requestDecision(state: GameState, mode: Mode): void {
    const selection = selectAgent(mode, this.assignment);
    const label = describeSelection(selection, this.assignment);
    const agent: AgentClient = this.agents.get(selection.agentId);
    const screenshot = this.config.sendScreenshotToAgents ? this.driver.screenshot() : undefined;
    const recentActions = this.recentActions.toArray();

    const id = ++this.requestCounter;
    const controller = new AbortController();
    const done = withDeadline(
      agent.id,
      (signal) => agent.decide(state, { role: selection.role, signal, screenshot, recentActions }),
      this.config.decisionTimeoutMs,
      controller.signal,
    ).then(
      (plan) => {
        this.settled.push({ id, label, outcome: { ok: true, plan } });
      },
      (error: unknown) => {
        this.settled.push({ id, label, outcome: { ok: false, error } });
      },
    );

    this.inFlight = { id, label, controller, done };
    this.lastDecisionMode = mode;
  }

  private rejoinDecisions(): void {
    for (const decision of this.settled.splice(0)) {
      if (this.inFlight?.id !== decision.id) continue;
      this.inFlight = null;

      if (!decision.outcome.ok) {
        this.reportAgentFailure(decision.label, errorMessage(decision.outcome.error));
        continue;
      }

      const checked = validatePlan(decision.outcome.plan);
      if (!checked.ok) {
        this.reportAgentFailure(decision.label, `invalid plan: ${checked.issues.join('; ')}`);
        continue;
      }

      this.hub.publishCommentary(checked.plan.commentary, decision.label);
      this.pendingPlan = checked.plan;
    }
  }

  private reportAgentFailure(label: string, reason: string): void {
    console.warn(`[Orchestrator] ${label} failed: ${reason}`);
    this.hub.publishCommentary(`${label} failed: ${reason}`, 'orchestrator');
  }

  private async shutdown(awaitLoop: boolean): Promise<void> {
    this.setStatus('stopping');
    this.session?.abort();
    const inFlight = this.inFlight;
    inFlight?.controller.abort();

    if (awaitLoop) await this.loopPromise;
    await inFlight?.done;

    this.inFlight = null;
    this.settled = [];
    this.pendingPlan = null;
    for (const request of this.manualQueue.splice(0)) {
      request.resolve(failure(new InvalidStateError('Session stopped before the request ran')));
    }

    this.driver.stop();
    this.session = null;
    this.loopPromise = null;
    this.stopping = null;
    this.setStatus('stopped');
    console.log(`[Orchestrator] Session stopped`);
  }

  private setStatus(status: SessionStatus): void {
    this._status = status;
    this.hub.publishStatus(status);
  }

  private activeAgentLabel(mode: Mode): string {
    return describeSelection(selectAgent(mode, this.assignment), this.assignment);
  }

  private requireRegistered(assignment: AssignmentConfig): void {
    for (const id of [assignment.playerAgentId, assignment.battleAgentId]) {
      if (!this.agents.has(id)) {
        throw new InvalidConfigError(`Unknown agent: ${id} (registered: ${this.agents.ids().join(', ') || 'none'})`);
      }
    }
  }
}

function failure(err: unknown): ExecutionResult {
  if (err instanceof OrchestratorError) {
    return { success: false, error: err.message, code: err.code };
  }
  return { success: false, error: errorMessage(err), code: 'RESOURCE' };
}

function describeAssignment(a: AssignmentConfig): string {
  return a.dispatchMode === 'dual' ? `dual: player=${a.playerAgentId} battle=${a.battleAgentId}` : `single: ${a.playerAgentId}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
