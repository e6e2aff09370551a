/**
 * Contract every decision backend implements.
 *
 * Agents are passive: they receive a snapshot, return a plan, and never touch the
 * emulation. The orchestrator decides when to ask and what to do with the answer.
 */

import type { ActionPlan } from '../actions/ActionPlan.js';
import type { AgentRole } from '../core/DispatchPolicy.js';
import type { ButtonAction } from '../emulator/Buttons.js';
import type { GameState } from '../state/GameState.js';

export interface DecisionContext {
  role: AgentRole;
  /** Aborted on deadline expiry, mode change or session stop */
  signal: AbortSignal;
  /** Current frame as PNG, when screenshots are forwarded to agents */
  screenshot?: Buffer;
  /** Last executed actions, oldest first, whoever issued them */
  recentActions?: readonly ButtonAction[];
}

export interface AgentClient {
  readonly id: string;
  decide(state: GameState, context: DecisionContext): Promise<ActionPlan>;
}
