/**
 * Offline rule-based agent.
 * Wanders and interacts while exploring, steering away from the way it just came and
 * from a direction it keeps walking into. In battle it attacks and backs out when the
 * lead member is low on HP. Choices are seeded so runs replay.
 */

import type { ActionPlan } from '../actions/ActionPlan.js';
import type { ButtonAction } from '../emulator/Buttons.js';
import { AgentError } from '../errors.js';
import type { GameState, PartyMember } from '../state/GameState.js';
import type { AgentClient, DecisionContext } from './AgentClient.js';
import { SeededChooser, type WeightedOption } from './SeededChooser.js';

type Direction = 'up' | 'down' | 'left' | 'right';

const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

const OPPOSITE: Record<Direction, Direction> = { up: 'down', down: 'up', left: 'right', right: 'left' };

/** Presses of one direction in a row after which the agent assumes it is blocked */
const STUCK_AFTER = 4;

export interface ScriptedAgentConfig {
  id?: string;
  seed?: number;
  /** Simulated thinking time. Default: 0 */
  latencyMs?: number;
  /** Lead HP fraction below which the agent retreats in battle. Default: 0.25 */
  retreatThreshold?: number;
}

export class ScriptedAgent implements AgentClient {
  readonly id: string;
  private chooser: SeededChooser;
  private latencyMs: number;
  private retreatThreshold: number;

  constructor(config: ScriptedAgentConfig = {}) {
    this.id = config.id ?? 'scripted';
    this.chooser = new SeededChooser(config.seed ?? 1);
    this.latencyMs = config.latencyMs ?? 0;
    this.retreatThreshold = config.retreatThreshold ?? 0.25;
  }

  async decide(state: GameState, context: DecisionContext): Promise<ActionPlan> {
    if (this.latencyMs > 0) {
      await abortableSleep(this.latencyMs, context.signal);
    }
    if (context.signal.aborted) {
      throw new AgentError(this.id, `Request to ${this.id} cancelled`);
    }
    return context.role === 'battle' ? this.battlePlan(state) : this.explorePlan(context.recentActions ?? []);
  }

  private explorePlan(recent: readonly ButtonAction[]): ActionPlan {
    // Mashing confirm rarely helps twice in a row
    const interactChance = recent[recent.length - 1] === 'confirm' ? 0.1 : 0.3;
    if (this.chooser.chance(interactChance)) {
      return { actions: ['confirm'], delayFrames: 10, commentary: "Let's see what's here." };
    }

    const blocked = blockedDirection(recent);
    const direction = this.chooser.weighted(directionWeights(recent));
    const steps = this.chooser.steps(3);
    return {
      actions: Array.from({ length: steps }, () => direction),
      delayFrames: 10,
      commentary: blocked ? `Blocked going ${blocked}, trying ${direction}.` : `Exploring ${direction}.`,
    };
  }

  private battlePlan(state: GameState): ActionPlan {
    const lead = leadMember(state);
    if (!lead) {
      return { actions: ['confirm'], delayFrames: 10, commentary: 'Sizing up the battle.' };
    }

    const hpFraction = lead.maxHp > 0 ? lead.hp / lead.maxHp : 0;
    if (hpFraction < this.retreatThreshold && state.party.length > 1) {
      return {
        actions: ['cancel'],
        delayFrames: 10,
        commentary: `${lead.name} is low on HP (${lead.hp}/${lead.maxHp}), backing out to switch.`,
      };
    }

    if (this.chooser.chance(0.4)) {
      return { actions: ['down', 'confirm'], delayFrames: 10, commentary: `Trying another move with ${lead.name}.` };
    }
    return { actions: ['confirm'], delayFrames: 10, commentary: `${lead.name}, attack!` };
  }
}

function isDirection(action: ButtonAction): action is Direction {
  return DIRECTIONS.some((d) => d === action);
}

/** The direction pressed on each of the last few moves, if they all agree. */
function blockedDirection(recent: readonly ButtonAction[]): Direction | null {
  const moves = recent.filter(isDirection).slice(-STUCK_AFTER);
  if (moves.length < STUCK_AFTER) return null;
  return moves.every((m) => m === moves[0]) ? moves[0] : null;
}

/** No backtracking onto the last move, and no further pushing against a blocked direction. */
export function directionWeights(recent: readonly ButtonAction[]): WeightedOption<Direction>[] {
  const moves = recent.filter(isDirection);
  const last = moves.length > 0 ? moves[moves.length - 1] : null;
  const blocked = blockedDirection(recent);
  return DIRECTIONS.map((value) => ({
    value,
    weight: last !== null && (value === OPPOSITE[last] || value === blocked) ? 0 : 1,
  }));
}

function leadMember(state: GameState): PartyMember | undefined {
  return state.party.find((m) => m.name === state.activeMember) ?? state.party[0];
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
  });
}
