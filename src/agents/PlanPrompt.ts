/**
 * Prompt and reply contract shared by the model-backed agents.
 */

import { validatePlan, type ActionPlan, MAX_PLAN_LENGTH } from '../actions/ActionPlan.js';
import type { AgentRole } from '../core/DispatchPolicy.js';
import { BUTTON_ACTIONS, type ButtonAction } from '../emulator/Buttons.js';
import { AgentError } from '../errors.js';
import type { GameState } from '../state/GameState.js';

export function describeState(state: GameState): string {
  const lines: string[] = [];
  lines.push(`Location: ${state.location}`);
  lines.push(`Badges: ${state.badges}`);
  lines.push(`Money: ${state.money}`);

  if (state.party.length === 0) {
    lines.push('Party: empty');
  } else {
    lines.push('Party:');
    for (const m of state.party) {
      const active = m.name === state.activeMember ? ' (active)' : '';
      lines.push(`  ${m.name} Lv${m.level} HP ${m.hp}/${m.maxHp}${active}`);
    }
  }

  if (state.inventory.length === 0) {
    lines.push('Inventory: empty');
  } else {
    lines.push(`Inventory: ${state.inventory.map((i) => `${i.name} x${i.count}`).join(', ')}`);
  }

  return lines.join('\n');
}

const ROLE_BRIEF: Record<AgentRole, string> = {
  player:
    'You control the player character while exploring. Move around, talk to people, pick up items and make progress toward the next goal.',
  battle:
    'You control the player in a battle. Choose attacks, switch party members or use items to win while keeping the party alive.',
};

export function buildPrompt(
  state: GameState,
  role: AgentRole,
  withScreenshot: boolean,
  recentActions: readonly ButtonAction[] = [],
): string {
  const recent = recentActions.length > 0 ? recentActions.join(', ') : 'none yet';
  return `You are playing a handheld role-playing game through its joypad.
${ROLE_BRIEF[role]}

CURRENT GAME STATE:
${describeState(state)}

RECENT ACTIONS (oldest first): ${recent}

Based on the game state${withScreenshot ? ' and screenshot' : ''}, choose the next few button presses.
Valid actions: ${BUTTON_ACTIONS.join(', ')}.

Reply with ONLY valid JSON:
{
  "actions": [<1-${MAX_PLAN_LENGTH} actions>],
  "delayFrames": <frames to wait between actions, optional>,
  "commentary": "<1-2 sentences explaining the move, written for viewers>"
}`;
}

/** Pulls the first JSON object out of a model reply and validates it as a plan. */
export function parsePlanResponse(text: string, agentId: string): ActionPlan {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new AgentError(agentId, `No JSON object in reply from ${agentId}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch (e) {
    throw new AgentError(agentId, `Malformed JSON from ${agentId}`, { cause: e });
  }

  const result = validatePlan(parsed);
  if (!result.ok) {
    throw new AgentError(agentId, `Invalid plan from ${agentId}: ${result.issues.join('; ')}`);
  }
  return result.plan;
}
