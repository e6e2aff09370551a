/**
 * Maps (mode, assignment) to the role and agent responsible for the next decision.
 * Stateless: evaluated again at every decision point.
 */

import type { Mode } from '../state/GameState.js';

export type DispatchMode = 'single' | 'dual';
export type AgentRole = 'player' | 'battle';

export interface AssignmentConfig {
  playerAgentId: string;
  battleAgentId: string;
  dispatchMode: DispatchMode;
}

export interface AgentSelection {
  role: AgentRole;
  agentId: string;
}

export function roleForMode(mode: Mode): AgentRole {
  return mode === 'battling' ? 'battle' : 'player';
}

/**
 * Single mode always answers with the player agent. The role still follows the mode
 * so that agent knows whether it is in a battle.
 */
export function selectAgent(mode: Mode, config: AssignmentConfig): AgentSelection {
  const role = roleForMode(mode);
  if (config.dispatchMode === 'single') {
    return { role, agentId: config.playerAgentId };
  }
  return {
    role,
    agentId: role === 'battle' ? config.battleAgentId : config.playerAgentId,
  };
}

/**
 * Commentary source label: "claude as battle" in dual mode; "grok", or "grok in battle"
 * while battling, in single mode.
 */
export function describeSelection(selection: AgentSelection, config: AssignmentConfig): string {
  if (config.dispatchMode === 'dual') return `${selection.agentId} as ${selection.role}`;
  return selection.role === 'battle' ? `${selection.agentId} in battle` : selection.agentId;
}
