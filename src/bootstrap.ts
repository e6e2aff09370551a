/**
 * Wires configuration into a running process: agents, extractor, driver, orchestrator, API.
 */

import { ApiServer } from '../server/ApiServer.js';
import type { AgentClient } from './agents/AgentClient.js';
import { AgentRegistry } from './agents/AgentRegistry.js';
import { AnthropicAgent } from './agents/AnthropicAgent.js';
import { ScriptedAgent } from './agents/ScriptedAgent.js';
import { XaiAgent } from './agents/XaiAgent.js';
import type { AppConfig } from './config.js';
import type { AssignmentConfig } from './core/DispatchPolicy.js';
import { EventHub } from './core/EventHub.js';
import { Orchestrator } from './core/Orchestrator.js';
import { EmulationDriver } from './emulator/EmulationDriver.js';
import type { EmulatorCoreFactory } from './emulator/EmulatorCore.js';
import { ServerboyCore } from './emulator/ServerboyCore.js';
import { LayoutStateReader, loadMemoryLayout } from './state/MemoryLayout.js';
import { FixedStateReader, StateExtractor, type StateReader } from './state/StateExtractor.js';

export const FALLBACK_AGENT_ID = 'scripted';

export function buildAgents(config: AppConfig): AgentRegistry {
  const agents: AgentClient[] = [new ScriptedAgent({ id: FALLBACK_AGENT_ID, seed: config.seed })];
  if (config.anthropic.apiKey) {
    agents.push(new AnthropicAgent({ apiKey: config.anthropic.apiKey, model: config.anthropic.model }));
  }
  if (config.xai.apiKey) {
    agents.push(new XaiAgent({ apiKey: config.xai.apiKey, model: config.xai.model }));
  }
  return new AgentRegistry(agents);
}

/** Replaces ids of agents that were not registered (missing API key) with the scripted agent. */
export function resolveAssignment(assignment: AssignmentConfig, agents: AgentRegistry): AssignmentConfig {
  const resolve = (id: string, role: string): string => {
    if (agents.has(id)) return id;
    console.warn(`[CLI] Agent "${id}" for ${role} is not available, using ${FALLBACK_AGENT_ID}`);
    return FALLBACK_AGENT_ID;
  };
  return {
    ...assignment,
    playerAgentId: resolve(assignment.playerAgentId, 'player'),
    battleAgentId: resolve(assignment.battleAgentId, 'battle'),
  };
}

export function buildReader(config: AppConfig): StateReader {
  if (config.layoutPath) {
    console.log(`[CLI] Memory layout: ${config.layoutPath}`);
    return new LayoutStateReader(loadMemoryLayout(config.layoutPath));
  }
  console.warn('[CLI] No --layout given; state extraction returns a fixed placeholder snapshot');
  return new FixedStateReader();
}

export interface Session {
  hub: EventHub;
  orchestrator: Orchestrator;
  server: ApiServer;
}

export function createSession(
  config: AppConfig,
  createCore: EmulatorCoreFactory = () => new ServerboyCore(),
): Session {
  const agents = buildAgents(config);
  console.log(`[CLI] Agents: ${agents.ids().join(', ')}`);

  const hub = new EventHub();
  const orchestrator = new Orchestrator({
    driver: new EmulationDriver({ romPath: config.romPath, createCore }),
    extractor: new StateExtractor(buildReader(config)),
    agents,
    hub,
    assignment: resolveAssignment(config.assignment, agents),
    config: config.orchestrator,
  });
  hub.publishCommentary('Welcome! Start a session to watch the agents play.', 'orchestrator');

  const server = new ApiServer(orchestrator, hub, { host: config.host, port: config.port });
  return { hub, orchestrator, server };
}
