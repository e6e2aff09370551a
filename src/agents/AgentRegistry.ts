import { InvalidConfigError } from '../errors.js';
import type { AgentClient } from './AgentClient.js';

/** id → client. Consulted by the orchestrator after the dispatch policy picks an id. */
export class AgentRegistry {
  private agents = new Map<string, AgentClient>();

  constructor(agents: Iterable<AgentClient> = []) {
    for (const agent of agents) this.register(agent);
  }

  register(agent: AgentClient): void {
    if (this.agents.has(agent.id)) {
      throw new InvalidConfigError(`Agent ${agent.id} is already registered`);
    }
    this.agents.set(agent.id, agent);
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  get(id: string): AgentClient {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new InvalidConfigError(`Unknown agent: ${id} (registered: ${this.ids().join(', ') || 'none'})`);
    }
    return agent;
  }

  ids(): string[] {
    return [...this.agents.keys()];
  }
}
