/**
 * Decision backend on the Anthropic Messages API.
 * Sends the snapshot (and optionally the current frame) and expects a JSON plan back.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ActionPlan } from '../actions/ActionPlan.js';
import { AgentError, errorMessage } from '../errors.js';
import type { GameState } from '../state/GameState.js';
import type { AgentClient, DecisionContext } from './AgentClient.js';
import { buildPrompt, parsePlanResponse } from './PlanPrompt.js';

export type PromptContent =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: 'image/png'; data: string } };

/** Seam between the agent and the SDK; tests substitute their own. */
export interface MessageTransport {
  send(content: PromptContent[], signal: AbortSignal): Promise<string>;
}

export interface AnthropicAgentConfig {
  id?: string;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  transport?: MessageTransport;
}

export class SdkMessageTransport implements MessageTransport {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(apiKey: string | undefined, model: string, maxTokens: number) {
    this.client = new Anthropic(apiKey ? { apiKey } : undefined);
    this.model = model;
    this.maxTokens = maxTokens;
  }

  async send(content: PromptContent[], signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content }],
      },
      { signal },
    );
    for (const block of response.content) {
      if (block.type === 'text') return block.text;
    }
    return '';
  }
}

export class AnthropicAgent implements AgentClient {
  readonly id: string;
  readonly model: string;
  private transport: MessageTransport;

  constructor(config: AnthropicAgentConfig = {}) {
    this.id = config.id ?? 'claude';
    this.model = config.model ?? 'claude-sonnet-4-5-20250929';
    this.transport = config.transport ?? new SdkMessageTransport(config.apiKey, this.model, config.maxTokens ?? 512);
  }

  async decide(state: GameState, context: DecisionContext): Promise<ActionPlan> {
    const content: PromptContent[] = [];

    if (context.screenshot) {
      content.push({
        type: 'image',
        source: {
          type: 'base64',
          media_type: 'image/png',
          data: context.screenshot.toString('base64'),
        },
      });
    }

    content.push({ type: 'text', text: buildPrompt(state, context.role, context.screenshot !== undefined, context.recentActions) });

    let text: string;
    try {
      text = await this.transport.send(content, context.signal);
    } catch (e) {
      throw new AgentError(this.id, `Anthropic request failed: ${errorMessage(e)}`, { cause: e });
    }
    console.log(`[AnthropicAgent] ${this.id} raw response:`, text);

    return parsePlanResponse(text, this.id);
  }
}
