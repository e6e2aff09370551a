/**
 * Decision backend on xAI's OpenAI-compatible chat completions endpoint.
 */

import { z } from 'zod';
import type { ActionPlan } from '../actions/ActionPlan.js';
import { AgentError, errorMessage } from '../errors.js';
import type { GameState } from '../state/GameState.js';
import type { AgentClient, DecisionContext } from './AgentClient.js';
import { buildPrompt, parsePlanResponse } from './PlanPrompt.js';

export const XAI_API_URL = 'https://api.x.ai/v1/chat/completions';

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

type ChatContent =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface XaiAgentConfig {
  apiKey: string;
  id?: string;
  model?: string;
  maxTokens?: number;
  url?: string;
  fetchImpl?: typeof fetch;
}

export class XaiAgent implements AgentClient {
  readonly id: string;
  readonly model: string;
  private apiKey: string;
  private maxTokens: number;
  private url: string;
  private fetchImpl: typeof fetch;

  constructor(config: XaiAgentConfig) {
    this.id = config.id ?? 'grok';
    this.model = config.model ?? 'grok-4-1-fast-reasoning';
    this.apiKey = config.apiKey;
    this.maxTokens = config.maxTokens ?? 512;
    this.url = config.url ?? XAI_API_URL;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async decide(state: GameState, context: DecisionContext): Promise<ActionPlan> {
    const content: ChatContent[] = [];
    if (context.screenshot) {
      content.push({
        type: 'image_url',
        image_url: { url: `data:image/png;base64,${context.screenshot.toString('base64')}` },
      });
    }
    content.push({ type: 'text', text: buildPrompt(state, context.role, context.screenshot !== undefined, context.recentActions) });

    let resp: Response;
    try {
      resp = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content }],
          max_tokens: this.maxTokens,
        }),
        signal: context.signal,
      });
    } catch (e) {
      throw new AgentError(this.id, `xAI request failed: ${errorMessage(e)}`, { cause: e });
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new AgentError(this.id, `xAI API error ${resp.status}: ${body.slice(0, 200)}`);
    }

    const parsed = CompletionSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new AgentError(this.id, `Unexpected xAI response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    if (parsed.data.usage) {
      console.log(
        `[XaiAgent] ${this.id} tokens: ${parsed.data.usage.prompt_tokens} in / ${parsed.data.usage.completion_tokens} out`,
      );
    }

    const text = parsed.data.choices[0].message.content ?? '';
    return parsePlanResponse(text, this.id);
  }
}
