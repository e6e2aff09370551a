import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AnthropicAgent, type MessageTransport, type PromptContent } from '../../src/agents/AnthropicAgent.js';
import { AgentError } from '../../src/errors.js';
import { makeState } from '../helpers/state.js';

class FakeTransport implements MessageTransport {
  sent: PromptContent[][] = [];
  signals: AbortSignal[] = [];
  reply: string | Error = '{"actions":["up"],"commentary":"Heading north."}';

  async send(content: PromptContent[], signal: AbortSignal): Promise<string> {
    this.sent.push(content);
    this.signals.push(signal);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

describe('AnthropicAgent', () => {
  let transport: FakeTransport;
  let agent: AnthropicAgent;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    transport = new FakeTransport();
    agent = new AnthropicAgent({ transport });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults its id and model', () => {
    expect(agent.id).toBe('claude');
    expect(agent.model).toBe('claude-sonnet-4-5-20250929');
  });

  it('sends the prompt and returns the parsed plan', async () => {
    const controller = new AbortController();
    const plan = await agent.decide(makeState(), { role: 'player', signal: controller.signal });
    expect(plan).toEqual({ actions: ['up'], delayFrames: 10, commentary: 'Heading north.' });
    expect(transport.sent[0]).toHaveLength(1);
    expect(transport.sent[0][0].type).toBe('text');
    expect(transport.signals[0]).toBe(controller.signal);
  });

  it('tells the model what was pressed last', async () => {
    await agent.decide(makeState(), {
      role: 'player',
      signal: new AbortController().signal,
      recentActions: ['left', 'confirm'],
    });
    expect(transport.sent[0][0]).toMatchObject({
      type: 'text',
      text: expect.stringContaining('RECENT ACTIONS (oldest first): left, confirm'),
    });
  });

  it('puts the screenshot first as a base64 PNG block', async () => {
    await agent.decide(makeState(), {
      role: 'battle',
      signal: new AbortController().signal,
      screenshot: Buffer.from('png'),
    });
    expect(transport.sent[0][0]).toEqual({
      type: 'image',
      source: { type: 'base64', media_type: 'image/png', data: 'cG5n' },
    });
  });

  it('wraps transport failures in AgentError', async () => {
    transport.reply = new Error('overloaded');
    await expect(agent.decide(makeState(), { role: 'player', signal: new AbortController().signal })).rejects.toThrow(
      new AgentError('claude', 'Anthropic request failed: overloaded'),
    );
  });

  it('rejects a reply that is not a plan', async () => {
    transport.reply = 'Let me think about it.';
    await expect(
      agent.decide(makeState(), { role: 'player', signal: new AbortController().signal }),
    ).rejects.toBeInstanceOf(AgentError);
  });
});
