import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { XAI_API_URL, XaiAgent } from '../../src/agents/XaiAgent.js';
import { AgentError } from '../../src/errors.js';
import { makeState } from '../helpers/state.js';

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('XaiAgent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts a chat completion with a bearer key and parses the plan', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      completion('{"actions":["left","left"],"delayFrames":4,"commentary":"Going west."}'),
    );
    const agent = new XaiAgent({ apiKey: 'test-secret', fetchImpl });
    const signal = new AbortController().signal;

    const plan = await agent.decide(makeState(), { role: 'player', signal });

    expect(plan).toEqual({ actions: ['left', 'left'], delayFrames: 4, commentary: 'Going west.' });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(XAI_API_URL);
    expect(init?.method).toBe('POST');
    expect(init?.signal).toBe(signal);
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'grok-4-1-fast-reasoning', max_tokens: 512 });
  });

  it('attaches the screenshot as a data URL', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => completion('{"actions":["confirm"],"commentary":"A!"}'));
    const agent = new XaiAgent({ apiKey: 'test-secret', fetchImpl });
    await agent.decide(makeState(), {
      role: 'battle',
      signal: new AbortController().signal,
      screenshot: Buffer.from('png'),
    });
    const body: unknown = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body).toMatchObject({
      messages: [{ role: 'user', content: [{ type: 'image_url', image_url: { url: 'data:image/png;base64,cG5n' } }, { type: 'text' }] }],
    });
  });

  it('reports HTTP errors with the status and body', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('overloaded', { status: 503 }));
    const agent = new XaiAgent({ apiKey: 'test-secret', fetchImpl });
    await expect(agent.decide(makeState(), { role: 'player', signal: new AbortController().signal })).rejects.toThrow(
      new AgentError('grok', 'xAI API error 503: overloaded'),
    );
  });

  it('rejects an unexpected response shape', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    const agent = new XaiAgent({ apiKey: 'test-secret', fetchImpl });
    await expect(agent.decide(makeState(), { role: 'player', signal: new AbortController().signal })).rejects.toThrow(
      /^Unexpected xAI response shape/,
    );
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const agent = new XaiAgent({ apiKey: 'test-secret', fetchImpl });
    await expect(agent.decide(makeState(), { role: 'player', signal: new AbortController().signal })).rejects.toThrow(
      'xAI request failed: fetch failed',
    );
  });
});
