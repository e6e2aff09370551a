import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import { WebSocket } from 'ws';
import type { ActionPlan } from '../../src/actions/ActionPlan.js';
import type { AgentClient, DecisionContext } from '../../src/agents/AgentClient.js';
import { AgentRegistry } from '../../src/agents/AgentRegistry.js';
import { EventHub } from '../../src/core/EventHub.js';
import { Orchestrator } from '../../src/core/Orchestrator.js';
import { EmulationDriver } from '../../src/emulator/EmulationDriver.js';
import { EMPTY_RAW_STATE, type GameState } from '../../src/state/GameState.js';
import { FixedStateReader, StateExtractor } from '../../src/state/StateExtractor.js';
import { ApiServer, serializeEvent, statusForCode } from '../../server/ApiServer.js';
import { FakeCore } from '../helpers/FakeCore.js';
import { tempDir, writeRom } from '../helpers/rom.js';

class IdleAgent implements AgentClient {
  readonly id = 'idle';

  decide(_state: GameState, context: DecisionContext): Promise<ActionPlan> {
    return new Promise((_resolve, reject) => {
      context.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

describe('statusForCode', () => {
  it('maps error codes to HTTP statuses', () => {
    expect(statusForCode('INVALID_ACTION')).toBe(400);
    expect(statusForCode('INVALID_CONFIG')).toBe(400);
    expect(statusForCode('INVALID_STATE')).toBe(409);
    expect(statusForCode('RESOURCE')).toBe(500);
    expect(statusForCode('AGENT_TIMEOUT')).toBe(500);
  });
});

describe('serializeEvent', () => {
  it('encodes frames as base64', () => {
    const json = serializeEvent({
      type: 'screenshot-updated',
      payload: { image: Buffer.from([1, 2, 3]), frame: 42 },
    });
    expect(JSON.parse(json)).toEqual({ type: 'screenshot-updated', payload: { image: 'AQID', frame: 42 } });
  });

  it('passes other events through', () => {
    expect(serializeEvent({ type: 'status-changed', payload: { status: 'running' } })).toBe(
      '{"type":"status-changed","payload":{"status":"running"}}',
    );
  });
});

describe('ApiServer', () => {
  let dir: string;
  let hub: EventHub;
  let orchestrator: Orchestrator;
  let server: ApiServer;
  let base: string;
  let wsUrl: string;
  const sockets: WebSocket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    dir = tempDir();
    const core = new FakeCore();
    hub = new EventHub();
    orchestrator = new Orchestrator({
      driver: new EmulationDriver({ romPath: writeRom(dir), createCore: () => core }),
      extractor: new StateExtractor(new FixedStateReader({ ...EMPTY_RAW_STATE, location: 'Home Town' })),
      agents: new AgentRegistry([new IdleAgent()]),
      hub,
      assignment: { playerAgentId: 'idle', battleAgentId: 'idle', dispatchMode: 'single' },
      config: { tickIntervalMs: 1, extractEvery: 100_000, screenshotEvery: 100_000, sendScreenshotToAgents: false },
    });
    server = new ApiServer(orchestrator, hub, { host: '127.0.0.1', port: 0 });
    const address = await server.listen();
    base = `http://127.0.0.1:${address.port}`;
    wsUrl = `ws://127.0.0.1:${address.port}/ws`;
  });

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.close();
    if (orchestrator.status === 'running') await orchestrator.stop();
    await server.close();
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function post(route: string, body: unknown): Promise<Response> {
    return fetch(`${base}${route}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function open(): Promise<unknown[]> {
    const ws = new WebSocket(wsUrl);
    sockets.push(ws);
    const messages: unknown[] = [];
    ws.on('message', (data) => messages.push(JSON.parse(data.toString())));
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    return messages;
  }

  describe('while stopped', () => {
    it('reports status', async () => {
      const res = await fetch(`${base}/api/status`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        status: 'stopped',
        frameCount: 0,
        mode: 'exploring',
        activeAgent: 'idle',
      });
    });

    it('serves the empty snapshot', async () => {
      const res = await fetch(`${base}/api/state`);
      expect(await res.json()).toMatchObject({
        success: true,
        mode: 'exploring',
        state: { snapshotId: 0, frame: 0, location: 'Unknown', party: [], activeMember: null },
      });
    });

    it('refuses screenshots and actions with 409', async () => {
      const shot = await fetch(`${base}/api/screenshot`);
      expect(shot.status).toBe(409);
      expect(await shot.json()).toEqual({ success: false, error: 'No frame available while stopped' });

      const action = await post('/api/execute_action', { action: 'up' });
      expect(action.status).toBe(409);
      expect(await action.json()).toEqual({ success: false, error: 'Session is stopped' });
    });

    it('accepts stop as a no-op', async () => {
      const res = await post('/api/stop_game', {});
      expect(await res.json()).toEqual({ success: true, status: 'stopped' });
    });
  });

  describe('request validation', () => {
    it('rejects unknown action tokens with 400', async () => {
      const res = await post('/api/execute_sequence', { actions: ['up', 'jump'] });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: 'Unknown action: "jump"' });
    });

    it('rejects bodies of the wrong shape', async () => {
      const res = await post('/api/execute_action', { commentary: 'no action' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: 'action: Required' });
    });

    it('rejects malformed JSON', async () => {
      const res = await fetch(`${base}/api/execute_action`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"action":',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false });
    });

    it('rejects a negative commentary limit', async () => {
      const res = await fetch(`${base}/api/commentary?limit=-1`);
      expect(res.status).toBe(400);
    });
  });

  describe('session control', () => {
    it('starts, executes and stops', async () => {
      const started = await post('/api/start_game', {});
      expect(await started.json()).toEqual({ success: true, status: 'running' });

      const again = await post('/api/start_game', {});
      expect(again.status).toBe(409);
      expect(await again.json()).toEqual({ success: false, error: 'Session is already running' });

      const seq = await post('/api/execute_sequence', { actions: ['up', 'confirm'], commentary: 'Talk to the clerk.' });
      expect(await seq.json()).toEqual({ success: true, completed: 2, total: 2, aborted: false });

      const state = await fetch(`${base}/api/state`);
      expect(await state.json()).toMatchObject({
        success: true,
        mode: 'exploring',
        state: { snapshotId: 2, location: 'Home Town' },
      });

      const shot = await fetch(`${base}/api/screenshot`);
      expect(shot.headers.get('content-type')).toBe('image/png');
      expect([...new Uint8Array(await shot.arrayBuffer()).subarray(1, 4)]).toEqual([0x50, 0x4e, 0x47]);

      const commentary = await fetch(`${base}/api/commentary?limit=1`);
      expect(await commentary.json()).toMatchObject({
        success: true,
        entries: [{ sequence: 1, text: 'Talk to the clerk.', source: 'manual' }],
      });

      const stopped = await post('/api/stop_game', {});
      expect(await stopped.json()).toEqual({ success: true, status: 'stopped' });
    });

    it('reads and updates the assignment', async () => {
      const current = await fetch(`${base}/api/assignment`);
      expect(await current.json()).toEqual({
        success: true,
        assignment: { playerAgentId: 'idle', battleAgentId: 'idle', dispatchMode: 'single' },
        activeAgent: 'idle',
      });

      const updated = await post('/api/assignment', { dispatchMode: 'dual' });
      expect(await updated.json()).toEqual({
        success: true,
        assignment: { playerAgentId: 'idle', battleAgentId: 'idle', dispatchMode: 'dual' },
        activeAgent: 'idle as player',
      });

      const unknown = await post('/api/assignment', { battleAgentId: 'ghost' });
      expect(unknown.status).toBe(400);
      expect(await unknown.json()).toEqual({ success: false, error: 'Unknown agent: ghost (registered: idle)' });
    });
  });

  describe('WebSocket', () => {
    it('greets with assignment, status and recent commentary', async () => {
      hub.publishCommentary('Hello there.', 'system');
      const messages = await open();

      await vi.waitFor(() => expect(messages).toHaveLength(3));
      expect(messages[0]).toEqual({
        type: 'assignment-changed',
        payload: {
          assignment: { playerAgentId: 'idle', battleAgentId: 'idle', dispatchMode: 'single' },
          activeAgent: 'idle',
        },
      });
      expect(messages[1]).toEqual({ type: 'status-changed', payload: { status: 'stopped' } });
      expect(messages[2]).toMatchObject({
        type: 'commentary-history',
        payload: { entries: [{ sequence: 1, text: 'Hello there.', source: 'system' }] },
      });
    });

    it('pushes hub events as they happen', async () => {
      const messages = await open();
      await vi.waitFor(() => expect(messages).toHaveLength(3));

      hub.publishCommentary('A wild event.', 'orchestrator');
      await vi.waitFor(() => expect(messages).toHaveLength(4));
      expect(messages[3]).toMatchObject({
        type: 'commentary-added',
        payload: { sequence: 1, text: 'A wild event.', source: 'orchestrator' },
      });
    });

    it('releases the subscription when the client leaves', async () => {
      const messages = await open();
      await vi.waitFor(() => expect(messages).toHaveLength(3));
      expect(hub.subscriberCount).toBe(1);

      for (const ws of sockets.splice(0)) ws.close();
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(0));
    });
  });
});
