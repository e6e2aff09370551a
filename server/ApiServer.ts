/**
 * HTTP API and WebSocket push for observers and manual control.
 *
 * Routes live under /api and answer JSON; failures carry `{ success: false, error }`.
 * WebSocket clients connect on /ws and receive every hub event as `{ type, payload }`.
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import express from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import type { EventHub, HubEvent, Subscription } from '../src/core/EventHub.js';
import type { ExecutionResult, Orchestrator } from '../src/core/Orchestrator.js';
import { OrchestratorError, errorMessage, type OrchestratorErrorCode } from '../src/errors.js';

export interface ApiServerConfig {
  host?: string;
  /** 0 picks a free port */
  port: number;
  /** Commentary entries sent to a client when it connects. Default: 20 */
  recentCommentary?: number;
  /** Per-client event queue. Default: 64 */
  clientQueueCapacity?: number;
}

const MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

const ExecuteActionBody = z.object({
  action: z.string(),
  commentary: z.string().optional(),
});

const ExecuteSequenceBody = z.object({
  actions: z.array(z.string()),
  commentary: z.string().optional(),
});

const CommentaryQuery = z.object({
  limit: z.coerce.number().int().min(0).optional(),
});

export function statusForCode(code: OrchestratorErrorCode): number {
  switch (code) {
    case 'INVALID_ACTION':
    case 'INVALID_CONFIG':
      return 400;
    case 'INVALID_STATE':
      return 409;
    default:
      return 500;
  }
}

function sendError(res: express.Response, err: unknown): void {
  const status = err instanceof OrchestratorError ? statusForCode(err.code) : 500;
  if (status === 500) console.error('[ApiServer] Request failed:', err);
  res.status(status).json({ success: false, error: errorMessage(err) });
}

function sendResult(res: express.Response, result: ExecutionResult): void {
  if (result.success) {
    res.json(result);
  } else {
    res.status(statusForCode(result.code)).json({ success: false, error: result.error });
  }
}

function zodIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

/** Screenshots travel base64-encoded; everything else is already JSON-safe. */
export function serializeEvent(event: HubEvent): string {
  if (event.type === 'screenshot-updated') {
    return JSON.stringify({
      type: event.type,
      payload: { image: event.payload.image.toString('base64'), frame: event.payload.frame },
    });
  }
  return JSON.stringify(event);
}

export class ApiServer {
  readonly app: express.Express;
  private orchestrator: Orchestrator;
  private hub: EventHub;
  private config: ApiServerConfig;
  private server: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private subscriptions = new Set<Subscription>();

  constructor(orchestrator: Orchestrator, hub: EventHub, config: ApiServerConfig) {
    this.orchestrator = orchestrator;
    this.hub = hub;
    this.config = config;
    this.app = this.buildApp();
  }

  async listen(): Promise<AddressInfo> {
    const server = http.createServer(this.app);
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.wss.on('connection', (ws) => this.handleConnection(ws));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }
    console.log(`[ApiServer] Listening on http://${address.address}:${address.port} (ws path /ws)`);
    return address;
  }

  async close(): Promise<void> {
    for (const sub of this.subscriptions) sub.close();
    this.subscriptions.clear();

    const wss = this.wss;
    if (wss) {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      this.wss = null;
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      this.server = null;
    }
  }

  private buildApp(): express.Express {
    const app = express();
    app.use(express.json({ limit: '64kb' }));
    const orch = this.orchestrator;

    app.get('/api/status', (_req, res) => {
      res.json({ success: true, ...orch.info() });
    });

    app.get('/api/state', (_req, res) => {
      const state = orch.currentState();
      res.json({ success: true, state, mode: orch.info().mode });
    });

    app.get('/api/screenshot', (_req, res) => {
      try {
        const png = orch.currentScreenshot();
        res.type('image/png').send(png);
      } catch (e) {
        sendError(res, e);
      }
    });

    app.get('/api/commentary', (req, res) => {
      const query = CommentaryQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: zodIssues(query.error) });
        return;
      }
      res.json({ success: true, entries: orch.commentaryHistory(query.data.limit) });
    });

    app.get('/api/assignment', (_req, res) => {
      res.json({ success: true, assignment: orch.getAssignment(), activeAgent: orch.info().activeAgent });
    });

    app.post('/api/assignment', (req, res) => {
      try {
        const assignment = orch.setAssignment(req.body);
        res.json({ success: true, assignment, activeAgent: orch.info().activeAgent });
      } catch (e) {
        sendError(res, e);
      }
    });

    app.post('/api/execute_action', async (req, res) => {
      const body = ExecuteActionBody.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: zodIssues(body.error) });
        return;
      }
      try {
        sendResult(res, await orch.executeAction(body.data.action, body.data.commentary));
      } catch (e) {
        sendError(res, e);
      }
    });

    app.post('/api/execute_sequence', async (req, res) => {
      const body = ExecuteSequenceBody.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: zodIssues(body.error) });
        return;
      }
      try {
        sendResult(res, await orch.executeActionSequence(body.data.actions, body.data.commentary));
      } catch (e) {
        sendError(res, e);
      }
    });

    app.post('/api/start_game', async (_req, res) => {
      try {
        await orch.start();
        res.json({ success: true, status: orch.status });
      } catch (e) {
        sendError(res, e);
      }
    });

    app.post('/api/stop_game', async (_req, res) => {
      try {
        await orch.stop();
        res.json({ success: true, status: orch.status });
      } catch (e) {
        sendError(res, e);
      }
    });

    // Malformed JSON bodies land here
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      res.status(400).json({ success: false, error: errorMessage(err) });
    });

    return app;
  }

  private handleConnection(ws: WebSocket): void {
    const sub = this.hub.subscribe({ capacity: this.config.clientQueueCapacity });
    this.subscriptions.add(sub);

    send(ws, {
      type: 'assignment-changed',
      payload: { assignment: this.orchestrator.getAssignment(), activeAgent: this.orchestrator.info().activeAgent },
    });
    send(ws, { type: 'status-changed', payload: { status: this.orchestrator.status } });
    send(ws, {
      type: 'commentary-history',
      payload: { entries: this.orchestrator.commentaryHistory(this.config.recentCommentary ?? 20) },
    });

    ws.on('close', () => {
      sub.close();
      this.subscriptions.delete(sub);
    });
    ws.on('error', (err) => {
      console.warn('[ApiServer] WebSocket error:', err.message);
    });

    this.pump(ws, sub).catch((e: unknown) => {
      console.warn('[ApiServer] Event pump stopped:', errorMessage(e));
      sub.close();
    });
  }

  private async pump(ws: WebSocket, sub: Subscription): Promise<void> {
    for await (const event of sub) {
      // Let the hub queue shed old events while this client's socket is backed up
      while (ws.readyState === WebSocket.OPEN && ws.bufferedAmount > MAX_BUFFERED_BYTES) {
        await sleep(50);
      }
      if (ws.readyState !== WebSocket.OPEN) break;
      ws.send(serializeEvent(event));
    }
    if (sub.dropped > 0) {
      console.log(`[ApiServer] Client dropped ${sub.dropped} events while behind`);
    }
  }
}

function send(ws: WebSocket, data: object): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
