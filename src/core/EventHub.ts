/**
 * Ordered commentary log plus broadcast of session events to subscribers.
 *
 * Each subscriber owns a bounded drop-oldest queue. Publishing only enqueues, so a slow
 * or stalled consumer loses old events instead of holding up the control loop.
 */

import type { GameState, Mode } from '../state/GameState.js';
import { BoundedQueue } from './BoundedQueue.js';
import type { AssignmentConfig } from './DispatchPolicy.js';

export type SessionStatus = 'stopped' | 'starting' | 'running' | 'stopping';

export interface CommentaryEntry {
  /** Strictly increasing, gapless, assigned at publication */
  sequence: number;
  text: string;
  /** Label of the producer, e.g. "claude as battle", "manual", "orchestrator" */
  source: string;
  /** Milliseconds since epoch */
  timestamp: number;
}

export interface StatePayload {
  state: GameState;
  mode: Mode;
  activeAgent: string;
}

export interface AssignmentPayload {
  assignment: AssignmentConfig;
  activeAgent: string;
}

export type HubEvent =
  | { type: 'state-updated'; payload: StatePayload }
  | { type: 'screenshot-updated'; payload: { image: Buffer; frame: number } }
  | { type: 'commentary-added'; payload: CommentaryEntry }
  | { type: 'assignment-changed'; payload: AssignmentPayload }
  | { type: 'status-changed'; payload: { status: SessionStatus } };

export type HubEventType = HubEvent['type'];

export interface EventHubConfig {
  /** Commentary entries retained for late joiners. Default: 1000 */
  historyCapacity?: number;
  /** Per-subscriber queue size when subscribe() is not given one. Default: 64 */
  defaultSubscriberCapacity?: number;
  /** Clock for commentary timestamps */
  now?: () => number;
}

export interface SubscribeOptions {
  capacity?: number;
  /** Only these event types are queued */
  types?: readonly HubEventType[];
}

export class Subscription implements AsyncIterableIterator<HubEvent> {
  private queue: BoundedQueue<HubEvent>;
  private types: ReadonlySet<HubEventType> | null;
  private waiter: ((result: IteratorResult<HubEvent>) => void) | null = null;
  private _closed = false;
  private onClose: (sub: Subscription) => void;

  constructor(capacity: number, types: readonly HubEventType[] | undefined, onClose: (sub: Subscription) => void) {
    this.queue = new BoundedQueue(capacity);
    this.types = types ? new Set(types) : null;
    this.onClose = onClose;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Events evicted because this subscriber fell behind */
  get dropped(): number {
    return this.queue.dropped;
  }

  /** Called by the hub. Never blocks. */
  deliver(event: HubEvent): void {
    if (this._closed) return;
    if (this.types && !this.types.has(event.type)) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return;
    }
    this.queue.push(event);
  }

  /** Everything queued right now, without waiting */
  drain(): HubEvent[] {
    return this.queue.drain();
  }

  next(): Promise<IteratorResult<HubEvent>> {
    const event = this.queue.shift();
    if (event !== undefined) return Promise.resolve({ value: event, done: false });
    if (this._closed) return Promise.resolve({ value: undefined, done: true });
    if (this.waiter) {
      return Promise.reject(new Error('Subscription already has a pending next()'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  return(): Promise<IteratorResult<HubEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.queue.clear();
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<HubEvent> {
    return this;
  }
}

export class EventHub {
  private subscribers = new Set<Subscription>();
  private log: BoundedQueue<CommentaryEntry>;
  private nextSequence = 1;
  private defaultCapacity: number;
  private now: () => number;

  constructor(config: EventHubConfig = {}) {
    this.log = new BoundedQueue(config.historyCapacity ?? 1000);
    this.defaultCapacity = config.defaultSubscriberCapacity ?? 64;
    this.now = config.now ?? Date.now;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** Sequence number the next commentary entry will receive */
  get upcomingSequence(): number {
    return this.nextSequence;
  }

  subscribe(options: SubscribeOptions = {}): Subscription {
    const sub = new Subscription(
      options.capacity ?? this.defaultCapacity,
      options.types,
      (closed) => this.subscribers.delete(closed),
    );
    this.subscribers.add(sub);
    return sub;
  }

  publishCommentary(text: string, source: string): CommentaryEntry {
    const entry: CommentaryEntry = Object.freeze({
      sequence: this.nextSequence++,
      text,
      source,
      timestamp: this.now(),
    });
    this.log.push(entry);
    this.broadcast({ type: 'commentary-added', payload: entry });
    return entry;
  }

  publishState(payload: StatePayload): void {
    this.broadcast({ type: 'state-updated', payload });
  }

  publishFrame(image: Buffer, frame: number): void {
    this.broadcast({ type: 'screenshot-updated', payload: { image, frame } });
  }

  publishAssignment(payload: AssignmentPayload): void {
    this.broadcast({ type: 'assignment-changed', payload });
  }

  publishStatus(status: SessionStatus): void {
    this.broadcast({ type: 'status-changed', payload: { status } });
  }

  /** Last `limit` commentary entries, oldest first. */
  history(limit?: number): CommentaryEntry[] {
    const all = this.log.toArray();
    if (limit === undefined || limit >= all.length) return all;
    if (limit <= 0) return [];
    return all.slice(all.length - limit);
  }


  private broadcast(event: HubEvent): void {
    for (const sub of [...this.subscribers]) {
      if (sub.closed) {
        this.subscribers.delete(sub);
        continue;
      }
      sub.deliver(event);
    }
  }
}
