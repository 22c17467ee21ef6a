import type { ConversationEntry, SessionState } from '@live-relay/shared';

import { describeError, type Logger } from '../logger';
import type { ToolInvocationResult } from '../tools/types';
import { InvalidStateTransitionError, NotConnectedError, UpstreamClosedError } from './errors';
import type { LiveClient, LiveConnectConfig, LiveStream, UpstreamEvent } from './types';

export type ConnectResult = { ok: true } | { ok: false; error: string };

export type StateChangeListener = (state: SessionState, previous: SessionState) => void;

const ALLOWED_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'error', 'closing'],
  connected: ['interrupted', 'closing', 'error'],
  interrupted: ['connected', 'closing', 'error'],
  closing: ['closed'],
  closed: ['connecting'],
  error: ['connecting', 'closing'],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface UpstreamSessionManagerOptions {
  client: LiveClient;
  model: string;
  /** Connect config without the resumption handle, which the manager owns. */
  config: Omit<LiveConnectConfig, 'resumptionHandle'>;
  logger?: Logger;
}

/**
 * Owns one upstream Live connection: its state machine, resumption handle and
 * conversation history.
 */
export class UpstreamSessionManager {
  private readonly client: LiveClient;
  private readonly model: string;
  private readonly config: Omit<LiveConnectConfig, 'resumptionHandle'>;
  private readonly logger: Logger | undefined;
  private readonly listeners = new Set<StateChangeListener>();

  private currentState: SessionState = 'disconnected';
  private stream: LiveStream | null = null;
  private events: AsyncIterator<UpstreamEvent> | null = null;
  private resumptionToken: string | undefined;
  private history: Readonly<ConversationEntry>[] = [];
  private modelTextForTurn = '';

  constructor(options: UpstreamSessionManagerOptions) {
    this.client = options.client;
    this.model = options.model;
    this.config = options.config;
    this.logger = options.logger;
  }

  get state(): SessionState {
    return this.currentState;
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  canReceive(): boolean {
    return (
      (this.currentState === 'connected' || this.currentState === 'interrupted') &&
      this.events !== null
    );
  }

  getConversationHistory(): Readonly<ConversationEntry>[] {
    return [...this.history];
  }

  getResumptionToken(): string | undefined {
    return this.resumptionToken;
  }

  async connect(): Promise<ConnectResult> {
    if (this.stream) {
      return { ok: false, error: 'Session already connected' };
    }
    if (!canTransition(this.currentState, 'connecting')) {
      return { ok: false, error: `Cannot connect while ${this.currentState}` };
    }

    this.transition('connecting');
    const resumptionHandle = this.resumptionToken;
    let stream: LiveStream;
    try {
      stream = await this.client.open(this.model, {
        ...this.config,
        ...(resumptionHandle ? { resumptionHandle } : {}),
      });
    } catch (err) {
      const message = describeError(err);
      this.logger?.error(`Upstream connect failed: ${message}`);
      if (this.currentState === 'connecting') {
        this.transition('error');
      }
      return { ok: false, error: message };
    }

    if (this.currentState !== 'connecting') {
      // disconnect() ran while the connection was opening
      await this.closeQuietly(stream);
      return { ok: false, error: 'Connection cancelled' };
    }

    this.stream = stream;
    this.events = stream.events[Symbol.asyncIterator]();
    this.modelTextForTurn = '';
    this.transition('connected');
    this.logger?.info(
      resumptionHandle ? 'Upstream connected (resumed session)' : 'Upstream connected',
    );
    return { ok: true };
  }

  async disconnect(): Promise<void> {
    const state = this.currentState;
    if (state === 'disconnected' || state === 'closed' || state === 'closing') {
      return;
    }

    this.transition('closing');
    const stream = this.stream;
    this.stream = null;
    this.events = null;
    this.modelTextForTurn = '';
    if (stream) {
      await this.closeQuietly(stream);
    }
    this.transition('closed');
    this.logger?.info('Upstream disconnected');
  }

  async sendText(text: string): Promise<void> {
    const stream = this.requireConnected();
    await stream.sendText(text);
    this.appendHistory('user', text);
  }

  async sendAudio(bytes: Uint8Array, mimeType: string): Promise<void> {
    const stream = this.requireConnected();
    await stream.sendAudio(bytes, mimeType);
  }

  async sendToolResult(results: readonly ToolInvocationResult[]): Promise<void> {
    const stream = this.requireConnected();
    await stream.sendToolResult(results);
  }

  /**
   * Yields upstream events for one turn. Ends after the `turnComplete` event
   * or when the connection is closed by {@link disconnect}. Leaving the loop
   * early keeps the connection open; the next call picks up where this one
   * stopped.
   */
  async *receive(): AsyncGenerator<UpstreamEvent, void, undefined> {
    const events = this.events;
    if (!events || !this.canReceive()) {
      throw new NotConnectedError();
    }

    while (true) {
      let next: IteratorResult<UpstreamEvent>;
      try {
        next = await events.next();
      } catch (err) {
        if (this.events !== events) {
          return;
        }
        await this.failUpstream();
        throw new UpstreamClosedError(`Upstream connection failed: ${describeError(err)}`, {
          cause: err,
        });
      }

      if (this.events !== events) {
        return;
      }
      if (next.done) {
        await this.failUpstream();
        throw new UpstreamClosedError('Upstream connection closed');
      }

      const event = next.value;
      if (event.resumptionUpdate) {
        this.resumptionToken = event.resumptionUpdate;
      }
      if (event.interrupted && this.currentState === 'connected') {
        this.transition('interrupted');
      }
      if (event.textDelta) {
        this.modelTextForTurn += event.textDelta;
      }
      if (event.turnComplete) {
        this.recordModelTurn();
      }

      yield event;

      if (event.turnComplete) {
        return;
      }
    }
  }

  resume(): void {
    if (this.currentState === 'interrupted') {
      this.transition('connected');
    }
  }

  /**
   * Drops the conversation context: disconnects, clears history and the
   * resumption handle, then connects again.
   */
  async reset(): Promise<ConnectResult> {
    await this.disconnect();
    this.history = [];
    this.resumptionToken = undefined;
    return this.connect();
  }

  private requireConnected(): LiveStream {
    if (this.currentState !== 'connected' || !this.stream) {
      throw new NotConnectedError();
    }
    return this.stream;
  }

  private recordModelTurn(): void {
    const content = this.modelTextForTurn.trim();
    this.modelTextForTurn = '';
    if (content.length > 0) {
      this.appendHistory('model', content);
    }
  }

  private appendHistory(role: ConversationEntry['role'], content: string): void {
    const entry: ConversationEntry = {
      role,
      content,
      type: 'text',
      timestamp: new Date().toISOString(),
    };
    this.history.push(Object.freeze(entry));
  }

  private async failUpstream(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    this.events = null;
    this.modelTextForTurn = '';
    if (canTransition(this.currentState, 'error')) {
      this.transition('error');
    }
    if (stream) {
      await this.closeQuietly(stream);
    }
  }

  private async closeQuietly(stream: LiveStream): Promise<void> {
    try {
      await stream.close();
    } catch (err) {
      this.logger?.warn(`Error closing upstream stream: ${describeError(err)}`);
    }
  }

  private transition(next: SessionState): void {
    const previous = this.currentState;
    if (!canTransition(previous, next)) {
      throw new InvalidStateTransitionError(previous, next);
    }
    this.currentState = next;
    this.logger?.debug?.(`State ${previous} -> ${next}`);

    for (const listener of Array.from(this.listeners)) {
      try {
        listener(next, previous);
      } catch (err) {
        this.logger?.warn(`State change listener failed: ${describeError(err)}`);
      }
    }
  }
}
