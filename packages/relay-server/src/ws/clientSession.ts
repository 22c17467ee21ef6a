import { encodeHex, type SessionMetrics, type SessionState } from '@live-relay/shared';

import { describeError, withPrefix, type Logger } from '../logger';
import { RateLimiter } from '../rateLimit';
import type { SessionSettings } from '../sessionSettings';
import { registerStandardTools } from '../tools/standardTools';
import { ToolExecutor } from '../tools/toolExecutor';
import type { LiveClient, LiveConnectConfig, UpstreamEvent, UpstreamTool } from '../upstream/types';
import { UpstreamSessionManager } from '../upstream/upstreamSessionManager';
import { decodeClientFrame } from './clientFrameDispatch';
import { handleUpstreamToolCalls } from './toolCallHandling';
import type { DownstreamConnection, InboundFrame, WsTransport } from './wsTransport';

const RATE_LIMIT_WINDOW_MS = 60_000;

export interface ClientSessionOptions {
  sessionId: string;
  downstream: DownstreamConnection;
  liveClient: LiveClient;
  settings: SessionSettings;
  /** Defaults to an executor with the standard tools from `settings`. */
  toolExecutor?: ToolExecutor;
  logger?: Logger;
  now?: () => number;
}

export function createStandardToolExecutor(
  sessionId: string,
  settings: SessionSettings,
  logger?: Logger,
): ToolExecutor {
  const executor = new ToolExecutor({
    timeoutMs: settings.toolTimeoutMs,
    sessionId,
    ...(logger ? { logger: withPrefix(logger, 'tools') } : {}),
  });
  registerStandardTools(executor, settings.toolAllowlist ? { allowlist: settings.toolAllowlist } : {});
  return executor;
}

function buildConnectConfig(
  settings: SessionSettings,
  executor: ToolExecutor,
): Omit<LiveConnectConfig, 'resumptionHandle'> {
  const tools: UpstreamTool[] = [];
  if (executor.listToolNames().length > 0) {
    tools.push(...executor.getDeclarations());
  }
  if (settings.googleSearch) {
    tools.push({ googleSearch: {} });
  }
  return {
    responseModalities: [...settings.responseModalities],
    ...(settings.systemInstruction ? { systemInstruction: settings.systemInstruction } : {}),
    ...(settings.voiceName ? { voiceName: settings.voiceName } : {}),
    tools,
    contextWindowCompression: settings.contextWindowCompression,
  };
}

/**
 * Binds one downstream WebSocket to one upstream Live session. Inbound frames
 * are processed one at a time in arrival order; upstream events are pumped by
 * a background receive loop.
 */
export class ClientSession {
  readonly sessionId: string;
  private readonly downstream: DownstreamConnection;
  private readonly transport: WsTransport;
  private readonly manager: UpstreamSessionManager;
  private readonly executor: ToolExecutor;
  private readonly settings: SessionSettings;
  private readonly logger: Logger | undefined;
  private readonly now: () => number;
  private readonly createdAt: number;
  private readonly unsubscribeState: () => void;

  private readonly messageRateLimiter: RateLimiter;
  private readonly audioRateLimiter: RateLimiter;
  private readonly toolCallRateLimiter: RateLimiter;

  private messageQueue: Array<() => Promise<void>> = [];
  private processing = false;
  private started = false;
  private closed = false;
  private turnCount = 0;
  private toolCallCount = 0;
  /** Bumped on reset and teardown so a superseded receive loop stops. */
  private receiveEpoch = 0;

  private readonly done: Promise<void>;
  private resolveDone: () => void = () => undefined;

  constructor(options: ClientSessionOptions) {
    this.sessionId = options.sessionId;
    this.downstream = options.downstream;
    this.transport = options.downstream.transport;
    this.settings = options.settings;
    this.logger = options.logger
      ? withPrefix(options.logger, `session ${options.sessionId}`)
      : undefined;
    this.now = options.now ?? Date.now;
    this.createdAt = this.now();

    this.executor =
      options.toolExecutor ??
      createStandardToolExecutor(options.sessionId, options.settings, options.logger);

    const { limits } = options.settings;
    this.messageRateLimiter = new RateLimiter({
      maxTokens: limits.maxMessagesPerMinute,
      windowMs: RATE_LIMIT_WINDOW_MS,
    });
    this.audioRateLimiter = new RateLimiter({
      maxTokens: limits.maxAudioBytesPerMinute,
      windowMs: RATE_LIMIT_WINDOW_MS,
    });
    this.toolCallRateLimiter = new RateLimiter({
      maxTokens: limits.maxToolCallsPerMinute,
      windowMs: RATE_LIMIT_WINDOW_MS,
    });

    this.manager = new UpstreamSessionManager({
      client: options.liveClient,
      model: options.settings.model,
      config: buildConnectConfig(options.settings, this.executor),
      ...(options.logger ? { logger: withPrefix(options.logger, `upstream ${options.sessionId}`) } : {}),
    });
    this.unsubscribeState = this.manager.onStateChange((state) => {
      this.transport.sendJson({ type: 'state_change', state });
    });

    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): SessionState {
    return this.manager.state;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Starts the session and resolves once it has been torn down.
   */
  run(): Promise<void> {
    if (!this.started) {
      this.started = true;
      this.enqueue(() => this.start());
      this.downstream.attach({
        onFrame: (frame) => this.onFrame(frame),
        onClose: () => {
          this.teardown('client disconnected').catch((err: unknown) => {
            this.logger?.error(`Teardown failed: ${describeError(err)}`);
          });
        },
      });
    }
    return this.done;
  }

  close(reason = 'server shutdown'): Promise<void> {
    return this.teardown(reason);
  }

  getMetrics(): SessionMetrics {
    const elapsedMs = Math.max(0, this.now() - this.createdAt);
    return {
      sessionId: this.sessionId,
      durationSeconds: Math.round(elapsedMs / 100) / 10,
      turnCount: this.turnCount,
      toolCallCount: this.toolCallCount,
      state: this.manager.state,
    };
  }

  private enqueue(handler: () => Promise<void>): void {
    if (this.closed) {
      return;
    }
    this.messageQueue.push(handler);
    if (!this.processing) {
      void this.processQueue();
    }
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    while (this.messageQueue.length > 0) {
      const next = this.messageQueue.shift();
      if (!next) {
        continue;
      }
      try {
        await next();
      } catch (err) {
        this.logger?.error(`Error processing queued frame: ${describeError(err)}`);
      }
    }
    this.processing = false;
  }

  private async start(): Promise<void> {
    if (this.closed) {
      return;
    }
    const result = await this.manager.connect();
    if (this.closed) {
      await this.releaseUpstream();
      return;
    }
    if (!result.ok) {
      this.transport.sendJson({ type: 'error', error: `Connection failed: ${result.error}` });
      return;
    }
    this.transport.sendJson({ type: 'connected', sessionId: this.sessionId, state: this.manager.state });
    this.startReceiveLoop();
  }

  private onFrame(frame: InboundFrame): void {
    if (this.closed) {
      return;
    }
    const action = decodeClientFrame(frame);
    switch (action.kind) {
      case 'ignored':
        this.logger?.debug?.(`Ignoring frame: ${action.reason}`);
        return;
      case 'invalid':
        this.enqueue(async () => this.sendError(action.error));
        return;
      case 'audio': {
        const limited = this.audioRateLimiter.check(action.bytes.length);
        if (!limited.allowed) {
          if (limited.firstRejection) {
            this.enqueue(async () =>
              this.sendError(
                `Audio rate limit exceeded (max ${this.settings.limits.maxAudioBytesPerMinute} bytes per minute)`,
              ),
            );
          }
          return;
        }
        const { bytes } = action;
        this.enqueue(() => this.forwardAudio(bytes));
        return;
      }
      case 'text': {
        const limited = this.messageRateLimiter.check(1);
        if (!limited.allowed) {
          this.enqueue(async () =>
            this.sendError(
              `Message rate limit exceeded (max ${this.settings.limits.maxMessagesPerMinute} per minute)`,
            ),
          );
          return;
        }
        const { text } = action;
        this.enqueue(() => this.forwardText(text));
        return;
      }
      case 'reset':
        this.enqueue(() => this.resetSession());
        return;
      case 'ping':
        this.enqueue(async () => this.transport.sendJson({ type: 'pong' }));
        return;
    }
  }

  private async forwardAudio(bytes: Uint8Array): Promise<void> {
    try {
      await this.manager.sendAudio(bytes, this.settings.audioInputMimeType);
    } catch (err) {
      this.sendError(describeError(err));
    }
  }

  private async forwardText(text: string): Promise<void> {
    try {
      await this.manager.sendText(text);
    } catch (err) {
      this.sendError(describeError(err));
    }
  }

  private async resetSession(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.logger?.info('Resetting session');
    this.receiveEpoch += 1;
    this.turnCount = 0;
    this.toolCallCount = 0;
    this.messageRateLimiter.reset();
    this.audioRateLimiter.reset();
    this.toolCallRateLimiter.reset();

    const result = await this.manager.reset();
    if (this.closed) {
      await this.releaseUpstream();
      return;
    }
    if (!result.ok) {
      this.sendError(`Connection failed: ${result.error}`);
      return;
    }
    this.transport.sendJson({ type: 'session_reset', sessionId: this.sessionId });
    this.startReceiveLoop();
  }

  private startReceiveLoop(): void {
    this.receiveEpoch += 1;
    void this.runReceiveLoop(this.receiveEpoch);
  }

  private isStale(epoch: number): boolean {
    return this.closed || epoch !== this.receiveEpoch;
  }

  private async runReceiveLoop(epoch: number): Promise<void> {
    try {
      while (!this.isStale(epoch) && this.manager.canReceive()) {
        for await (const event of this.manager.receive()) {
          if (this.isStale(epoch)) {
            return;
          }
          await this.handleUpstreamEvent(event, epoch);
        }
      }
    } catch (err) {
      if (this.isStale(epoch)) {
        return;
      }
      const message = describeError(err);
      this.logger?.error(`Receive loop failed: ${message}`);
      this.sendError(`Upstream error: ${message}`);
      await this.teardown('upstream error');
    }
  }

  private async handleUpstreamEvent(event: UpstreamEvent, epoch: number): Promise<void> {
    if (event.audioData && event.audioData.length > 0) {
      this.transport.sendJson({ type: 'audio', data: encodeHex(event.audioData) });
    }
    if (event.textDelta) {
      this.transport.sendJson({ type: 'text', text: event.textDelta });
    }
    if (event.toolCalls && event.toolCalls.length > 0) {
      const processed = await handleUpstreamToolCalls({
        invocations: event.toolCalls,
        executor: this.executor,
        transport: this.transport,
        toolCallRateLimiter: this.toolCallRateLimiter,
        maxToolCallsPerMinute: this.settings.limits.maxToolCallsPerMinute,
        isClosed: () => this.isStale(epoch),
        sendToolResult: (results) => this.manager.sendToolResult(results),
        ...(this.logger ? { logger: this.logger } : {}),
      });
      if (this.isStale(epoch)) {
        return;
      }
      this.toolCallCount += processed;
    }
    if (event.interrupted) {
      this.transport.sendJson({ type: 'interrupted' });
      this.manager.resume();
    }
    if (event.turnComplete) {
      this.turnCount += 1;
      this.transport.sendJson({ type: 'turn_complete', turnNumber: this.turnCount });
    }
  }

  private sendError(error: string): void {
    this.transport.sendJson({ type: 'error', error });
  }

  private async teardown(reason: string): Promise<void> {
    if (this.closed) {
      return this.done;
    }
    this.closed = true;
    this.receiveEpoch += 1;
    this.messageQueue = [];
    this.logger?.info(`Closing session (${reason})`);

    await this.releaseUpstream();
    this.unsubscribeState();

    if (this.transport.isOpen()) {
      this.transport.sendJson({ type: 'disconnected', sessionId: this.sessionId });
    }
    this.transport.close(1000, 'session closed');
    this.resolveDone();
  }

  /**
   * Disconnects the upstream. Also used when a connect raced with teardown
   * and succeeded after the session closed.
   */
  private async releaseUpstream(): Promise<void> {
    try {
      await this.manager.disconnect();
    } catch (err) {
      this.logger?.warn(`Upstream disconnect failed: ${describeError(err)}`);
    }
  }
}
