import { randomUUID } from 'node:crypto';

import type { SessionMetrics } from '@live-relay/shared';

import { withPrefix, type Logger } from './logger';
import { SessionRegistry } from './sessionRegistry';
import type { SessionSettings } from './sessionSettings';
import type { ToolExecutor } from './tools/toolExecutor';
import type { LiveClient } from './upstream/types';
import { ClientSession } from './ws/clientSession';
import type { DownstreamConnection } from './ws/wsTransport';

export interface ProxyServerOptions {
  liveClient: LiveClient;
  settings: SessionSettings;
  logger?: Logger;
  createSessionId?: () => string;
  /** Overrides the per-session standard tool executor. */
  createToolExecutor?: (sessionId: string) => ToolExecutor;
}

/**
 * Accepts downstream connections and runs one {@link ClientSession} per
 * connection for as long as it stays open.
 */
export class ProxyServer {
  private readonly registry = new SessionRegistry<ClientSession>();
  private readonly liveClient: LiveClient;
  private readonly settings: SessionSettings;
  private readonly logger: Logger | undefined;
  private readonly wsLogger: Logger | undefined;
  private readonly createSessionId: () => string;
  private readonly createToolExecutor: ((sessionId: string) => ToolExecutor) | undefined;

  constructor(options: ProxyServerOptions) {
    this.liveClient = options.liveClient;
    this.settings = options.settings;
    this.logger = options.logger;
    this.wsLogger = options.logger ? withPrefix(options.logger, 'ws') : undefined;
    this.createSessionId = options.createSessionId ?? randomUUID;
    this.createToolExecutor = options.createToolExecutor;
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  /**
   * Runs a session for `downstream` and resolves once it has closed and been
   * deregistered.
   */
  async handleConnection(downstream: DownstreamConnection): Promise<void> {
    const sessionId = this.createSessionId();
    const session = new ClientSession({
      sessionId,
      downstream,
      liveClient: this.liveClient,
      settings: this.settings,
      ...(this.createToolExecutor ? { toolExecutor: this.createToolExecutor(sessionId) } : {}),
      ...(this.logger ? { logger: this.logger } : {}),
    });

    this.registry.register(session);
    this.wsLogger?.info(`Session ${sessionId} opened (${this.registry.size} active)`);
    try {
      await session.run();
    } finally {
      this.registry.unregister(sessionId, session);
      this.wsLogger?.info(`Session ${sessionId} closed (${this.registry.size} active)`);
    }
  }

  getSession(sessionId: string): ClientSession | undefined {
    return this.registry.get(sessionId);
  }

  getAllMetrics(): SessionMetrics[] {
    return this.registry.snapshotMetrics();
  }

  async closeAll(reason = 'server shutdown'): Promise<void> {
    await Promise.all(this.registry.list().map((session) => session.close(reason)));
  }
}
