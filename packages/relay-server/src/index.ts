import http from 'node:http';
import type { Duplex } from 'node:stream';

import dotenv from 'dotenv';
import { WebSocketServer, type WebSocket } from 'ws';

import { loadAppConfig, type AppConfig } from './appConfig';
import { loadEnvConfig, upstreamConfigured, type EnvConfig } from './envConfig';
import { createHttpServer } from './http/server';
import { describeError, withPrefix, type Logger } from './logger';
import { ProxyServer } from './proxyServer';
import { buildSessionSettings } from './sessionSettings';
import { GeminiLiveClient } from './upstream/geminiLiveClient';
import type { LiveClient } from './upstream/types';
import { createWsDownstream } from './ws/wsTransport';

export { ProxyServer } from './proxyServer';
export { ClientSession } from './ws/clientSession';
export { UpstreamSessionManager } from './upstream/upstreamSessionManager';
export { ToolExecutor } from './tools/toolExecutor';
export { GeminiLiveClient } from './upstream/geminiLiveClient';
export { createHttpServer } from './http/server';

dotenv.config();

const KEEP_ALIVE_INTERVAL_MS = 30_000;

export interface StartServerOptions {
  config: EnvConfig;
  appConfig: AppConfig;
  /** Defaults to a Gemini Live client built from `config`. */
  liveClient?: LiveClient;
  logger?: Logger;
}

export interface RunningServer {
  readonly port: number;
  readonly proxy: ProxyServer;
  close(): Promise<void>;
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

export function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { config, appConfig, logger } = options;
  const wsLogger = logger ? withPrefix(logger, 'ws') : undefined;

  const liveClient =
    options.liveClient ??
    new GeminiLiveClient({
      apiKey: config.apiKey,
      baseUrl: config.liveBaseUrl,
      apiVersion: config.apiVersion,
      setupTimeoutMs: config.upstreamSetupTimeoutMs,
      ...(logger ? { logger: withPrefix(logger, 'upstream') } : {}),
    });

  const proxy = new ProxyServer({
    liveClient,
    settings: buildSessionSettings(config, appConfig),
    ...(logger ? { logger } : {}),
  });

  const httpServer = createHttpServer({
    config,
    sessions: proxy,
    ...(logger ? { logger } : {}),
  });

  const wss = new WebSocketServer({ noServer: true });

  httpServer.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    if (url.pathname !== config.liveWsPath) {
      wsLogger?.warn(`Rejected WebSocket upgrade: invalid path ${url.pathname}`);
      rejectUpgrade(socket, '404 Not Found');
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  const alive = new WeakMap<WebSocket, boolean>();

  wss.on('connection', (ws: WebSocket) => {
    alive.set(ws, true);
    ws.on('pong', () => {
      alive.set(ws, true);
    });

    proxy.handleConnection(createWsDownstream(ws, wsLogger)).catch((err: unknown) => {
      wsLogger?.error(`Session failed: ${describeError(err)}`);
      ws.terminate();
    });
  });

  const keepAlive = setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        wsLogger?.warn('Terminating unresponsive client');
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      try {
        ws.ping();
      } catch (err) {
        wsLogger?.warn(`Keep-alive ping failed: ${describeError(err)}`);
      }
    }
  }, KEEP_ALIVE_INTERVAL_MS);
  keepAlive.unref();

  const close = async (): Promise<void> => {
    clearInterval(keepAlive);
    await proxy.closeAll();
    for (const ws of wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return new Promise<RunningServer>((resolve, reject) => {
    const onError = (err: Error): void => {
      clearInterval(keepAlive);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off('error', onError);
      const address = httpServer.address();
      const port = address && typeof address !== 'string' ? address.port : config.port;
      logger?.info(
        `Live relay listening on http://${config.host}:${port} (WS path: ${config.liveWsPath}, model: ${config.model})`,
      );
      if (!upstreamConfigured(config)) {
        logger?.warn('GOOGLE_API_KEY is not set; upstream Live connections will fail.');
      }
      resolve({ port, proxy, close });
    });
  });
}

export async function runServer(): Promise<void> {
  const config = loadEnvConfig();
  const appConfig = loadAppConfig(config.appConfigPath);
  const server = await startServer({ config, appConfig, logger: console });

  let shuttingDown = false;
  const shutdownHandler = (): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[shutdown] Closing ${server.proxy.sessionCount} session(s)...`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(`[shutdown] Failed to close cleanly: ${describeError(err)}`);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdownHandler);
  process.once('SIGTERM', shutdownHandler);
}

// Only start the server when this module is executed directly via Node,
// not when it is imported by tests or other modules.
if (require.main === module) {
  runServer().catch((err: unknown) => {
    console.error(`Failed to start live relay: ${describeError(err)}`);
    process.exit(1);
  });
}
