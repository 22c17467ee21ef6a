import { WebSocket, type RawData } from 'ws';

import { describeError, type Logger } from '../logger';
import type { ToolInvocationResult } from '../tools/types';
import { AsyncEventQueue } from './asyncEventQueue';
import {
  buildAudioMessage,
  buildLiveUrl,
  buildSetupMessage,
  buildTextMessage,
  buildToolResponseMessage,
  LiveServerMessageSchema,
  redactKey,
  toUpstreamEvent,
  type LiveServerMessage,
} from './geminiMessages';
import type { LiveClient, LiveConnectConfig, LiveStream, UpstreamEvent } from './types';

export interface GeminiLiveClientOptions {
  apiKey: string | undefined;
  baseUrl: string;
  apiVersion: string;
  setupTimeoutMs: number;
  logger?: Logger;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

function parseServerMessage(data: RawData): LiveServerMessage | string {
  let json: unknown;
  try {
    json = JSON.parse(rawDataToString(data));
  } catch (err) {
    return `Upstream sent invalid JSON: ${describeError(err)}`;
  }
  const result = LiveServerMessageSchema.safeParse(json);
  if (!result.success) {
    return `Upstream sent an unrecognised message: ${result.error.message}`;
  }
  return result.data;
}

class GeminiLiveStream implements LiveStream {
  private readonly queue = new AsyncEventQueue<UpstreamEvent>();
  private closedByClient = false;

  constructor(
    private readonly socket: WebSocket,
    private readonly logger: Logger | undefined,
  ) {}

  get events(): AsyncIterable<UpstreamEvent> {
    return this.queue;
  }

  handleMessage(message: LiveServerMessage): void {
    if (message.error) {
      const detail = message.error.message ?? message.error.status ?? 'unknown error';
      this.queue.fail(new Error(`Upstream error: ${detail}`));
      return;
    }
    if (message.goAway) {
      this.logger?.warn(`Upstream will close soon (time left: ${message.goAway.timeLeft ?? '?'})`);
    }
    if (message.toolCallCancellation?.ids?.length) {
      this.logger?.info(`Upstream cancelled tool calls: ${message.toolCallCancellation.ids.join(', ')}`);
    }
    const event = toUpstreamEvent(message);
    if (event) {
      this.queue.push(event);
    }
  }

  handleClose(code: number, reason: string): void {
    if (this.closedByClient || code === 1000) {
      this.queue.end();
      return;
    }
    const suffix = reason ? `: ${reason}` : '';
    this.queue.fail(new Error(`Upstream closed with code ${code}${suffix}`));
  }

  handleError(err: Error): void {
    this.queue.fail(err);
  }

  sendText(text: string): Promise<void> {
    return this.send(buildTextMessage(text));
  }

  sendAudio(bytes: Uint8Array, mimeType: string): Promise<void> {
    return this.send(buildAudioMessage(bytes, mimeType));
  }

  sendToolResult(results: readonly ToolInvocationResult[]): Promise<void> {
    return this.send(buildToolResponseMessage(results));
  }

  async close(): Promise<void> {
    this.closedByClient = true;
    this.queue.end();
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000, 'client closed');
    } else if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
    }
  }

  private send(payload: Record<string, unknown>): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Upstream socket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(payload), (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * {@link LiveClient} speaking the Gemini Live `BidiGenerateContent` protocol
 * over a WebSocket.
 */
export class GeminiLiveClient implements LiveClient {
  constructor(private readonly options: GeminiLiveClientOptions) {}

  open(model: string, config: LiveConnectConfig): Promise<LiveStream> {
    const { apiKey, baseUrl, apiVersion, setupTimeoutMs, logger } = this.options;
    if (!apiKey) {
      return Promise.reject(new Error('GOOGLE_API_KEY is not configured'));
    }

    const url = buildLiveUrl(baseUrl, apiVersion, apiKey);
    logger?.info(`Opening upstream ${redactKey(url)} (model ${model})`);

    return new Promise<LiveStream>((resolve, reject) => {
      const socket = new WebSocket(url);
      const stream = new GeminiLiveStream(socket, logger);
      let phase: 'setup' | 'ready' | 'failed' = 'setup';

      const fail = (error: Error): void => {
        if (phase !== 'setup') {
          return;
        }
        phase = 'failed';
        clearTimeout(timer);
        socket.terminate();
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new Error(`Upstream setup timed out after ${setupTimeoutMs}ms`));
      }, setupTimeoutMs);

      socket.on('open', () => {
        socket.send(JSON.stringify(buildSetupMessage(model, config)), (err) => {
          if (err) {
            fail(err);
          }
        });
      });

      socket.on('message', (data) => {
        const message = parseServerMessage(data);
        if (typeof message === 'string') {
          logger?.warn(message);
          return;
        }
        if (phase === 'failed') {
          return;
        }
        if (phase === 'setup') {
          if (message.error) {
            fail(new Error(`Upstream rejected setup: ${message.error.message ?? 'unknown error'}`));
          } else if (message.setupComplete) {
            phase = 'ready';
            clearTimeout(timer);
            resolve(stream);
          }
          return;
        }
        stream.handleMessage(message);
      });

      socket.on('close', (code, reason) => {
        const reasonText = reason.toString('utf8');
        if (phase === 'failed') {
          return;
        }
        if (phase === 'setup') {
          const suffix = reasonText ? `: ${reasonText}` : '';
          fail(new Error(`Upstream closed during setup (code ${code}${suffix})`));
          return;
        }
        stream.handleClose(code, reasonText);
      });

      socket.on('error', (err) => {
        if (phase === 'failed') {
          return;
        }
        if (phase === 'setup') {
          fail(err);
          return;
        }
        logger?.error(`Upstream socket error: ${err.message}`);
        stream.handleError(err);
      });
    });
  }
}
