import { WebSocket, type RawData } from 'ws';

import type { ServerFrame } from '@live-relay/shared';

import { describeError, type Logger } from '../logger';

export interface WsTransport {
  sendJson(frame: ServerFrame): void;
  close(code: number, reason: string): void;
  isOpen(): boolean;
}

export type InboundFrame = { kind: 'text'; text: string } | { kind: 'binary'; bytes: Uint8Array };

export interface DownstreamHandlers {
  onFrame(frame: InboundFrame): void;
  onClose(): void;
}

/**
 * One client connection: an outbound transport plus inbound frame delivery.
 */
export interface DownstreamConnection {
  readonly transport: WsTransport;
  attach(handlers: DownstreamHandlers): void;
}

export function createWsTransport(socket: WebSocket, logger?: Logger): WsTransport {
  return {
    sendJson(frame) {
      if (socket.readyState !== WebSocket.OPEN) {
        return;
      }
      try {
        socket.send(JSON.stringify(frame));
      } catch (err) {
        logger?.warn(`Dropped ${frame.type} frame: ${describeError(err)}`);
      }
    },
    close(code, reason) {
      if (socket.readyState !== WebSocket.OPEN && socket.readyState !== WebSocket.CONNECTING) {
        return;
      }
      try {
        socket.close(code, reason);
      } catch (err) {
        logger?.warn(`Failed to close socket: ${describeError(err)}`);
      }
    },
    isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
  };
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export function createWsDownstream(socket: WebSocket, logger?: Logger): DownstreamConnection {
  const transport = createWsTransport(socket, logger);
  return {
    transport,
    attach(handlers) {
      socket.on('message', (data: RawData, isBinary: boolean) => {
        try {
          if (isBinary) {
            handlers.onFrame({ kind: 'binary', bytes: toBytes(data) });
          } else {
            handlers.onFrame({ kind: 'text', text: Buffer.from(toBytes(data)).toString('utf8') });
          }
        } catch (err) {
          logger?.error(`Unhandled error while processing client frame: ${describeError(err)}`);
        }
      });

      socket.on('close', () => {
        try {
          handlers.onClose();
        } catch (err) {
          logger?.error(`Unhandled error while closing session: ${describeError(err)}`);
        }
      });

      socket.on('error', (err) => {
        logger?.warn(`Client socket error: ${err.message}`);
      });

      if (socket.readyState === WebSocket.CLOSING || socket.readyState === WebSocket.CLOSED) {
        handlers.onClose();
      }
    },
  };
}
