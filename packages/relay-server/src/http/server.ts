import http from 'node:http';

import { describeError, type Logger } from '../logger';
import { handleHealthRoutes } from './routes/health';
import { handleMetricsRoutes } from './routes/metrics';
import type { HttpContext, HttpHelpers, HttpRouteHandler } from './types';

const ROUTES: readonly HttpRouteHandler[] = [handleHealthRoutes, handleMetricsRoutes];

export function createHttpServer(options: HttpContext & { logger?: Logger }): http.Server {
  const { logger, ...context } = options;

  const server = http.createServer(async (req, res) => {
    if (!req.url || !req.method) {
      res.statusCode = 400;
      res.end('Bad request');
      return;
    }

    if (context.config.debugHttpRequests) {
      const startTime = Date.now();
      const requestLine = `${req.method} ${req.url}`;
      res.on('finish', () => {
        const durationMs = Date.now() - startTime;
        const size = res.getHeader('content-length');
        const sizeLabel = typeof size === 'number' || typeof size === 'string' ? `, ${size}b` : '';
        const remote = req.socket.remoteAddress ? `, ${req.socket.remoteAddress}` : '';
        logger?.info(`[http] ${res.statusCode} ${requestLine} (${durationMs}ms${sizeLabel}${remote})`);
      });
    }

    const origin = req.headers.origin;
    if (origin) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      res.setHeader('Access-Control-Allow-Credentials', 'true');
    }

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = new URL(req.url, `http://${req.headers.host ?? 'localhost'}`);

    const sendJson = (statusCode: number, body: unknown): void => {
      const payload = JSON.stringify(body);
      res.statusCode = statusCode;
      res.setHeader('Content-Type', 'application/json; charset=utf-8');
      res.setHeader('Content-Length', Buffer.byteLength(payload));
      res.end(payload);
    };
    const helpers: HttpHelpers = { sendJson };

    try {
      for (const route of ROUTES) {
        const handled = await route(context, req, res, url, helpers);
        if (handled) {
          return;
        }
      }
      sendJson(404, { error: 'Not Found' });
    } catch (err) {
      logger?.error(`[http] Error handling ${req.method} ${url.pathname}: ${describeError(err)}`);
      if (!res.headersSent) {
        sendJson(500, { error: 'Internal server error' });
      } else {
        res.end();
      }
    }
  });

  return server;
}
