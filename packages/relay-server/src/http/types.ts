import type http from 'node:http';

import type { SessionMetrics } from '@live-relay/shared';

import type { EnvConfig } from '../envConfig';

/**
 * Read-only view of the proxy that the HTTP routes report on.
 */
export interface SessionMetricsSource {
  readonly sessionCount: number;
  getAllMetrics(): SessionMetrics[];
}

export interface HttpContext {
  config: Pick<EnvConfig, 'debugHttpRequests'>;
  sessions: SessionMetricsSource;
}

export interface HttpHelpers {
  sendJson: (statusCode: number, body: unknown) => void;
}

export type HttpRouteHandler = (
  context: HttpContext,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  url: URL,
  helpers: HttpHelpers,
) => Promise<boolean> | boolean;
