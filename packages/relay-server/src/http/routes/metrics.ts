import type { HttpRouteHandler } from '../types';

export const handleMetricsRoutes: HttpRouteHandler = (context, req, _res, url, helpers) => {
  if (url.pathname !== '/api/metrics' || req.method !== 'GET') {
    return false;
  }
  const sessions = context.sessions.getAllMetrics();
  helpers.sendJson(200, { activeSessions: sessions.length, sessions });
  return true;
};
