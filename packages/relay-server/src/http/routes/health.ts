import type { HttpRouteHandler } from '../types';

export const handleHealthRoutes: HttpRouteHandler = (_context, req, _res, url, helpers) => {
  if (url.pathname !== '/health' || req.method !== 'GET') {
    return false;
  }
  helpers.sendJson(200, { status: 'healthy', message: 'Live relay server is running' });
  return true;
};
