import type { FastifyRequest } from 'fastify';

import { type LogFields, logger } from '../infrastructure/logger.js';

export const resolveRoutePath = (request: FastifyRequest, fallback: string): string => {
  const url = request.routeOptions.url;
  return url ? `${request.method} ${url}` : fallback;
};

export function logRequest(
  request: FastifyRequest,
  fallbackRoute: string,
  statusCode: number,
  fields: LogFields = {},
): void {
  logger.info('HTTP request handled', {
    event: 'http_request',
    route: resolveRoutePath(request, fallbackRoute),
    statusCode,
    requestId: request.id,
    ...fields,
  });
}
