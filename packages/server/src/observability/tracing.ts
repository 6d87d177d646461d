/**
 * Request tracing with correlation IDs
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';
import type { RequestContext } from './types.js';

const CORRELATION_ID_HEADER = 'x-correlation-id';

const REQUEST_ID_HEADER = 'x-request-id';

declare module 'fastify' {
  interface FastifyRequest {
    traceContext?: RequestContext;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Register request tracing hooks.
 * Adds correlation and request IDs to every response and logs completion.
 */
export function registerTracing(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    // Reuse the caller's correlation ID so traces join up across services
    const correlationId = headerValue(request.headers[CORRELATION_ID_HEADER]) || randomUUID();
    const requestId = randomUUID();

    request.traceContext = {
      correlationId,
      requestId,
      startTime: Date.now(),
      method: request.method,
      path: request.url.split('?')[0] ?? request.url,
      userAgent: request.headers['user-agent'],
      clientIp: request.ip,
    };

    void reply.header(CORRELATION_ID_HEADER, correlationId);
    void reply.header(REQUEST_ID_HEADER, requestId);
  });

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.traceContext) {
      return;
    }

    const duration = Date.now() - request.traceContext.startTime;

    request.log.info(
      {
        correlationId: request.traceContext.correlationId,
        requestId: request.traceContext.requestId,
        method: request.traceContext.method,
        path: request.traceContext.path,
        statusCode: reply.statusCode,
        duration,
      },
      'request completed'
    );
  });
}
