// This module assembles the HTTP application: request logging, CORS, status routes, and the push transport.

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import type { RuntimeConfig } from './config/runtime-config.js';
import { registerPushRoutes } from './http/events.js';
import { registerStatusRoutes } from './http/status.js';
import { ConnectionRegistry } from './mcp/connections.js';
import { Dispatcher } from './mcp/dispatcher.js';
import { CapabilityRegistry } from './mcp/registry.js';
import { registerBuiltinTools } from './mcp/tools.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerResources {
  app: FastifyInstance;
  registry: CapabilityRegistry;
  connections: ConnectionRegistry;
}

export type HttpServerConfig = Pick<
  RuntimeConfig,
  'logLevel' | 'ssePath' | 'messagesPath' | 'keepaliveMs' | 'maxQueuedEvents' | 'portProbeTimeoutMs'
>;

export interface CreateServerOptions {
  // Pre-populated registry; builtin tools are registered when omitted.
  registry?: CapabilityRegistry;
  logger?: boolean;
}

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Accept, Authorization, Mcp-Session-Id',
  'Access-Control-Max-Age': '600'
};

function sendErrorEnvelope(reply: FastifyReply, error: AppError, includeDetails: boolean): void {
  reply.status(error.statusCode).send({
    ok: false,
    error:
      includeDetails && error.details !== undefined
        ? { code: error.code, message: error.message, details: error.details }
        : { code: error.code, message: error.message }
  });
}

// This hook set gives every request one start line and one finish line sharing the request id.
function registerRequestLogging(app: FastifyInstance): void {
  app.addHook('onRequest', async (request) => {
    request.log.info(
      {
        event: 'http_request_received',
        requestId: request.id,
        method: request.method,
        url: request.url,
        remoteAddress: request.ip,
        userAgent: sanitizeForLog(request.headers['user-agent'] ?? null),
        contentType: request.headers['content-type'] ?? null
      },
      'http_request_received'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_finished',
        requestId: request.id,
        route: request.routeOptions.url ?? null,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime)
      },
      'http_request_finished'
    );
  });
}

// This function builds and configures the full HTTP application.
export function createServer(config: HttpServerConfig, options: CreateServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(config.logLevel, 'http'),
    bodyLimit: 1024 * 1024
  });

  const registry =
    options.registry ?? registerBuiltinTools(new CapabilityRegistry(), { portProbeTimeoutMs: config.portProbeTimeoutMs });
  registry.freeze();

  const dispatcher = new Dispatcher(registry, app.log.child({ component: 'dispatcher' }));
  const connections = new ConnectionRegistry(app.log.child({ component: 'connections' }));

  registerRequestLogging(app);

  // Browser-based inspectors call the gateway cross-origin; hijacked SSE replies set the header themselves.
  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', '*');
    return payload;
  });

  app.options('*', async (_request, reply) => {
    reply.headers(CORS_HEADERS).code(204).send();
  });

  registerStatusRoutes(app, { registry, connections });
  registerPushRoutes(app, {
    dispatcher,
    connections,
    ssePath: config.ssePath,
    messagesPath: config.messagesPath,
    keepaliveMs: config.keepaliveMs,
    maxQueuedEvents: config.maxQueuedEvents
  });

  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const logPayload = {
      event: 'http_request_failed',
      requestId: request.id,
      code: normalized.code,
      details: sanitizeForLog(normalized.details),
      error: errorForLog(error)
    };

    if (normalized.statusCode >= 500) {
      request.log.error(logPayload, 'http_request_failed');
    } else {
      request.log.warn(logPayload, 'http_request_failed');
    }

    sendErrorEnvelope(reply, normalized, normalized.statusCode < 500);
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn(
      { event: 'http_route_not_found', requestId: request.id, method: request.method, url: request.url },
      'http_route_not_found'
    );
    sendErrorEnvelope(reply, new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`), false);
  });

  return {
    app,
    registry,
    connections
  };
}
