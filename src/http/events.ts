// This module registers the push transport: one SSE stream per observer plus the JSON-RPC POST channel.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ToolCallResult } from '../types/mcp.js';
import { errorForLog } from '../utils/logger.js';
import { ConnectionRegistry, ObserverConnection, pumpObserverConnection } from '../mcp/connections.js';
import type { Dispatcher } from '../mcp/dispatcher.js';
import { handleRpcText } from '../mcp/protocol.js';

export interface PushRouteDeps {
  dispatcher: Dispatcher;
  connections: ConnectionRegistry;
  ssePath: string;
  messagesPath: string;
  keepaliveMs: number;
  maxQueuedEvents: number;
}

// These headers mark the stream as SSE and keep proxies from buffering or caching it.
const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
  'Access-Control-Allow-Origin': '*'
};

// This function registers the observer stream and request channel routes.
export function registerPushRoutes(fastify: FastifyInstance, deps: PushRouteDeps): void {
  // The POST route decodes the body itself, whatever its declared type, so undecodable text becomes a JSON-RPC parse error.
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.get(deps.ssePath, async (request: FastifyRequest, reply: FastifyReply) => {
    const connection = new ObserverConnection({ maxQueuedEvents: deps.maxQueuedEvents });
    const streamLogger = request.log.child({ component: 'sse', connectionId: connection.id });

    reply.hijack();
    reply.raw.writeHead(200, SSE_HEADERS);

    deps.connections.add(connection);
    connection.push({
      type: 'connection',
      status: 'connected',
      connectionId: connection.id,
      activeConnections: deps.connections.size
    });

    streamLogger.info({ event: 'sse_stream_opened' }, 'sse_stream_opened');

    try {
      await pumpObserverConnection(connection, reply.raw, deps.keepaliveMs, streamLogger);
    } catch (error) {
      streamLogger.error({ event: 'sse_stream_failed', error: errorForLog(error) }, 'sse_stream_failed');
      connection.close('pump_failed');
    }

    if (!reply.raw.writableEnded) {
      reply.raw.end();
    }

    streamLogger.info({ event: 'sse_stream_closed', reason: connection.closeReason }, 'sse_stream_closed');
  });

  fastify.post(deps.messagesPath, async (request: FastifyRequest, reply: FastifyReply) => {
    const requestLogger = request.log.child({ component: 'mcp' });
    const body = typeof request.body === 'string' ? request.body : '';

    const response = await handleRpcText(body, {
      dispatcher: deps.dispatcher,
      logger: requestLogger,
      onToolResult: (tool: string, result: ToolCallResult) => {
        deps.connections.broadcast({
          type: 'tool_result',
          tool,
          result,
          timestamp: new Date().toISOString()
        });
      }
    });

    if (response === null) {
      reply.code(202).send();
      return;
    }

    reply.send(response);
  });

  // This hook runs before the listener stops so open streams end instead of holding the close open.
  fastify.addHook('preClose', async () => {
    deps.connections.closeAll('server_shutdown');
  });
}
