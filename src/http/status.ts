// This module registers the unauthenticated status endpoints used by probes and inspectors.

import type { FastifyInstance } from 'fastify';
import type { ConnectionRegistry } from '../mcp/connections.js';
import type { CapabilityRegistry } from '../mcp/registry.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from '../version.js';

export interface StatusRouteDeps {
  registry: CapabilityRegistry;
  connections: ConnectionRegistry;
}

export function registerStatusRoutes(fastify: FastifyInstance, deps: StatusRouteDeps): void {
  // Liveness plus the number of open observer streams.
  fastify.get('/health', async (request) => {
    request.log.debug({ event: 'health_check', activeConnections: deps.connections.size }, 'health_check');

    return {
      status: 'healthy',
      server: MCP_SERVER_NAME,
      transport: 'sse',
      active_connections: deps.connections.size
    };
  });

  fastify.get('/version', async () => ({
    ok: true,
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    protocolVersion: SUPPORTED_PROTOCOL_VERSIONS[0],
    supportedProtocolVersions: SUPPORTED_PROTOCOL_VERSIONS,
    tools: deps.registry.size
  }));
}
