// This module holds the server identity and the MCP protocol revisions it can speak.

export const MCP_SERVER_NAME = 'toolbox-mcp';
export const MCP_SERVER_VERSION = '0.3.0';

// Newest first; the first entry is offered when a client asks for a revision we do not know.
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-03-26', '2024-11-05'] as const;

export type ProtocolVersion = (typeof SUPPORTED_PROTOCOL_VERSIONS)[number];

export const MCP_PROTOCOL_VERSION: ProtocolVersion = SUPPORTED_PROTOCOL_VERSIONS[0];

function isSupportedProtocolVersion(value: unknown): value is ProtocolVersion {
  return SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === value);
}

// This helper echoes the client's requested revision when supported and otherwise answers with the newest one.
export function negotiateProtocolVersion(requested: unknown): ProtocolVersion {
  return isSupportedProtocolVersion(requested) ? requested : MCP_PROTOCOL_VERSION;
}

export function serverInfo(): { name: string; version: string } {
  return { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION };
}
