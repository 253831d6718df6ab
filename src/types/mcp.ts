// This file defines minimal JSON-RPC and MCP protocol payload types shared by the stdio and HTTP transports.

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: JsonRpcError;
}

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent?: Record<string, unknown>;
}

// Outcome of one dispatched tool call, correlated to its request by the protocol layer.
export type DispatchOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: JsonRpcError };

export type ObserverEvent =
  | {
      type: 'connection';
      status: 'connected';
      connectionId: string;
      activeConnections: number;
    }
  | {
      type: 'tool_result';
      tool: string;
      result: unknown;
      timestamp: string;
    };
