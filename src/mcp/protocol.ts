// This module implements transport-independent JSON-RPC handling for MCP tool discovery and execution.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse, ToolCallResult } from '../types/mcp.js';
import {
  RPC_INTERNAL_ERROR,
  RPC_INVALID_PARAMS,
  RPC_INVALID_REQUEST,
  RPC_METHOD_NOT_FOUND,
  RPC_PARSE_ERROR
} from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { isPlainObject, parseJson } from '../utils/json.js';
import { errorForLog, sanitizeForLog, summarizeToolArguments } from '../utils/logger.js';
import { negotiateProtocolVersion, serverInfo } from '../version.js';
import type { Dispatcher } from './dispatcher.js';

export type RpcReply = JsonRpcResponse | JsonRpcResponse[] | null;

export interface RpcHandlerDeps {
  dispatcher: Dispatcher;
  logger: FastifyBaseLogger;
  // Called after each successful tools/call, including calls sent as notifications.
  onToolResult?: (toolName: string, result: ToolCallResult) => void;
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

function isRpcId(value: unknown): value is JsonRpcId | undefined {
  return value === undefined || value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper validates that a payload is structurally a JSON-RPC request.
export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isPlainObject(value)) {
    return false;
  }

  return (
    value.jsonrpc === '2.0' &&
    typeof value.method === 'string' &&
    isRpcId(value.id) &&
    (value.params === undefined || isPlainObject(value.params))
  );
}

// A request without a usable id expects no correlated response.
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined || request.id === null;
}

// This helper decodes one framed document; malformed text raises an AppError with code parse_error.
export function parseRpcDocument(text: string): unknown {
  return parseJson(text, 'JSON-RPC document');
}

// This helper wraps structured results in both text and structured fields for client compatibility.
export function wrapToolResult(result: unknown): ToolCallResult {
  const wrapped: ToolCallResult = {
    content: [{ type: 'text', text: JSON.stringify(result ?? null, null, 2) }]
  };

  if (isPlainObject(result)) {
    wrapped.structuredContent = result;
  }

  return wrapped;
}

// This helper routes one decoded method to its result, or returns a ready error response.
async function routeRequest(
  request: JsonRpcRequest,
  requestId: JsonRpcId,
  deps: RpcHandlerDeps,
  rpcTraceId: string
): Promise<JsonRpcResponse> {
  switch (request.method) {
    case 'initialize': {
      const protocolVersion = negotiateProtocolVersion(request.params?.protocolVersion);
      deps.logger.info(
        {
          event: 'mcp_session_initialized',
          rpcTraceId,
          requestedProtocolVersion: sanitizeForLog(request.params?.protocolVersion),
          protocolVersion
        },
        'mcp_session_initialized'
      );

      return {
        jsonrpc: '2.0',
        id: requestId,
        result: {
          protocolVersion,
          capabilities: {
            tools: {
              listChanged: false
            }
          },
          serverInfo: serverInfo()
        }
      };
    }

    case 'ping': {
      return { jsonrpc: '2.0', id: requestId, result: {} };
    }

    case 'tools/list': {
      return { jsonrpc: '2.0', id: requestId, result: deps.dispatcher.listTools() };
    }

    case 'tools/call': {
      const name = request.params?.name;
      const rawArgs = request.params?.arguments;

      if (typeof name !== 'string') {
        deps.logger.warn(
          {
            event: 'mcp_tool_call_invalid_name',
            rpcTraceId,
            rpcRequestId: requestId,
            providedNameType: typeof name
          },
          'mcp_tool_call_invalid_name'
        );
        return rpcError(requestId, RPC_INVALID_PARAMS, 'tools/call requires params.name as string.');
      }

      if (rawArgs !== undefined && !isPlainObject(rawArgs)) {
        return rpcError(requestId, RPC_INVALID_PARAMS, 'tools/call requires params.arguments as object.');
      }

      const args: Record<string, unknown> = isPlainObject(rawArgs) ? rawArgs : {};

      deps.logger.info(
        {
          event: 'mcp_tool_call_requested',
          rpcTraceId,
          rpcRequestId: requestId,
          toolName: name,
          arguments: summarizeToolArguments(args)
        },
        'mcp_tool_call_requested'
      );

      const outcome = await deps.dispatcher.dispatch(name, args);
      if (!outcome.ok) {
        return { jsonrpc: '2.0', id: requestId, error: outcome.error };
      }

      const result = wrapToolResult(outcome.result);
      try {
        deps.onToolResult?.(name, result);
      } catch (error) {
        deps.logger.error(
          { event: 'mcp_tool_result_hook_failed', rpcTraceId, toolName: name, error: errorForLog(error) },
          'mcp_tool_result_hook_failed'
        );
      }

      return { jsonrpc: '2.0', id: requestId, result };
    }

    default: {
      if (request.method.startsWith('notifications/')) {
        return { jsonrpc: '2.0', id: requestId, result: {} };
      }

      return rpcError(requestId, RPC_METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }
}

// This function handles one JSON-RPC request and returns either a response object or null for notifications.
export async function handleRpcRequest(request: JsonRpcRequest, deps: RpcHandlerDeps): Promise<JsonRpcResponse | null> {
  const requestId = request.id ?? null;
  const notification = isNotification(request);
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  deps.logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method,
      notification
    },
    'mcp_rpc_request_received'
  );

  let response: JsonRpcResponse;
  try {
    response = await routeRequest(request, requestId, deps, rpcTraceId);
  } catch (error) {
    const appError = normalizeError(error);

    deps.logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        code: appError.code,
        details: sanitizeForLog(appError.details),
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    response = rpcError(requestId, RPC_INTERNAL_ERROR, `Internal error: ${appError.message}`);
  }

  deps.logger.info(
    {
      event: 'mcp_rpc_request_completed',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method,
      failed: response.error !== undefined,
      durationMs: Date.now() - startedAt
    },
    'mcp_rpc_request_completed'
  );

  return notification ? null : response;
}

// This function handles a decoded single request or batch and returns what the transport must write back.
export async function handleRpcPayload(payload: unknown, deps: RpcHandlerDeps): Promise<RpcReply> {
  if (Array.isArray(payload)) {
    if (payload.length === 0) {
      return rpcError(null, RPC_INVALID_REQUEST, 'Invalid Request: empty batch.');
    }

    deps.logger.info({ event: 'mcp_batch_received', batchSize: payload.length }, 'mcp_batch_received');

    const responses: JsonRpcResponse[] = [];
    for (const item of payload) {
      if (!isJsonRpcRequest(item)) {
        deps.logger.warn({ event: 'mcp_batch_invalid_item' }, 'mcp_batch_invalid_item');
        responses.push(rpcError(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.'));
        continue;
      }

      const response = await handleRpcRequest(item, deps);
      if (response) {
        responses.push(response);
      }
    }

    return responses.length > 0 ? responses : null;
  }

  if (!isJsonRpcRequest(payload)) {
    deps.logger.warn({ event: 'mcp_invalid_request_object' }, 'mcp_invalid_request_object');
    return rpcError(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
  }

  return handleRpcRequest(payload, deps);
}

// This function decodes raw framed text and handles it; malformed text yields a parse error with a null id.
export async function handleRpcText(text: string, deps: RpcHandlerDeps): Promise<RpcReply> {
  let payload: unknown;
  try {
    payload = parseRpcDocument(text);
  } catch (error) {
    const appError = normalizeError(error);
    deps.logger.warn(
      {
        event: 'mcp_parse_error',
        details: sanitizeForLog(appError.details)
      },
      'mcp_parse_error'
    );
    return rpcError(null, RPC_PARSE_ERROR, 'Parse error', appError.details);
  }

  return handleRpcPayload(payload, deps);
}
