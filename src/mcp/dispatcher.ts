// This module resolves tool calls against the capability registry and normalizes every outcome.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { DispatchOutcome, JsonRpcError, McpTool } from '../types/mcp.js';
import { RPC_INTERNAL_ERROR, RPC_INVALID_PARAMS, RPC_METHOD_NOT_FOUND } from '../types/mcp.js';
import { hasErrorCode, normalizeError } from '../utils/errors.js';
import { errorForLog, summarizeToolArguments } from '../utils/logger.js';
import type { Capability, CapabilityRegistry } from './registry.js';

// This helper renders zod issues as one readable line for the JSON-RPC error message.
function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// This helper maps capability failures into the JSON-RPC error taxonomy.
export function mapToolErrorToRpc(toolName: string, error: unknown): JsonRpcError {
  if (error instanceof z.ZodError) {
    return {
      code: RPC_INVALID_PARAMS,
      message: `Invalid arguments for tool '${toolName}': ${formatZodIssues(error)}`,
      data: error.flatten()
    };
  }

  if (hasErrorCode(error, 'validation_error')) {
    return error.details === undefined
      ? { code: RPC_INVALID_PARAMS, message: error.message }
      : { code: RPC_INVALID_PARAMS, message: error.message, data: error.details };
  }

  if (hasErrorCode(error, 'tool_not_found')) {
    return { code: RPC_METHOD_NOT_FOUND, message: error.message };
  }

  const appError = normalizeError(error);
  return { code: RPC_INTERNAL_ERROR, message: `Internal error: ${appError.message}` };
}

export class Dispatcher {
  public constructor(
    private readonly registry: CapabilityRegistry,
    private readonly logger: FastifyBaseLogger
  ) {}

  // tools/list never invokes a capability.
  public listTools(): { tools: McpTool[] } {
    return { tools: this.registry.listAll() };
  }

  // Resolves with an outcome for every input; capability failures never reject this promise.
  public async dispatch(toolName: string, args: Record<string, unknown> = {}): Promise<DispatchOutcome> {
    const startedAt = Date.now();

    let capability: Capability;
    try {
      capability = this.registry.lookup(toolName);
    } catch (error) {
      this.logger.warn({ event: 'mcp_tool_not_found', toolName }, 'mcp_tool_not_found');
      return { ok: false, error: mapToolErrorToRpc(toolName, error) };
    }

    this.logger.info(
      {
        event: 'mcp_tool_execution_started',
        toolName,
        args: summarizeToolArguments(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const result: unknown = await capability.invoke(args);

      this.logger.info(
        {
          event: 'mcp_tool_execution_completed',
          toolName,
          durationMs: Date.now() - startedAt
        },
        'mcp_tool_execution_completed'
      );

      return { ok: true, result };
    } catch (error) {
      const mapped = mapToolErrorToRpc(toolName, error);
      const logPayload = {
        event: 'mcp_tool_execution_failed',
        toolName,
        code: mapped.code,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      };

      if (mapped.code === RPC_INTERNAL_ERROR) {
        this.logger.error(logPayload, 'mcp_tool_execution_failed');
      } else {
        this.logger.warn(logPayload, 'mcp_tool_execution_failed');
      }

      return { ok: false, error: mapped };
    }
  }
}
