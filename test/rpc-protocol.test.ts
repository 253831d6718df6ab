// This test suite verifies JSON-RPC decoding, method routing, batching, and tool result wrapping.

import { describe, expect, it, vi } from 'vitest';
import { Dispatcher } from '../src/mcp/dispatcher.js';
import { handleRpcText, isJsonRpcRequest, wrapToolResult, type RpcHandlerDeps } from '../src/mcp/protocol.js';
import { CapabilityRegistry } from '../src/mcp/registry.js';
import { registerBuiltinTools } from '../src/mcp/tools.js';
import type { ToolCallResult } from '../src/types/mcp.js';
import { silentLogger } from './support/logger.js';

const HELLO_HASH = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';

function makeDeps(onToolResult?: (toolName: string, result: ToolCallResult) => void): RpcHandlerDeps {
  const logger = silentLogger();
  const registry = registerBuiltinTools(new CapabilityRegistry()).freeze();
  return {
    dispatcher: new Dispatcher(registry, logger),
    logger,
    onToolResult
  };
}

function callText(id: number | null | undefined, name: unknown, args?: unknown): string {
  return JSON.stringify({ jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: args } });
}

describe('rpc request validation', () => {
  it('accepts well-formed requests and rejects malformed ones', () => {
    expect(isJsonRpcRequest({ jsonrpc: '2.0', id: 1, method: 'ping' })).toBe(true);
    expect(isJsonRpcRequest({ jsonrpc: '2.0', method: 'notifications/initialized' })).toBe(true);
    expect(isJsonRpcRequest({ jsonrpc: '1.0', id: 1, method: 'ping' })).toBe(false);
    expect(isJsonRpcRequest({ jsonrpc: '2.0', id: {}, method: 'ping' })).toBe(false);
    expect(isJsonRpcRequest({ jsonrpc: '2.0', id: 1, method: 'ping', params: [] })).toBe(false);
    expect(isJsonRpcRequest([])).toBe(false);
  });
});

describe('rpc method routing', () => {
  it('answers initialize with server identity and tool capability', async () => {
    const reply = await handleRpcText('{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}', makeDeps());

    expect(reply).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2025-03-26',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'toolbox-mcp', version: '0.3.0' }
      }
    });
  });

  it('echoes a supported protocol revision and falls back to the newest otherwise', async () => {
    const older = await handleRpcText(
      '{"jsonrpc":"2.0","id":1,"method":"initialize","params":{"protocolVersion":"2024-11-05"}}',
      makeDeps()
    );
    const unknown = await handleRpcText(
      '{"jsonrpc":"2.0","id":2,"method":"initialize","params":{"protocolVersion":"1999-01-01"}}',
      makeDeps()
    );

    expect(older).toMatchObject({ result: { protocolVersion: '2024-11-05' } });
    expect(unknown).toMatchObject({ result: { protocolVersion: '2025-03-26' } });
  });

  it('answers ping with an empty result', async () => {
    await expect(handleRpcText('{"jsonrpc":"2.0","id":"p-1","method":"ping"}', makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: 'p-1',
      result: {}
    });
  });

  it('lists tool descriptors', async () => {
    const reply = await handleRpcText('{"jsonrpc":"2.0","id":2,"method":"tools/list"}', makeDeps());

    expect(reply).toMatchObject({ jsonrpc: '2.0', id: 2 });
    expect(reply !== null && !Array.isArray(reply) ? reply.result : null).toMatchObject({
      tools: [
        { name: 'yaml_to_json' },
        { name: 'json_to_yaml' },
        { name: 'base64_encode' },
        { name: 'sha256_hash' },
        { name: 'is_port_open' },
        { name: 'validate_url' }
      ]
    });
  });

  it('reports unknown methods', async () => {
    await expect(handleRpcText('{"jsonrpc":"2.0","id":3,"method":"resources/list"}', makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32601, message: 'Method not found: resources/list' }
    });
  });

  it('wraps tool results as text content plus structured content and reports them to the hook', async () => {
    const onToolResult = vi.fn();
    const reply = await handleRpcText(callText(4, 'sha256_hash', { text: 'hello world' }), makeDeps(onToolResult));

    const expectedResult = {
      content: [{ type: 'text', text: JSON.stringify({ hash: HELLO_HASH }, null, 2) }],
      structuredContent: { hash: HELLO_HASH }
    };
    expect(reply).toEqual({ jsonrpc: '2.0', id: 4, result: expectedResult });
    expect(onToolResult).toHaveBeenCalledTimes(1);
    expect(onToolResult).toHaveBeenCalledWith('sha256_hash', expectedResult);
  });

  it('reports a missing tool by name with method-not-found', async () => {
    const onToolResult = vi.fn();
    const reply = await handleRpcText(callText(7, 'missing_tool', {}), makeDeps(onToolResult));

    expect(reply).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: -32601, message: "Tool 'missing_tool' not found" }
    });
    expect(onToolResult).not.toHaveBeenCalled();
  });

  it('requires a string tool name and object arguments', async () => {
    await expect(handleRpcText(callText(5, 42, {}), makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: 5,
      error: { code: -32602, message: 'tools/call requires params.name as string.' }
    });
    await expect(handleRpcText(callText(6, 'sha256_hash', ['hello']), makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: 6,
      error: { code: -32602, message: 'tools/call requires params.arguments as object.' }
    });
  });

  it('keeps the response when the result hook throws', async () => {
    const reply = await handleRpcText(
      callText(8, 'base64_encode', { text: 'hi' }),
      makeDeps(() => {
        throw new Error('observer failure');
      })
    );

    expect(reply).toMatchObject({ id: 8, result: { structuredContent: { encoded: 'aGk=' } } });
  });
});

describe('rpc framing', () => {
  it('returns a parse error with a null id for malformed text', async () => {
    const reply = await handleRpcText('{"jsonrpc":"2.0",', makeDeps());

    expect(reply).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
  });

  it('returns invalid request for decoded values that are not requests', async () => {
    await expect(handleRpcText('{"jsonrpc":"2.0","id":1}', makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Invalid JSON-RPC request object.' }
    });
  });

  it('dispatches notifications without producing a response', async () => {
    const onToolResult = vi.fn();
    const deps = makeDeps(onToolResult);

    await expect(handleRpcText('{"jsonrpc":"2.0","method":"notifications/initialized"}', deps)).resolves.toBeNull();
    await expect(handleRpcText(callText(null, 'base64_encode', { text: 'hi' }), deps)).resolves.toBeNull();
    expect(onToolResult).toHaveBeenCalledTimes(1);
  });

  it('rejects an empty batch', async () => {
    await expect(handleRpcText('[]', makeDeps())).resolves.toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Invalid Request: empty batch.' }
    });
  });

  it('answers batch members in order and skips notifications', async () => {
    const batch = JSON.stringify([
      { jsonrpc: '2.0', id: 1, method: 'ping' },
      { jsonrpc: '2.0', method: 'notifications/initialized' },
      5,
      { jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'base64_encode', arguments: { text: 'hi' } } }
    ]);

    const reply = await handleRpcText(batch, makeDeps());

    expect(reply).toEqual([
      { jsonrpc: '2.0', id: 1, result: {} },
      { jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid JSON-RPC request object.' } },
      {
        jsonrpc: '2.0',
        id: 2,
        result: {
          content: [{ type: 'text', text: '{\n  "encoded": "aGk="\n}' }],
          structuredContent: { encoded: 'aGk=' }
        }
      }
    ]);
  });

  it('returns null for a batch made only of notifications', async () => {
    await expect(handleRpcText('[{"jsonrpc":"2.0","method":"notifications/initialized"}]', makeDeps())).resolves.toBeNull();
  });
});

describe('wrapToolResult', () => {
  it('keeps structured content for objects only', () => {
    expect(wrapToolResult('plain')).toEqual({ content: [{ type: 'text', text: '"plain"' }] });
    expect(wrapToolResult(undefined)).toEqual({ content: [{ type: 'text', text: 'null' }] });
    expect(wrapToolResult([1, 2])).toEqual({ content: [{ type: 'text', text: '[\n  1,\n  2\n]' }] });
  });
});
