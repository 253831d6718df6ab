// This test suite verifies the newline-delimited stdio session: pipelining, notifications, EOF drain, and close.

import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { CapabilityRegistry } from '../src/mcp/registry.js';
import { createStdioSession, type StdioTransport } from '../src/mcp/stdio.js';
import { registerBuiltinTools } from '../src/mcp/tools.js';
import { silentLogger } from './support/logger.js';

interface SessionHarness {
  input: PassThrough;
  transport: StdioTransport;
  finished: Promise<void>;
  frames: () => unknown[];
  rawOutput: () => string;
  release: () => void;
}

// This helper builds a session whose "slow_tool" waits until release() is called.
function startSession(): SessionHarness {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });

  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const registry = registerBuiltinTools(new CapabilityRegistry());
  registry.register('slow_tool', 'Waits for the test to release it', { type: 'object' }, async () => {
    await gate;
    return { done: true };
  });

  const transport = createStdioSession({ input, output, logger: silentLogger(), registry });
  const finished = transport.start();

  return {
    input,
    transport,
    finished,
    frames: () =>
      written
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): unknown => JSON.parse(line)),
    rawOutput: () => written,
    release: () => release()
  };
}

function send(input: PassThrough, message: Record<string, unknown>): void {
  input.write(`${JSON.stringify(message)}\n`);
}

function toolCall(id: number, name: string, args: Record<string, unknown>): Record<string, unknown> {
  return { jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: args } };
}

describe('stdio transport', () => {
  it('writes one response line per request', async () => {
    const session = startSession();
    send(session.input, toolCall(1, 'base64_encode', { text: 'hello world' }));

    await vi.waitFor(() => expect(session.frames()).toHaveLength(1));
    expect(session.frames()[0]).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        content: [{ type: 'text', text: '{\n  "encoded": "aGVsbG8gd29ybGQ="\n}' }],
        structuredContent: { encoded: 'aGVsbG8gd29ybGQ=' }
      }
    });
    expect(session.rawOutput().endsWith('}\n')).toBe(true);

    session.input.end();
    await session.finished;
  });

  it('answers a fast request while an earlier slow one is still running', async () => {
    const session = startSession();
    send(session.input, toolCall(1, 'slow_tool', {}));
    send(session.input, toolCall(2, 'sha256_hash', { text: '' }));

    await vi.waitFor(() => expect(session.frames()).toHaveLength(1));
    expect(session.frames()[0]).toMatchObject({ id: 2 });
    expect(session.transport.inFlight).toBe(1);

    session.release();
    await vi.waitFor(() => expect(session.frames()).toHaveLength(2));
    expect(session.frames()[1]).toMatchObject({ id: 1, result: { structuredContent: { done: true } } });

    session.input.end();
    await session.finished;
    expect(session.transport.state).toBe('closed');
  });

  it('writes nothing for notifications and skips blank lines', async () => {
    const session = startSession();
    session.input.write('\n   \n');
    send(session.input, { jsonrpc: '2.0', method: 'notifications/initialized' });
    send(session.input, { jsonrpc: '2.0', id: 9, method: 'ping' });

    await vi.waitFor(() => expect(session.frames()).toHaveLength(1));
    expect(session.frames()).toEqual([{ jsonrpc: '2.0', id: 9, result: {} }]);

    session.input.end();
    await session.finished;
    expect(session.frames()).toHaveLength(1);
  });

  it('answers malformed lines with a parse error and keeps reading', async () => {
    const session = startSession();
    session.input.write('{not json\n');
    send(session.input, { jsonrpc: '2.0', id: 2, method: 'ping' });

    await vi.waitFor(() => expect(session.frames()).toHaveLength(2));
    expect(session.frames()[0]).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
    expect(session.frames()[1]).toEqual({ jsonrpc: '2.0', id: 2, result: {} });

    session.input.end();
    await session.finished;
  });

  it('drains in-flight requests after end of input before closing', async () => {
    const session = startSession();
    send(session.input, toolCall(4, 'slow_tool', {}));
    session.input.end();

    await vi.waitFor(() => expect(session.transport.inFlight).toBe(1));
    expect(session.transport.state).not.toBe('closed');

    session.release();
    await session.finished;

    expect(session.frames()).toEqual([
      {
        jsonrpc: '2.0',
        id: 4,
        result: {
          content: [{ type: 'text', text: '{\n  "done": true\n}' }],
          structuredContent: { done: true }
        }
      }
    ]);
    expect(session.transport.state).toBe('closed');
  });

  it('drops outcomes that finish after close', async () => {
    const session = startSession();
    send(session.input, toolCall(5, 'slow_tool', {}));
    await vi.waitFor(() => expect(session.transport.inFlight).toBe(1));

    session.transport.close('test_shutdown');
    await session.finished;

    session.release();
    await vi.waitFor(() => expect(session.transport.inFlight).toBe(0));
    expect(session.rawOutput()).toBe('');
  });

  it('closes immediately on end of input when idle', async () => {
    const session = startSession();
    session.input.end();

    await session.finished;
    expect(session.transport.state).toBe('closed');
    expect(session.rawOutput()).toBe('');
  });
});
