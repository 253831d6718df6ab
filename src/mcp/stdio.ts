// This module drives one newline-delimited JSON-RPC session over a single input/output stream pair.

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { errorForLog } from '../utils/logger.js';
import { Dispatcher } from './dispatcher.js';
import { handleRpcText, type RpcHandlerDeps, type RpcReply } from './protocol.js';
import { CapabilityRegistry } from './registry.js';
import { registerBuiltinTools } from './tools.js';

export type PipeState = 'idle' | 'reading' | 'dispatching' | 'writing' | 'closed';

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
  deps: RpcHandlerDeps;
}

/**
 * One peer, one output stream. Lines are dispatched as soon as they are read and each
 * response is written whole when it becomes ready, so replies may interleave out of
 * request order; every reply carries its request id.
 *
 * Nothing but JSON-RPC frames is ever written to `output`; diagnostics go through the
 * injected logger, which must point somewhere else.
 */
export class StdioTransport {
  private currentState: PipeState = 'idle';
  private readonly pending = new Set<Promise<void>>();
  private reader: Interface | null = null;
  private inputEnded = false;
  private readonly finished: Promise<void>;
  private resolveFinished: () => void = () => undefined;

  public constructor(private readonly options: StdioTransportOptions) {
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  public get state(): PipeState {
    return this.currentState;
  }

  public get inFlight(): number {
    return this.pending.size;
  }

  // Resolves once the session is closed, either by EOF after draining or by close().
  public start(): Promise<void> {
    if (this.reader || this.currentState === 'closed') {
      return this.finished;
    }

    const { input, output } = this.options;
    this.reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.reader.on('line', (line) => this.acceptLine(line));
    this.reader.on('close', () => this.handleInputEnd());

    input.on('error', (error) => {
      this.options.deps.logger.error({ event: 'stdio_input_error', error: errorForLog(error) }, 'stdio_input_error');
      this.close('input_error');
    });

    output.on('error', (error) => {
      this.options.deps.logger.error({ event: 'stdio_output_error', error: errorForLog(error) }, 'stdio_output_error');
      this.close('output_error');
    });

    this.options.deps.logger.info({ event: 'stdio_session_started' }, 'stdio_session_started');
    return this.finished;
  }

  // Termination: later outcomes are dropped, never written.
  public close(reason = 'terminated'): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.setState('closed');
    this.reader?.close();
    this.options.deps.logger.info(
      { event: 'stdio_session_closed', reason, abandonedInFlight: this.pending.size },
      'stdio_session_closed'
    );
    this.resolveFinished();
  }

  private setState(next: PipeState): void {
    if (this.currentState === next) {
      return;
    }

    this.options.deps.logger.debug(
      { event: 'stdio_state_changed', from: this.currentState, to: next },
      'stdio_state_changed'
    );
    this.currentState = next;
  }

  private acceptLine(line: string): void {
    if (this.currentState === 'closed') {
      return;
    }

    const text = line.trim();
    if (text.length === 0) {
      return;
    }

    this.setState('reading');
    const task: Promise<void> = this.processLine(text).then(() => {
      this.pending.delete(task);
      this.settle();
    });
    this.pending.add(task);
  }

  private async processLine(text: string): Promise<void> {
    try {
      this.setState('dispatching');
      const reply = await handleRpcText(text, this.options.deps);
      this.writeReply(reply);
    } catch (error) {
      this.options.deps.logger.error({ event: 'stdio_line_failed', error: errorForLog(error) }, 'stdio_line_failed');
    }
  }

  private writeReply(reply: RpcReply): void {
    if (reply === null) {
      return;
    }

    if (this.currentState === 'closed') {
      this.options.deps.logger.debug({ event: 'stdio_reply_discarded' }, 'stdio_reply_discarded');
      return;
    }

    this.setState('writing');
    this.options.output.write(`${JSON.stringify(reply)}\n`);
  }

  private settle(): void {
    if (this.currentState === 'closed') {
      return;
    }

    if (this.pending.size > 0) {
      this.setState('dispatching');
      return;
    }

    if (this.inputEnded) {
      this.close('input_closed');
      return;
    }

    this.setState('idle');
  }

  private handleInputEnd(): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.inputEnded = true;
    if (this.pending.size === 0) {
      this.close('input_closed');
    }
  }
}

export interface StdioSessionOptions {
  input: Readable;
  output: Writable;
  logger: RpcHandlerDeps['logger'];
  portProbeTimeoutMs?: number;
  registry?: CapabilityRegistry;
}

// This factory wires a frozen registry and dispatcher behind one stdio transport.
export function createStdioSession(options: StdioSessionOptions): StdioTransport {
  const registry =
    options.registry ?? registerBuiltinTools(new CapabilityRegistry(), { portProbeTimeoutMs: options.portProbeTimeoutMs });
  registry.freeze();

  return new StdioTransport({
    input: options.input,
    output: options.output,
    deps: {
      dispatcher: new Dispatcher(registry, options.logger.child({ component: 'dispatcher' })),
      logger: options.logger
    }
  });
}
