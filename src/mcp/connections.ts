// This module tracks open observer streams and fans tool results out to them without blocking callers.

import { randomUUID } from 'node:crypto';
import type { Writable } from 'node:stream';
import type { FastifyBaseLogger } from 'fastify';
import type { ObserverEvent } from '../types/mcp.js';
import { errorForLog } from '../utils/logger.js';

export const DEFAULT_KEEPALIVE_MS = 30_000;
export const DEFAULT_MAX_QUEUED_EVENTS = 1000;

export const KEEPALIVE = Symbol('keepalive');
export const CLOSED = Symbol('closed');

export type ObserverSignal = ObserverEvent | typeof KEEPALIVE | typeof CLOSED;

export interface ObserverConnectionOptions {
  id?: string;
  maxQueuedEvents?: number;
}

type CloseListener = (reason: string) => void;

// This class is one observer's FIFO; producers never wait on it and a single reader drains it.
export class ObserverConnection {
  public readonly id: string;
  private readonly maxQueuedEvents: number;
  private readonly queue: ObserverEvent[] = [];
  private waiter: ((signal: ObserverSignal) => void) | null = null;
  private open = true;
  private reason: string | null = null;
  private readonly closeListeners: CloseListener[] = [];

  public constructor(options: ObserverConnectionOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.maxQueuedEvents = options.maxQueuedEvents ?? DEFAULT_MAX_QUEUED_EVENTS;
  }

  public get isOpen(): boolean {
    return this.open;
  }

  public get queued(): number {
    return this.queue.length;
  }

  public get closeReason(): string | null {
    return this.reason;
  }

  // Returns false when the event was not accepted; an overflowing queue closes the connection.
  public push(event: ObserverEvent): boolean {
    if (!this.open) {
      return false;
    }

    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(event);
      return true;
    }

    if (this.queue.length >= this.maxQueuedEvents) {
      this.close('queue_overflow');
      return false;
    }

    this.queue.push(event);
    return true;
  }

  // Resolves with the next event, KEEPALIVE after an idle timeout, or CLOSED once drained and shut.
  public next(timeoutMs: number): Promise<ObserverSignal> {
    const queuedEvent = this.queue.shift();
    if (queuedEvent) {
      return Promise.resolve(queuedEvent);
    }

    if (!this.open) {
      return Promise.resolve(CLOSED);
    }

    return new Promise((resolve) => {
      const deliver = (signal: ObserverSignal): void => {
        clearTimeout(timer);
        resolve(signal);
      };

      const timer = setTimeout(() => {
        if (this.waiter === deliver) {
          this.waiter = null;
          resolve(KEEPALIVE);
        }
      }, timeoutMs);

      this.waiter = deliver;
    });
  }

  // Returns an unsubscribe function; a listener added after close runs immediately.
  public onClose(listener: CloseListener): () => void {
    if (!this.open) {
      listener(this.reason ?? 'closed');
      return () => undefined;
    }

    this.closeListeners.push(listener);
    return () => {
      const index = this.closeListeners.indexOf(listener);
      if (index >= 0) {
        this.closeListeners.splice(index, 1);
      }
    };
  }

  // Disconnect: pending events are dropped.
  public close(reason: string): void {
    this.queue.length = 0;
    this.finish(reason);
  }

  // Shutdown signal placed behind pending events: the reader drains them, then sees CLOSED.
  public shutdown(reason: string): void {
    this.finish(reason);
  }

  private finish(reason: string): void {
    if (!this.open) {
      return;
    }

    this.open = false;
    this.reason = reason;

    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(CLOSED);
    }

    for (const listener of this.closeListeners.splice(0)) {
      listener(reason);
    }
  }
}

// This class is the only state shared between the request surface and the observer streams.
export class ConnectionRegistry {
  private readonly connections = new Set<ObserverConnection>();

  public constructor(private readonly logger: FastifyBaseLogger) {}

  public get size(): number {
    return this.connections.size;
  }

  // The entry is released in the same tick the connection closes.
  public add(connection: ObserverConnection): void {
    if (!connection.isOpen) {
      return;
    }

    this.connections.add(connection);
    connection.onClose((reason) => {
      this.remove(connection);
      this.logger.info(
        { event: 'observer_connection_removed', connectionId: connection.id, reason, activeConnections: this.size },
        'observer_connection_removed'
      );
    });

    this.logger.info(
      { event: 'observer_connection_added', connectionId: connection.id, activeConnections: this.size },
      'observer_connection_added'
    );
  }

  public remove(connection: ObserverConnection): boolean {
    return this.connections.delete(connection);
  }

  public snapshot(): ObserverConnection[] {
    return [...this.connections];
  }

  // Enqueues into a snapshot of open connections and returns how many accepted the event.
  public broadcast(event: ObserverEvent): number {
    let delivered = 0;
    for (const connection of this.snapshot()) {
      if (connection.push(event)) {
        delivered += 1;
      }
    }

    this.logger.debug(
      { event: 'observer_broadcast', type: event.type, delivered, activeConnections: this.size },
      'observer_broadcast'
    );
    return delivered;
  }

  public closeAll(reason: string): void {
    for (const connection of this.snapshot()) {
      connection.shutdown(reason);
    }
  }
}

// This helper frames one event for the SSE wire: a data line terminated by a blank line.
export function formatSseEvent(event: ObserverEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export const SSE_KEEPALIVE_FRAME = ': keepalive\n\n';

// Resolves once the sink can take more data, or once either side is gone.
function waitForDrain(connection: ObserverConnection, sink: Writable): Promise<void> {
  return new Promise((resolve) => {
    let settled = false;
    let unsubscribe: () => void = () => undefined;

    const finish = (): void => {
      if (settled) {
        return;
      }
      settled = true;
      sink.off('drain', finish);
      sink.off('close', finish);
      sink.off('error', finish);
      unsubscribe();
      resolve();
    };

    sink.on('drain', finish);
    sink.on('close', finish);
    sink.on('error', finish);
    unsubscribe = connection.onClose(finish);
  });
}

/**
 * Drains one connection into a writable sink until the connection closes. A write that reports
 * backpressure pauses the drain until the sink empties, so events of a stalled client stay in the
 * capped queue and an overflow closes the connection.
 */
export async function pumpObserverConnection(
  connection: ObserverConnection,
  sink: Writable,
  keepaliveMs: number,
  logger?: FastifyBaseLogger
): Promise<void> {
  sink.on('close', () => connection.close('sink_closed'));
  sink.on('error', (error) => {
    logger?.warn(
      { event: 'observer_sink_error', connectionId: connection.id, error: errorForLog(error) },
      'observer_sink_error'
    );
    connection.close('sink_error');
  });

  for (;;) {
    const signal = await connection.next(keepaliveMs);
    if (signal === CLOSED) {
      return;
    }

    if (sink.destroyed || sink.writableEnded) {
      connection.close('sink_closed');
      return;
    }

    const accepted = sink.write(signal === KEEPALIVE ? SSE_KEEPALIVE_FRAME : formatSseEvent(signal));
    if (!accepted && connection.isOpen) {
      logger?.debug(
        { event: 'observer_sink_backpressure', connectionId: connection.id, queued: connection.queued },
        'observer_sink_backpressure'
      );
      await waitForDrain(connection, sink);
    }
  }
}
