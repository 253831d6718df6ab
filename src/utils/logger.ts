// This module centralizes pino configuration and the shaping of tool payloads before they reach a log line.

import { createHash } from 'node:crypto';
import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LogShapeLimits {
  maxDepth: number;
  maxStringLength: number;
  maxArrayItems: number;
  maxObjectKeys: number;
}

export const DEFAULT_LOG_LIMITS: LogShapeLimits = {
  maxDepth: 5,
  maxStringLength: 512,
  maxArrayItems: 20,
  maxObjectKeys: 30
};

// Header and field paths pino removes before serialization.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'headers.authorization',
  'headers.cookie',
  '*.password',
  '*.secret',
  '*.token'
];

const SENSITIVE_KEY_PATTERN = /token|password|passphrase|secret|authorization|cookie|api[-_]?key/i;

function fingerprint(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? null);
  return createHash('sha256').update(serialized).digest('hex').slice(0, 12);
}

function clip(value: string, limit: number): string {
  return value.length <= limit ? value : `${value.slice(0, limit)}...[+${value.length - limit} chars]`;
}

// This factory builds a recursive sanitizer bound to one set of size limits.
export function createLogSanitizer(limits: LogShapeLimits = DEFAULT_LOG_LIMITS): (value: unknown) => unknown {
  const visit = (value: unknown, depth: number): unknown => {
    if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'string') {
      return clip(value, limits.maxStringLength);
    }

    if (depth >= limits.maxDepth) {
      return '[depth-limited]';
    }

    if (Array.isArray(value)) {
      const items = value.slice(0, limits.maxArrayItems).map((item) => visit(item, depth + 1));
      return value.length > limits.maxArrayItems ? [...items, `[+${value.length - limits.maxArrayItems} items]`] : items;
    }

    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }

    if (typeof value === 'object') {
      const entries = Object.entries(value);
      const shaped: Record<string, unknown> = {};

      for (const [key, entry] of entries.slice(0, limits.maxObjectKeys)) {
        shaped[key] = SENSITIVE_KEY_PATTERN.test(key) ? `[redacted:${fingerprint(entry)}]` : visit(entry, depth + 1);
      }

      if (entries.length > limits.maxObjectKeys) {
        shaped.__omittedKeys = entries.length - limits.maxObjectKeys;
      }

      return shaped;
    }

    return String(value);
  };

  return (value) => visit(value, 0);
}

export const sanitizeForLog = createLogSanitizer();

/**
 * Tool inputs are user documents (YAML, JSON, text to hash), so call logs record their shape instead
 * of their content: strings become `{ chars, sha256 }` and scalars pass through.
 */
export function summarizeToolArguments(args: Record<string, unknown>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      summary[key] = { chars: value.length, sha256: fingerprint(value) };
    } else if (value === null || typeof value === 'number' || typeof value === 'boolean') {
      summary[key] = value;
    } else {
      summary[key] = Array.isArray(value) ? `[array:${value.length}]` : `[${typeof value}]`;
    }
  }

  return summary;
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration; `transport` tags every line with the active binding.
export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info', transport: 'http' | 'stdio' = 'http'): LoggerOptions {
  return {
    level,
    base: {
      service: 'toolbox-mcp',
      transport
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[redacted]'
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// stdout carries JSON-RPC frames in stdio mode, so this logger is bound to file descriptor 2.
export function buildStderrLogger(level?: string): Logger {
  return pino(buildLoggerOptions(level, 'stdio'), pino.destination({ dest: 2, sync: true }));
}
