// This utility module keeps JSON parse/stringify operations safe and explicit.

import { AppError } from './errors.js';

// This helper parses one inbound JSON document and emits a controlled error on malformed content.
export function parseJson(value: string, label: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new AppError(400, 'parse_error', `Failed to parse JSON for ${label}.`, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This helper narrows decoded JSON to a plain object record.
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
