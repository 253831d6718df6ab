// This module loads runtime configuration from environment variables and validates it at startup.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

// This helper reads optional integer env values so empty strings fall back to defaults.
const intFromEnv = (fallback: number, min: number, max: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim().length > 0 ? Number(value) : undefined),
    z.number().int().min(min).max(max).default(fallback)
  );

// This helper normalizes route paths so "/sse" and "sse" configure the same endpoint.
const routePathFromEnv = (fallback: string) =>
  z
    .string()
    .trim()
    .min(1)
    .regex(/^\/?[A-Za-z0-9._~\-/]+$/, 'must be a plain URL path')
    .transform((value) => (value.startsWith('/') ? value : `/${value}`))
    .default(fallback);

export const runtimeConfigSchema = z.object({
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('http'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: intFromEnv(8000, 1, 65535),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MCP_SSE_PATH: routePathFromEnv('/sse'),
  MCP_MESSAGES_PATH: routePathFromEnv('/messages'),
  MCP_KEEPALIVE_MS: intFromEnv(30_000, 10, 3_600_000),
  MCP_MAX_QUEUED_EVENTS: intFromEnv(1000, 1, 1_000_000),
  MCP_PORT_PROBE_TIMEOUT_MS: intFromEnv(3000, 1, 60_000)
});

export interface RuntimeConfig {
  transport: 'stdio' | 'http';
  host: string;
  port: number;
  logLevel: string;
  ssePath: string;
  messagesPath: string;
  keepaliveMs: number;
  maxQueuedEvents: number;
  portProbeTimeoutMs: number;
}

// This function validates the environment once and returns the normalized runtime config.
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid runtime configuration.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  if (values.MCP_SSE_PATH === values.MCP_MESSAGES_PATH) {
    throw new AppError(500, 'invalid_config', 'MCP_SSE_PATH and MCP_MESSAGES_PATH must differ.');
  }

  return {
    transport: values.MCP_TRANSPORT,
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    ssePath: values.MCP_SSE_PATH,
    messagesPath: values.MCP_MESSAGES_PATH,
    keepaliveMs: values.MCP_KEEPALIVE_MS,
    maxQueuedEvents: values.MCP_MAX_QUEUED_EVENTS,
    portProbeTimeoutMs: values.MCP_PORT_PROBE_TIMEOUT_MS
  };
}
