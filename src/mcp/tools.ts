// This module implements the builtin toolbox capabilities and registers them with a capability registry.

import { createHash } from 'node:crypto';
import { connect } from 'node:net';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { validationError } from '../utils/errors.js';
import type { CapabilityInvoker, CapabilityRegistry } from './registry.js';
import {
  BUILTIN_TOOL_ORDER,
  base64EncodeSchema,
  isPortOpenSchema,
  jsonToYamlSchema,
  sha256HashSchema,
  toInputSchema,
  toolDefinitions,
  validateUrlSchema,
  yamlToJsonSchema,
  type BuiltinToolName
} from './tool-schemas.js';

export const DEFAULT_PORT_PROBE_TIMEOUT_MS = 3000;

export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface BuiltinToolOptions {
  portProbeTimeoutMs?: number;
  probePort?: PortProbe;
}

// This helper resolves true once a TCP handshake succeeds and false on refusal, error, or timeout.
export function probeTcpPort(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    let settled = false;
    const socket = connect({ host, port });

    const finish = (open: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(open);
    };

    const timer = setTimeout(() => finish(false), timeoutMs);
    socket.once('connect', () => finish(true));
    socket.on('error', () => finish(false));
  });
}

// This helper formats caught parser failures without assuming an Error instance.
function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function yamlToJson(args: Record<string, unknown>): { json: string } {
  const input = yamlToJsonSchema.parse(args);

  let data: unknown;
  try {
    data = parseYaml(input.yaml);
  } catch (error) {
    throw validationError(`Invalid YAML input: ${describeFailure(error)}`);
  }

  return { json: JSON.stringify(data ?? null, null, 2) };
}

export function jsonToYaml(args: Record<string, unknown>): { yaml: string } {
  const input = jsonToYamlSchema.parse(args);

  let data: unknown;
  try {
    data = JSON.parse(input.json);
  } catch (error) {
    throw validationError(`Invalid JSON input: ${describeFailure(error)}`);
  }

  return { yaml: stringifyYaml(data) };
}

export function base64Encode(args: Record<string, unknown>): { encoded: string } {
  const input = base64EncodeSchema.parse(args);
  return { encoded: Buffer.from(input.text, 'utf8').toString('base64') };
}

export function sha256Hash(args: Record<string, unknown>): { hash: string } {
  const input = sha256HashSchema.parse(args);
  return { hash: createHash('sha256').update(input.text, 'utf8').digest('hex') };
}

// Structural check only: scheme, then an authority after "//". No DNS or reachability.
export function validateUrl(args: Record<string, unknown>): { valid: boolean; reason?: string } {
  const { url } = validateUrlSchema.parse(args);

  if (/[ \t\n]/.test(url)) {
    return { valid: false, reason: 'URL contains whitespace characters' };
  }

  const schemeMatch = /^([A-Za-z][A-Za-z0-9+.-]*):(.*)$/s.exec(url);
  if (!schemeMatch) {
    return { valid: false, reason: 'Missing protocol (http:// or https://)' };
  }

  const rest = schemeMatch[2] ?? '';
  const authority = rest.startsWith('//') ? rest.slice(2).split(/[/?#]/, 1)[0] : '';
  if (!authority) {
    return { valid: false, reason: 'Missing domain name' };
  }

  try {
    new URL(url);
  } catch (error) {
    return { valid: false, reason: `URL parsing error: ${describeFailure(error)}` };
  }

  return { valid: true };
}

// This factory binds the port probe and its timeout so tests can swap the network layer.
export function createIsPortOpen(options: BuiltinToolOptions = {}): CapabilityInvoker {
  const timeoutMs = options.portProbeTimeoutMs ?? DEFAULT_PORT_PROBE_TIMEOUT_MS;
  const probe = options.probePort ?? probeTcpPort;

  return async (args) => {
    const input = isPortOpenSchema.parse(args);
    if (input.port < 1 || input.port > 65535) {
      throw validationError(`Port must be between 1 and 65535, got ${input.port}`);
    }

    return { open: await probe(input.host, input.port, timeoutMs) };
  };
}

// This function registers every builtin tool in its advertised order.
export function registerBuiltinTools(registry: CapabilityRegistry, options: BuiltinToolOptions = {}): CapabilityRegistry {
  const handlers: Record<BuiltinToolName, CapabilityInvoker> = {
    yaml_to_json: yamlToJson,
    json_to_yaml: jsonToYaml,
    base64_encode: base64Encode,
    sha256_hash: sha256Hash,
    is_port_open: createIsPortOpen(options),
    validate_url: validateUrl
  };

  for (const name of BUILTIN_TOOL_ORDER) {
    const definition = toolDefinitions[name];
    registry.register(name, definition.description, toInputSchema(definition.schema), handlers[name]);
  }

  return registry;
}
