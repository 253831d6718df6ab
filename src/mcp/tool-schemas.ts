// This module defines the builtin tool argument contracts and their advertised JSON Schema documents.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const yamlToJsonSchema = z
  .object({
    yaml: z.string().describe('YAML string to convert to JSON')
  })
  .strict();

export const jsonToYamlSchema = z
  .object({
    json: z.string().describe('JSON string to convert to YAML')
  })
  .strict();

export const base64EncodeSchema = z
  .object({
    text: z.string().describe('Plain text to encode')
  })
  .strict();

export const sha256HashSchema = z
  .object({
    text: z.string().describe('Text to hash')
  })
  .strict();

// Range checks live in the handler so out-of-range ports produce the explicit port message.
export const isPortOpenSchema = z
  .object({
    host: z.string().trim().min(1).describe('Hostname or IP address to check'),
    port: z.number().int().describe('Port number (1-65535)')
  })
  .strict();

export const validateUrlSchema = z
  .object({
    url: z.string().describe('URL to validate')
  })
  .strict();

// This registry maps tool names to runtime schemas and discovery descriptions.
export const toolDefinitions = {
  yaml_to_json: {
    schema: yamlToJsonSchema,
    description:
      'Convert YAML string to JSON format. Useful for configuration file transformations and data interchange.'
  },
  json_to_yaml: {
    schema: jsonToYamlSchema,
    description:
      'Convert JSON string to YAML format. YAML is more human-readable and commonly used in configuration files.'
  },
  base64_encode: {
    schema: base64EncodeSchema,
    description: 'Encode text string to base64 format. Used for representing binary data in ASCII format.'
  },
  sha256_hash: {
    schema: sha256HashSchema,
    description: 'Compute SHA256 cryptographic hash of text. Produces a 64-character hexadecimal hash string.'
  },
  is_port_open: {
    schema: isPortOpenSchema,
    description:
      'Check if a TCP port is open on a host. Useful for service availability and network diagnostics. Times out after 3 seconds.'
  },
  validate_url: {
    schema: validateUrlSchema,
    description: 'Validate URL format and structure. Checks for protocol, domain, and invalid characters.'
  }
} as const;

export type BuiltinToolName = keyof typeof toolDefinitions;

export const BUILTIN_TOOL_ORDER: readonly BuiltinToolName[] = [
  'yaml_to_json',
  'json_to_yaml',
  'base64_encode',
  'sha256_hash',
  'is_port_open',
  'validate_url'
];

// This helper renders one zod contract as a self-contained JSON Schema object for tools/list.
export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _dialect, ...document } = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
  return document;
}
