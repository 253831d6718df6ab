// This module holds the static capability registry that backs tools/list and tools/call.

import type { McpTool } from '../types/mcp.js';
import { AppError, toolNotFoundError } from '../utils/errors.js';

// One uniform invocation contract: implementations may return a value or a promise of one.
export type CapabilityInvoker = (args: Record<string, unknown>) => unknown;

export interface Capability extends McpTool {
  invoke: CapabilityInvoker;
}

// This class keeps capabilities in insertion order and becomes read-only once frozen at startup.
export class CapabilityRegistry {
  private readonly capabilities = new Map<string, Capability>();
  private frozen = false;

  public register(name: string, description: string, inputSchema: Record<string, unknown>, invoke: CapabilityInvoker): void {
    if (this.frozen) {
      throw new AppError(409, 'registry_frozen', `Cannot register tool '${name}' after startup.`);
    }

    if (this.capabilities.has(name)) {
      throw new AppError(409, 'duplicate_tool', `Tool '${name}' is already registered.`);
    }

    this.capabilities.set(name, { name, description, inputSchema, invoke });
  }

  public lookup(name: string): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw toolNotFoundError(name);
    }

    return capability;
  }

  public has(name: string): boolean {
    return this.capabilities.has(name);
  }

  public get size(): number {
    return this.capabilities.size;
  }

  // Descriptors only; invoke never leaves the registry.
  public listAll(): McpTool[] {
    return [...this.capabilities.values()].map((capability) => ({
      name: capability.name,
      description: capability.description,
      inputSchema: capability.inputSchema
    }));
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public isFrozen(): boolean {
    return this.frozen;
  }
}
