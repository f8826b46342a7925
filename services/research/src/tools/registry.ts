/**
 * Capability Registry
 * Maps capability names to the source tools that serve them
 */

import { CapabilityError } from "@fanout/core";
import type { SourceTool } from "./types.js";

export class CapabilityRegistry {
  private readonly tools = new Map<string, SourceTool>();

  constructor(tools: Iterable<SourceTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register a tool; a later registration for the same capability replaces
   * the earlier one
   */
  register(tool: SourceTool): this {
    this.tools.set(tool.capability, tool);
    return this;
  }

  has(capability: string): boolean {
    return this.tools.has(capability);
  }

  /**
   * @throws CapabilityError (non-retryable) when nothing serves the capability
   */
  get(capability: string): SourceTool {
    const tool = this.tools.get(capability);
    if (!tool) {
      throw new CapabilityError(`No source tool registered for capability "${capability}"`, capability, {
        retryable: false,
        context: { registered: this.list() },
      });
    }
    return tool;
  }

  list(): string[] {
    return [...this.tools.keys()].sort();
  }
}
