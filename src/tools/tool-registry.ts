import type { ToolDescriptor } from '../types/index.js';
import type { SessionManager } from '../engines/session-manager.js';
import { toInputSchema, type ToolDefinition } from './tool-definition.js';
import { buildNavigateTool } from './navigate.js';
import { buildScreenshotTool } from './screenshot.js';
import { buildExtractLinksTool } from './extract-links.js';
import { buildFillTool } from './fill.js';
import { buildClickTool } from './click.js';
import { buildGetHtmlTool } from './get-html.js';

/**
 * Registry of named tools. Iteration follows registration order so that
 * `tools/list` answers identically on every run.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private descriptorCache: ToolDescriptor[] | null = null;

  /**
   * Register a tool. Throws if a tool with the same name already exists.
   */
  register(tool: ToolDefinition): void {
    if (this.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    this.descriptorCache = null;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  descriptors(): ToolDescriptor[] {
    if (!this.descriptorCache) {
      this.descriptorCache = this.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: toInputSchema(tool.inputSchema),
      }));
    }
    return this.descriptorCache;
  }
}

export interface ToolRegistryOptions {
  navigationTimeoutMs?: number;
}

/**
 * Build the registry with every builtin tool wired to one session manager.
 */
export function buildToolRegistry(sessions: SessionManager, options: ToolRegistryOptions = {}): ToolRegistry {
  const registry = new ToolRegistry();
  const builtins = [
    buildNavigateTool(sessions, { timeoutMs: options.navigationTimeoutMs }),
    buildScreenshotTool(sessions),
    buildExtractLinksTool(sessions),
    buildFillTool(sessions),
    buildClickTool(sessions),
    buildGetHtmlTool(sessions),
  ];
  for (const tool of builtins) {
    registry.register(tool);
  }
  return registry;
}
