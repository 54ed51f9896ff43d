import type { ToolDefinition, ToolProfile } from './types.js';
import { fileTools } from './dev/file-tools.js';
import { bashTools } from './dev/bash-tools.js';
import { BROWSER_TOOL_PREFIX, browserTools } from './browser/browser-tools.js';

// Tool profiles define which tools a session exposes and will execute
const TOOL_PROFILES: Record<ToolProfile, readonly string[] | 'all'> = {
  full: 'all',
  readonly: ['read_file', 'glob_search', 'grep_search'],
};

export function isToolProfile(value: string): value is ToolProfile {
  return Object.hasOwn(TOOL_PROFILES, value);
}

export class ToolRegistry {
  private allTools: Map<string, ToolDefinition>;

  constructor(tools: ToolDefinition[] = [...fileTools, ...bashTools, ...browserTools]) {
    this.allTools = new Map();
    this.registerTools(tools);
  }

  private registerTools(tools: ToolDefinition[]): void {
    for (const tool of tools) {
      if (this.allTools.has(tool.name)) {
        throw new Error(`Tool ${tool.name} is already registered`);
      }
      this.allTools.set(tool.name, tool);
    }
  }

  /**
   * Canonical name for `name`; browser tools may arrive with the MCP prefix.
   */
  resolveName(name: string): string {
    if (name.startsWith(BROWSER_TOOL_PREFIX)) {
      const bare = name.slice(BROWSER_TOOL_PREFIX.length);
      if (this.allTools.get(bare)?.category === 'browser') {
        return bare;
      }
    }
    return name;
  }

  /**
   * Get all tools filtered by profile
   */
  getToolsForProfile(profile: ToolProfile): ToolDefinition[] {
    const allowed = TOOL_PROFILES[profile];
    if (allowed === 'all') {
      return Array.from(this.allTools.values());
    }
    return allowed
      .map((name) => this.allTools.get(name))
      .filter((tool): tool is ToolDefinition => tool !== undefined);
  }

  /**
   * Look a tool up by name (prefixed aliases included), optionally only
   * within a profile.
   */
  getTool(name: string, profile?: ToolProfile): ToolDefinition | undefined {
    const canonical = this.resolveName(name);
    const tool = this.allTools.get(canonical);
    if (!tool || profile === undefined) {
      return tool;
    }
    const allowed = TOOL_PROFILES[profile];
    return allowed === 'all' || allowed.includes(canonical) ? tool : undefined;
  }

  getAllToolNames(): string[] {
    return Array.from(this.allTools.keys());
  }

  hasTool(name: string): boolean {
    return this.allTools.has(this.resolveName(name));
  }
}
