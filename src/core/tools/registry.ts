import type { RegisteredTool } from "./types.js";

export interface ToolSummary {
  name: string;
  title: string;
  description: string;
}

function parseAllowedTools(raw: string | undefined): Set<string> | null {
  if (!raw) {
    return null;
  }
  const entries = raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  if (entries.length === 0) {
    return null;
  }
  return new Set(entries);
}

export class ToolRegistry {
  private readonly toolsByName: Map<string, RegisteredTool>;
  private readonly allowedTools: Set<string> | null;

  constructor(tools: RegisteredTool[], rawAllowedTools?: string | undefined) {
    this.toolsByName = new Map();
    for (const tool of tools) {
      if (this.toolsByName.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.toolsByName.set(tool.name, tool);
    }
    this.allowedTools = parseAllowedTools(rawAllowedTools);
  }

  get(name: string): RegisteredTool | null {
    if (this.allowedTools && !this.allowedTools.has(name)) {
      return null;
    }
    return this.toolsByName.get(name) ?? null;
  }

  list(): RegisteredTool[] {
    const tools = [...this.toolsByName.values()];
    if (!this.allowedTools) {
      return tools;
    }
    return tools.filter((tool) => this.allowedTools?.has(tool.name));
  }

  summaries(): ToolSummary[] {
    return this.list().map((tool) => ({
      name: tool.name,
      title: tool.title,
      description: tool.description
    }));
  }
}
