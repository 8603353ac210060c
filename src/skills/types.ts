export interface ToolResult {
  ok: boolean;
  output?: string;
  error?: string;
  meta?: Record<string, unknown>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
  execute(input: unknown): Promise<ToolResult>;
}

export interface SkillDefinition {
  id: string;
  version: string;
  description: string;
  promptBlock: string;
  tools: ToolDefinition[];
}
