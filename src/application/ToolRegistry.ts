import type { PortalTool, PreparedCall, ToolEnvironment } from './tools/ToolDefinition.js';
import type { ToolRequest } from './dto/ToolRequest.js';
import { InvalidToolRequestError } from '../domain/errors/DomainErrors.js';

export interface ResolvedCall {
  tool: PortalTool;
  call: PreparedCall;
}

/**
 * Tool 名稱 → 定義的對照表
 * 名稱可用內部名稱（login）或 MCP 名稱（portal_login）查詢。
 */
export class ToolRegistry {
  private readonly tools = new Map<string, PortalTool>();
  private readonly byMcpName = new Map<string, PortalTool>();

  constructor(tools: readonly PortalTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: PortalTool): void {
    if (this.tools.has(tool.name) || this.byMcpName.has(tool.mcpName)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    this.byMcpName.set(tool.mcpName, tool);
  }

  list(): PortalTool[] {
    return [...this.tools.values()];
  }

  get(name: string): PortalTool | undefined {
    return this.tools.get(name) ?? this.byMcpName.get(name);
  }

  /** 查找並驗證；未知名稱或參數不合法時拋出 InvalidToolRequestError */
  resolve(request: ToolRequest, env: ToolEnvironment): ResolvedCall {
    const tool = this.get(request.name);
    if (!tool) {
      throw new InvalidToolRequestError(`Unknown tool "${request.name}"`);
    }
    return { tool, call: tool.prepare(request.arguments, env) };
  }
}
