import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { TaskDispatcher } from '../application/TaskDispatcher.js';
import type { ToolRegistry } from '../application/ToolRegistry.js';
import type { PortalTool } from '../application/tools/ToolDefinition.js';
import type { ToolResult } from '../application/dto/ToolResult.js';
import type { ToolOutput } from '../application/tools/ToolDefinition.js';

export const SERVER_NAME = 'portal-mcp';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊 registry 中的所有 tool。
 * 每個 handler 只把呼叫轉給 TaskDispatcher；失敗以 isError + JSON 回傳，不拋出。
 * HTTP transport 每個請求建立一個新實例，共用同一個 dispatcher。
 */

export interface McpDependencies {
  dispatcher: TaskDispatcher;
  registry: ToolRegistry;
  portalBaseUrl: string;
  version: string;
}

export interface CallToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: SERVER_NAME, version: deps.version },
    { instructions: buildInstructions(deps.registry.list(), deps.portalBaseUrl) },
  );

  for (const tool of deps.registry.list()) {
    registerPortalTool(server, tool, deps.dispatcher);
  }

  return server;
}

function registerPortalTool(server: SDKMcpServer, tool: PortalTool, dispatcher: TaskDispatcher): void {
  server.tool(
    tool.mcpName,
    tool.description,
    permissiveShape(tool.argsShape),
    async (args) => toCallToolResponse(await dispatcher.dispatch({ name: tool.name, arguments: args })),
  );
}

/**
 * 對 MCP 公開的參數 schema
 *
 * 每個欄位都另外接受任意值：tools/list 仍列出原本的型別與說明，
 * 但型別錯誤交給 dispatcher 的 strict 驗證，回傳 InvalidRequest 而非 protocol 錯誤。
 */
export function permissiveShape(shape: z.ZodRawShape): z.ZodRawShape {
  const loose: z.ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    const accepting = z.union([field, z.unknown()]);
    loose[key] = field.description === undefined ? accepting : accepting.describe(field.description);
  }
  return loose;
}

/** ToolResult → MCP CallTool 回應 */
export function toCallToolResponse(result: ToolResult<ToolOutput>): CallToolResponse {
  if (result.ok) {
    return { content: [{ type: 'text', text: result.payload.text }] };
  }
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ kind: result.kind, message: result.message, retryable: result.retryable }),
    }],
    isError: true,
  };
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(tools: readonly PortalTool[], portalBaseUrl: string): string {
  return [
    `${SERVER_NAME}: automates the student portal at ${portalBaseUrl} for one logged-in student.`,
    '',
    'Available tools:',
    ...tools.map((t) => `- ${t.mcpName}: ${t.description}`),
    '',
    'Recommended workflow:',
    '1. portal_login (uses the configured credentials when none are given)',
    '2. portal_navigate_and_extract, portal_get_notifications, portal_get_class_schedule or portal_download_document',
    '3. portal_custom_task for anything the other tools do not cover',
    '4. portal_logout when finished',
    '',
    'Calls run one at a time in arrival order. Tools that need the portal log in automatically.',
    'Failures are JSON {kind, message, retryable}; retry only when retryable is true.',
  ].join('\n');
}
