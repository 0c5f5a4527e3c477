import type { PortalTool } from './ToolDefinition.js';
import { loginTool } from './LoginTool.js';
import { logoutTool } from './LogoutTool.js';
import { statusTool } from './StatusTool.js';
import { navigateAndExtractTool } from './NavigateAndExtractTool.js';
import { downloadDocumentTool } from './DownloadDocumentTool.js';
import { notificationsTool } from './NotificationsTool.js';
import { classScheduleTool } from './ClassScheduleTool.js';
import { customTaskTool } from './CustomTaskTool.js';

export type { PortalTool, OperationContext, ToolOutput, ToolEnvironment, ToolName } from './ToolDefinition.js';

/** 對外提供的固定 tool 集合（順序即 tools/list 順序） */
export const PORTAL_TOOLS: readonly PortalTool[] = [
  loginTool,
  logoutTool,
  statusTool,
  navigateAndExtractTool,
  downloadDocumentTool,
  notificationsTool,
  classScheduleTool,
  customTaskTool,
];
