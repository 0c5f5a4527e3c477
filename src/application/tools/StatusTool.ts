import type { SessionSnapshot } from '../../domain/entities/Session.js';
import { defineTool } from './ToolDefinition.js';

export interface StatusPayload extends SessionSnapshot {
  active: boolean;
  /** 目前網址是否在入口網站主機上 */
  onPortal: boolean;
}

/**
 * Tool: portal_status
 * 回報 session 快照；唯讀，不做任何瀏覽器操作。
 */
export const statusTool = defineTool({
  name: 'status-check',
  mcpName: 'portal_status',
  description: 'Report the portal session state, last activity and current page',
  args: {},
  session: 'none',
  run: async (ctx): Promise<StatusPayload> => {
    const snapshot = ctx.session.snapshot();
    return {
      ...snapshot,
      active: snapshot.state === 'Active',
      onPortal: isOnPortal(snapshot.currentUrl, ctx.portal.baseUrl),
    };
  },
  format: (payload) => {
    const lines = [
      `State: ${payload.state}`,
      `Last activity: ${payload.lastActivityAt !== undefined ? new Date(payload.lastActivityAt).toISOString() : 'never'}`,
      `Consecutive failures: ${payload.consecutiveFailureCount}`,
    ];
    if (payload.currentUrl) {
      lines.push(`Current page: ${payload.currentUrl}${payload.onPortal ? '' : ' (outside the portal)'}`);
    }
    if (payload.profile?.name) {
      lines.push(`Student: ${payload.profile.name}`);
    }
    return lines.join('\n');
  },
});

function isOnPortal(currentUrl: string | undefined, baseUrl: string): boolean {
  if (!currentUrl) return false;
  try {
    return new URL(currentUrl).host === new URL(baseUrl).host;
  } catch {
    return false;
  }
}
