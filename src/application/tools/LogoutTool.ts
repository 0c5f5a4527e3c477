import type { RemoteLogoutStatus } from '../PortalSession.js';
import { defineTool } from './ToolDefinition.js';

export interface LogoutPayload {
  status: 'logged_out';
  remoteLogout: RemoteLogoutStatus;
}

/**
 * Tool: portal_logout
 * 結束 session 並關閉瀏覽器；遠端登出失敗時仍回報成功。
 */
export const logoutTool = defineTool({
  name: 'logout',
  mcpName: 'portal_logout',
  description: 'Log out of the student portal and close the browser',
  args: {},
  session: 'manages',
  run: async (ctx): Promise<LogoutPayload> => ({
    status: 'logged_out',
    remoteLogout: await ctx.session.logout(),
  }),
  format: (payload) =>
    payload.remoteLogout === 'failed'
      ? 'Logged out locally (the portal did not confirm the logout).'
      : 'Logged out.',
});
