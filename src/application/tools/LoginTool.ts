import { z } from 'zod';
import { PortalCredentials } from '../../domain/entities/PortalCredentials.js';
import type { StudentProfile } from '../../domain/ports/BrowserPort.js';
import { defineTool } from './ToolDefinition.js';

export interface LoginPayload {
  status: 'logged_in' | 'already_logged_in';
  profile?: StudentProfile;
}

/**
 * Tool: portal_login
 * 建立已驗證的入口網站 session；未提供帳密時使用環境設定。
 */
export const loginTool = defineTool({
  name: 'login',
  mcpName: 'portal_login',
  description: 'Log in to the student portal. Uses the configured credentials unless username and password are given',
  args: {
    username: z.string().min(1).optional().describe('Portal username (defaults to PORTAL_USERNAME)'),
    password: z.string().min(1).optional().describe('Portal password (defaults to PORTAL_PASSWORD)'),
    forceNewSession: z.boolean().default(false).describe('Log in again even if a session is active'),
  },
  session: 'manages',
  check: (args) =>
    (args.username === undefined) !== (args.password === undefined)
      ? ['username and password must be provided together']
      : [],
  run: async (ctx, args): Promise<LoginPayload> => {
    const credentials = args.username !== undefined && args.password !== undefined
      ? new PortalCredentials(args.username, args.password)
      : undefined;
    const result = await ctx.session.login({ force: args.forceNewSession, credentials });
    return {
      status: result.alreadyActive ? 'already_logged_in' : 'logged_in',
      profile: result.profile,
    };
  },
  format: (payload) => {
    const lines = [payload.status === 'already_logged_in' ? 'Already logged in.' : 'Logged in successfully.'];
    if (payload.profile && Object.keys(payload.profile).length > 0) {
      lines.push('');
      for (const [field, value] of Object.entries(payload.profile)) {
        lines.push(`${field}: ${value}`);
      }
    }
    return lines.join('\n');
  },
});
