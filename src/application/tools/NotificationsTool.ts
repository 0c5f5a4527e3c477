import { defineTool } from './ToolDefinition.js';
import { readSection } from './sectionReader.js';
import { formatRecords } from './formatting.js';

export interface NotificationsPayload {
  url: string;
  count: number;
  notifications: Array<Record<string, string>>;
}

/**
 * Tool: portal_get_notifications
 * 讀取入口首頁的公告與通知。
 */
export const notificationsTool = defineTool({
  name: 'get-notifications',
  mcpName: 'portal_get_notifications',
  description: 'List the notices and announcements shown on the student portal',
  args: {},
  session: 'required',
  run: async (ctx): Promise<NotificationsPayload> => {
    const record = await readSection(ctx, 'notices');
    return { url: record.url, count: record.items.length, notifications: record.items };
  },
  format: (payload) =>
    [`${payload.count} notification(s)`, '', formatRecords(payload.notifications, 'No notifications.')].join('\n'),
});
