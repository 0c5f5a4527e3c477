import { defineTool } from './ToolDefinition.js';
import { readSection } from './sectionReader.js';

export type ScheduleEntry = Record<string, string>;

export interface SchedulePayload {
  url: string;
  entries: ScheduleEntry[];
  /** 依 day 欄位分組，保留頁面順序 */
  byDay: Record<string, ScheduleEntry[]>;
}

const UNSPECIFIED_DAY = 'unspecified';

/**
 * Tool: portal_get_class_schedule
 * 讀取本學期課表並依星期分組。
 */
export const classScheduleTool = defineTool({
  name: 'get-class-schedule',
  mcpName: 'portal_get_class_schedule',
  description: 'Get the current class schedule, grouped by weekday',
  args: {},
  session: 'required',
  run: async (ctx): Promise<SchedulePayload> => {
    const record = await readSection(ctx, 'schedule');
    return { url: record.url, entries: record.items, byDay: groupByDay(record.items) };
  },
  format: (payload) => {
    if (payload.entries.length === 0) return 'No classes found in the schedule.';
    const lines: string[] = [];
    for (const [day, entries] of Object.entries(payload.byDay)) {
      lines.push(`## ${day}`);
      for (const e of entries) {
        const where = [e.room, e.instructor].filter(Boolean).join(', ');
        lines.push(`- ${e.time ? `${e.time} ` : ''}${e.course ?? ''}${where ? ` (${where})` : ''}`.trimEnd());
      }
      lines.push('');
    }
    return lines.join('\n').trimEnd();
  },
});

export function groupByDay(entries: ScheduleEntry[]): Record<string, ScheduleEntry[]> {
  const groups: Record<string, ScheduleEntry[]> = {};
  for (const entry of entries) {
    const day = entry.day?.trim() || UNSPECIFIED_DAY;
    (groups[day] ??= []).push(entry);
  }
  return groups;
}
