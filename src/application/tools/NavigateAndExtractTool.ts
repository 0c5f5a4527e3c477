import { z } from 'zod';
import { InvalidToolRequestError } from '../../domain/errors/DomainErrors.js';
import { defineTool, discardIfAbandoned } from './ToolDefinition.js';
import { resolveSection, sectionNames } from './catalog.js';
import { formatRecords } from './formatting.js';

export interface NavigatePayload {
  section: string;
  title: string;
  url: string;
  items?: Array<Record<string, string>>;
  screenshotPath?: string;
}

/**
 * Tool: portal_navigate_and_extract
 * 開啟指定區塊，依目錄中的擷取規格取出結構化資料，可附截圖。
 */
export const navigateAndExtractTool = defineTool({
  name: 'navigate-and-extract',
  mcpName: 'portal_navigate_and_extract',
  description: 'Open a portal section (grades, transcript, enrollment, schedule, notices) and extract its data',
  args: {
    section: z.string().min(1).describe('Section key or alias, e.g. "grades" or "notas"'),
    extractData: z.boolean().default(true).describe('Extract structured data from the page'),
    takeScreenshot: z.boolean().default(false).describe('Save a screenshot of the page'),
  },
  session: 'required',
  check: (args, env) =>
    resolveSection(env.portal, args.section)
      ? []
      : [`Unknown section "${args.section}". Available: ${sectionNames(env.portal).join(', ')}`],
  run: async (ctx, args): Promise<NavigatePayload> => {
    const resolved = resolveSection(ctx.portal, args.section);
    if (!resolved) {
      throw new InvalidToolRequestError(`Unknown section "${args.section}"`);
    }
    const { key, section } = resolved;

    const page = await ctx.browser.navigate({ path: section.path });
    const payload: NavigatePayload = { section: key, title: page.title || section.title, url: page.url };

    if (args.extractData) {
      const record = await ctx.browser.extract(section.extract);
      payload.items = record.items;
    }
    if (args.takeScreenshot) {
      payload.screenshotPath = await ctx.browser.screenshot(await ctx.artifacts.screenshotPath(key));
      await discardIfAbandoned(ctx, payload.screenshotPath);
    }
    return payload;
  },
  format: (payload) => {
    const lines = [`# ${payload.title}`, payload.url];
    if (payload.screenshotPath) lines.push(`Screenshot: ${payload.screenshotPath}`);
    if (payload.items) {
      lines.push('', formatRecords(payload.items, 'No data found on this page.'));
    }
    return lines.join('\n');
  },
});
