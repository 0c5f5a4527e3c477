import { z } from 'zod';
import { ResourceNotFoundError } from '../../domain/errors/DomainErrors.js';
import type { PlanResult, PlannerContext, PlannerToolbox } from '../../domain/ports/PlannerPort.js';
import { defineTool, type OperationContext } from './ToolDefinition.js';
import { resolveSection } from './catalog.js';

/** planner 讀頁時的文字上限 */
const READ_PAGE_MAX_CHARS = 6000;

export interface CustomTaskPayload extends PlanResult {
  task: string;
}

/**
 * Tool: portal_custom_task
 * 自由文字目標交給 LLM planner，在目前 session 中逐步操作。
 */
export const customTaskTool = defineTool({
  name: 'custom-task',
  mcpName: 'portal_custom_task',
  description: 'Carry out a free-form task on the portal with an LLM planner (e.g. "find my grade in Calculus I")',
  args: {
    task: z.string().trim().min(1, 'task must not be empty').describe('What to do on the portal'),
    maxSteps: z.number().int().min(1).max(50).optional().describe('Maximum planner steps (default 20)'),
    returnStructuredData: z.boolean().default(true).describe('Ask the planner to return structured data'),
  },
  session: 'required',
  check: (_args, env) =>
    env.plannerAvailable
      ? []
      : ['custom tasks need an LLM provider; set PORTAL_LLM_API_KEY (or OPENAI_API_KEY)'],
  run: async (ctx, args): Promise<CustomTaskPayload> => {
    const context: PlannerContext = {
      portalBaseUrl: ctx.portal.baseUrl,
      currentUrl: ctx.browser.currentUrl(),
      sections: Object.entries(ctx.portal.sections).map(([key, s]) => ({ key, title: s.title })),
    };
    const result = await ctx.planner.plan(args.task, context, buildToolbox(ctx), {
      maxSteps: args.maxSteps ?? ctx.defaultMaxSteps,
      returnStructuredData: args.returnStructuredData,
      signal: ctx.signal,
    });
    return { task: args.task, ...result };
  },
  format: (payload) => {
    const lines = [payload.completed ? payload.summary : `Incomplete: ${payload.summary}`];
    if (payload.data !== undefined) {
      lines.push('', '```json', JSON.stringify(payload.data, null, 2), '```');
    }
    lines.push('', `Steps taken: ${payload.steps.length}`);
    return lines.join('\n');
  },
});

/** 綁定到目前瀏覽器的 planner 動作；請求被放棄後不再操作 */
export function buildToolbox(ctx: OperationContext): PlannerToolbox {
  const sectionFor = (name: string) => {
    const resolved = resolveSection(ctx.portal, name);
    if (!resolved) throw new ResourceNotFoundError(`Unknown section "${name}"`);
    return resolved.section;
  };

  return {
    async openSection(name) {
      ctx.signal.throwIfAborted();
      return ctx.browser.navigate({ path: sectionFor(name).path });
    },
    async extractSection(name) {
      ctx.signal.throwIfAborted();
      const section = sectionFor(name);
      await ctx.browser.navigate({ path: section.path });
      return ctx.browser.extract(section.extract);
    },
    async readPage() {
      ctx.signal.throwIfAborted();
      return ctx.browser.readPage(READ_PAGE_MAX_CHARS);
    },
  };
}
