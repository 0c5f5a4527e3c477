import OpenAI from 'openai';
import { z } from 'zod';
import type {
  PlanOptions,
  PlanResult,
  PlanStep,
  PlannerContext,
  PlannerPort,
  PlannerToolbox,
} from '../../domain/ports/PlannerPort.js';
import { PlannerTransientError, ResourceNotFoundError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

/** 回灌給模型的工具結果上限 */
const MAX_OBSERVATION_CHARS = 8000;

export interface HttpPlannerConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

const sectionArgs = z.object({ section: z.string().min(1) });
const finishArgs = z.object({ summary: z.string(), data: z.unknown().optional() });

const PLANNER_TOOLS: ChatTool[] = [
  {
    type: 'function',
    function: {
      name: 'open_section',
      description: 'Open a portal section and return its title and URL',
      parameters: {
        type: 'object',
        properties: { section: { type: 'string', description: 'Section key' } },
        required: ['section'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'extract_section',
      description: 'Open a portal section and return its data as records',
      parameters: {
        type: 'object',
        properties: { section: { type: 'string', description: 'Section key' } },
        required: ['section'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'read_page',
      description: 'Read the visible text of the current page',
      parameters: { type: 'object', properties: {} },
    },
  },
  {
    type: 'function',
    function: {
      name: 'finish',
      description: 'Finish the task with a short answer and, if asked, structured data',
      parameters: {
        type: 'object',
        properties: {
          summary: { type: 'string' },
          data: { description: 'Structured result (any JSON value)' },
        },
        required: ['summary'],
      },
    },
  },
];

/**
 * OpenAI-compatible planner
 *
 * function-calling 迴圈：模型每一步選一個動作（開啟區塊、擷取、讀頁、完成），
 * 結果回灌後再問下一步，直到 finish 或達到步數上限。
 * 連線與逾時錯誤轉成 PlannerTransientError，交給 dispatcher 重試。
 */
export class HttpPlannerAdapter implements PlannerPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly logger = new Logger('HttpPlannerAdapter');

  constructor(private readonly config: HttpPlannerConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  async plan(
    goal: string,
    context: PlannerContext,
    toolbox: PlannerToolbox,
    options: PlanOptions,
  ): Promise<PlanResult> {
    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(context, options.returnStructuredData) },
      { role: 'user', content: goal },
    ];
    const steps: PlanStep[] = [];

    for (let step = 0; step < options.maxSteps; step++) {
      options.signal?.throwIfAborted();
      const message = await this.complete(messages, options.signal);
      const calls = message.tool_calls ?? [];

      if (calls.length === 0) {
        return { completed: true, summary: message.content?.trim() || 'Done.', steps };
      }

      messages.push({ role: 'assistant', content: message.content, tool_calls: calls });

      for (const call of calls) {
        if (call.function.name === 'finish') {
          const parsed = finishArgs.safeParse(parseJson(call.function.arguments));
          if (parsed.success) {
            steps.push({ action: 'finish', detail: '' });
            return {
              completed: true,
              summary: parsed.data.summary,
              data: options.returnStructuredData ? parsed.data.data : undefined,
              steps,
            };
          }
        }
        const observation = await this.runAction(call.function.name, call.function.arguments, toolbox, steps);
        messages.push({ role: 'tool', tool_call_id: call.id, content: truncate(JSON.stringify(observation)) });
      }
    }

    this.logger.warn('Planner reached the step limit', { maxSteps: options.maxSteps });
    return {
      completed: false,
      summary: `Stopped after ${options.maxSteps} steps without finishing the task`,
      steps,
    };
  }

  private async complete(messages: ChatMessage[], signal?: AbortSignal) {
    try {
      const response = await this.client.chat.completions.create(
        { model: this.config.model, messages, tools: PLANNER_TOOLS, tool_choice: 'auto', temperature: 0 },
        { signal },
      );
      const message = response.choices[0]?.message;
      if (!message) {
        throw new PlannerTransientError('Planner returned no choices');
      }
      return message;
    } catch (err) {
      if (isTransientApiError(err)) {
        throw new PlannerTransientError('LLM endpoint unavailable', { cause: err });
      }
      throw err;
    }
  }

  /** 執行一個瀏覽器動作；找不到區塊時把錯誤回報給模型而非中止 */
  private async runAction(
    name: string,
    rawArgs: string,
    toolbox: PlannerToolbox,
    steps: PlanStep[],
  ): Promise<unknown> {
    try {
      switch (name) {
        case 'open_section': {
          const args = sectionArgs.parse(parseJson(rawArgs));
          steps.push({ action: name, detail: args.section });
          return await toolbox.openSection(args.section);
        }
        case 'extract_section': {
          const args = sectionArgs.parse(parseJson(rawArgs));
          steps.push({ action: name, detail: args.section });
          return await toolbox.extractSection(args.section);
        }
        case 'read_page':
          steps.push({ action: name, detail: '' });
          return await toolbox.readPage();
        default:
          return { error: `Unknown or malformed action "${name}"` };
      }
    } catch (err) {
      if (err instanceof ResourceNotFoundError || err instanceof z.ZodError) {
        return { error: err.message };
      }
      throw err;
    }
  }
}

function buildSystemPrompt(context: PlannerContext, structured: boolean): string {
  return [
    'You operate a university student portal on behalf of the logged-in student.',
    `Portal: ${context.portalBaseUrl}`,
    context.currentUrl ? `Current page: ${context.currentUrl}` : '',
    '',
    'Sections you can open (use the key):',
    ...context.sections.map((s) => `- ${s.key}: ${s.title}`),
    '',
    'Use one action per step. Never submit forms or change enrollment.',
    structured
      ? 'When done, call finish with a short summary and the relevant records in "data".'
      : 'When done, call finish with a short summary.',
  ].filter((line, i, all) => line !== '' || all[i - 1] !== '').join('\n');
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw || '{}');
  } catch {
    return undefined;
  }
}

function truncate(text: string): string {
  return text.length > MAX_OBSERVATION_CHARS ? `${text.slice(0, MAX_OBSERVATION_CHARS)}…` : text;
}

export function isTransientApiError(err: unknown): boolean {
  return err instanceof OpenAI.APIConnectionError
    || err instanceof OpenAI.RateLimitError
    || err instanceof OpenAI.InternalServerError;
}
