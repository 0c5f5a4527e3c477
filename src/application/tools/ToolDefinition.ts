import { z } from 'zod';
import type { BrowserPort } from '../../domain/ports/BrowserPort.js';
import type { PlannerPort } from '../../domain/ports/PlannerPort.js';
import type { ArtifactPort } from '../../domain/ports/ArtifactPort.js';
import type { PortalConfig } from '../../config/types.js';
import type { PortalSession } from '../PortalSession.js';
import type { ToolRequest } from '../dto/ToolRequest.js';
import { InvalidToolRequestError } from '../../domain/errors/DomainErrors.js';
import type { Logger } from '../../shared/Logger.js';

/** 對外固定的 tool 名稱 */
export type ToolName =
  | 'login'
  | 'logout'
  | 'status-check'
  | 'navigate-and-extract'
  | 'download-document'
  | 'get-notifications'
  | 'get-class-schedule'
  | 'custom-task';

/**
 * tool 與 session 的關係
 * - required：執行前 dispatcher 先確保 Active
 * - manages：tool 自行驅動狀態機（login / logout）
 * - none：唯讀，不觸碰瀏覽器也不更新活動時間
 */
export type SessionUse = 'required' | 'manages' | 'none';

/** 傳給每個 operation 的執行環境 */
export interface OperationContext {
  readonly request: ToolRequest;
  readonly browser: BrowserPort;
  readonly planner: PlannerPort;
  readonly session: PortalSession;
  readonly artifacts: ArtifactPort;
  readonly portal: PortalConfig;
  readonly defaultMaxSteps: number;
  /** 呼叫端放棄（逾時）時觸發 */
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

/**
 * 呼叫端已逾時放棄時刪除剛產生的檔案並拋出逾時錯誤；
 * 沒有人會收到這個路徑。
 */
export async function discardIfAbandoned(ctx: OperationContext, filePath: string): Promise<void> {
  if (!ctx.signal.aborted) return;
  ctx.logger.debug('Caller gave up; discarding file', { filePath });
  await ctx.artifacts.discard(filePath);
  ctx.signal.throwIfAborted();
}

/** 成功結果：結構化資料 + 給 LLM client 的文字 */
export interface ToolOutput {
  data: unknown;
  text: string;
}

/** 驗證參數時可用的靜態環境 */
export interface ToolEnvironment {
  readonly portal: PortalConfig;
  /** 是否設定了 LLM planner */
  readonly plannerAvailable: boolean;
}

/** 已驗證參數、可直接執行的呼叫 */
export interface PreparedCall {
  run(ctx: OperationContext): Promise<ToolOutput>;
}

/** Registry 持有的型別抹除後 tool */
export interface PortalTool {
  readonly name: ToolName;
  readonly mcpName: string;
  readonly description: string;
  readonly argsShape: z.ZodRawShape;
  readonly session: SessionUse;
  /** 驗證參數；不合法時拋出 InvalidToolRequestError */
  prepare(rawArgs: unknown, env: ToolEnvironment): PreparedCall;
}

export type ArgsOf<S extends z.ZodRawShape> = z.infer<z.ZodObject<S, 'strict'>>;

export interface ToolSpec<S extends z.ZodRawShape, P> {
  name: ToolName;
  mcpName: string;
  description: string;
  args: S;
  session: SessionUse;
  /** schema 之外的檢查（目錄、planner）；回傳問題清單 */
  check?: (args: ArgsOf<S>, env: ToolEnvironment) => string[];
  run: (ctx: OperationContext, args: ArgsOf<S>) => Promise<P>;
  format: (payload: P, args: ArgsOf<S>) => string;
}

export function defineTool<S extends z.ZodRawShape, P>(spec: ToolSpec<S, P>): PortalTool {
  const schema = z.object(spec.args).strict();

  return {
    name: spec.name,
    mcpName: spec.mcpName,
    description: spec.description,
    argsShape: spec.args,
    session: spec.session,
    prepare(rawArgs: unknown, env: ToolEnvironment): PreparedCall {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new InvalidToolRequestError(
          `Invalid arguments for "${spec.name}"`,
          parsed.error.issues.map((i) => `${i.path.join('.') || '(arguments)'}: ${i.message}`),
        );
      }
      const args = parsed.data;
      const problems = spec.check?.(args, env) ?? [];
      if (problems.length > 0) {
        throw new InvalidToolRequestError(`Invalid arguments for "${spec.name}"`, problems);
      }
      return {
        async run(ctx: OperationContext): Promise<ToolOutput> {
          const payload = await spec.run(ctx, args);
          return { data: payload, text: spec.format(payload, args) };
        },
      };
    },
  };
}
