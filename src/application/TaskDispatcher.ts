import { randomUUID } from 'node:crypto';
import type { BrowserPort } from '../domain/ports/BrowserPort.js';
import type { PlannerPort } from '../domain/ports/PlannerPort.js';
import type { ArtifactPort } from '../domain/ports/ArtifactPort.js';
import type { AuditPort } from '../domain/ports/AuditPort.js';
import type { DispatcherConfig, PortalConfig } from '../config/types.js';
import {
  DispatchTimeoutError,
  SessionExpiredError,
  errorCode,
  isTransient,
} from '../domain/errors/DomainErrors.js';
import type { PortalSession } from './PortalSession.js';
import type { ToolRegistry, ResolvedCall } from './ToolRegistry.js';
import { ResultNormalizer } from './ResultNormalizer.js';
import type { ToolRequest } from './dto/ToolRequest.js';
import type { ToolResult } from './dto/ToolResult.js';
import type { OperationContext, ToolOutput, ToolEnvironment } from './tools/ToolDefinition.js';
import { SerialQueue } from '../shared/SerialQueue.js';
import { withDeadline } from '../shared/Deadline.js';
import { withRetry } from '../shared/RetryPolicy.js';
import { Logger } from '../shared/Logger.js';

export interface DispatchInput {
  name: string;
  arguments?: Record<string, unknown>;
  /** transport 未提供時自動產生 */
  requestId?: string;
}

export interface TaskDispatcherDeps {
  registry: ToolRegistry;
  session: PortalSession;
  browser: BrowserPort;
  planner: PlannerPort;
  artifacts: ArtifactPort;
  audit: AuditPort;
  portal: PortalConfig;
  dispatcher: DispatcherConfig;
  defaultMaxSteps: number;
  normalizer?: ResultNormalizer;
  now?: () => number;
}

/**
 * Tool 呼叫的唯一入口
 *
 * 驗證 → 排入單一執行槽（FIFO）→ 確保 session → 執行（暫時性錯誤重試）→ 正規化。
 * 時間預算涵蓋排隊與執行；逾時後呼叫端立即拿到 Timeout，
 * 執行中的工作在背景結束後才釋放執行槽。dispatch() 永不 reject。
 */
export class TaskDispatcher {
  private readonly queue = new SerialQueue();
  private readonly normalizer: ResultNormalizer;
  private readonly now: () => number;
  private readonly logger = new Logger('TaskDispatcher');
  private readonly env: ToolEnvironment;

  constructor(private readonly deps: TaskDispatcherDeps) {
    this.normalizer = deps.normalizer ?? new ResultNormalizer();
    this.now = deps.now ?? Date.now;
    this.env = { portal: deps.portal, plannerAvailable: deps.planner.providerId !== 'none' };
  }

  /** 排隊中 + 執行中的請求數 */
  get pending(): number {
    return this.queue.pending;
  }

  /**
   * 在執行槽內執行 task，排在目前所有請求之後
   * 等待超過 waitMs 仍拿不到執行槽時放棄並回傳 false，task 不會執行。
   */
  async runExclusive(task: () => Promise<void>, waitMs: number): Promise<boolean> {
    let abandoned = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const gaveUp = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        abandoned = true;
        resolve(false);
      }, waitMs);
    });
    const ran = this.queue.run(async () => {
      if (abandoned) return false;
      clearTimeout(timer);
      await task();
      return true;
    });
    return Promise.race([ran, gaveUp]);
  }

  async dispatch(input: DispatchInput): Promise<ToolResult<ToolOutput>> {
    const request: ToolRequest = {
      name: input.name,
      arguments: input.arguments ?? {},
      requestId: input.requestId ?? randomUUID(),
    };
    const budgetMs = this.deps.dispatcher.requestTimeoutMs;
    const startedAt = this.now();
    const counter = { attempts: 0 };

    let result: ToolResult<ToolOutput>;
    try {
      const resolved = this.deps.registry.resolve(request, this.env);
      const output = await withDeadline(
        (signal) => this.queue.run(() => this.execute(resolved, request, signal, counter)),
        budgetMs,
        () => new DispatchTimeoutError(request.name, budgetMs),
      );
      result = this.normalizer.success(output);
    } catch (err) {
      result = this.normalizer.failure(err, { requestId: request.requestId, toolName: request.name });
    }

    this.report(request, result, counter.attempts, this.now() - startedAt);
    return result;
  }

  private async execute(
    resolved: ResolvedCall,
    request: ToolRequest,
    signal: AbortSignal,
    counter: { attempts: number },
  ): Promise<ToolOutput> {
    // 排隊期間預算已用完：不開始
    if (signal.aborted) {
      throw new DispatchTimeoutError(request.name, this.deps.dispatcher.requestTimeoutMs);
    }

    const ctx = this.contextFor(request, signal);
    if (resolved.tool.session === 'none') {
      counter.attempts++;
      return resolved.call.run(ctx);
    }

    try {
      const output = await this.runWithSession(resolved, ctx, counter);
      this.deps.session.recordOutcome(true);
      return output;
    } catch (err) {
      this.deps.session.recordOutcome(false);
      throw err;
    }
  }

  private async runWithSession(
    { tool, call }: ResolvedCall,
    ctx: OperationContext,
    counter: { attempts: number },
  ): Promise<ToolOutput> {
    const { session } = this.deps;
    const sessionBound = tool.session === 'required';

    if (sessionBound) {
      await session.ensureActive();
      this.checkAbandoned(ctx);
    }

    const runWithRetry = () =>
      withRetry(
        () => {
          counter.attempts++;
          // 瀏覽器已消失：登入狀態跟著消失，交給重新登入處理
          if (sessionBound && !this.deps.browser.isOpen()) {
            throw new SessionExpiredError('Browser is no longer running');
          }
          return call.run(ctx);
        },
        {
          maxRetries: this.deps.dispatcher.maxRetries,
          baseDelayMs: this.deps.dispatcher.baseDelayMs,
          isRetryable: isTransient,
          signal: ctx.signal,
          onRetry: (attempt, err) =>
            this.logger.warn('Retrying after transient failure', {
              tool: tool.name,
              requestId: ctx.request.requestId,
              attempt,
              code: errorCode(err),
            }),
        },
      );

    try {
      return await runWithRetry();
    } catch (err) {
      if (!sessionBound || !(err instanceof SessionExpiredError)) throw err;

      this.logger.warn('Session expired during operation; logging in again', {
        tool: tool.name,
        requestId: ctx.request.requestId,
      });
      session.markDegraded();
      await session.relogin();
      this.checkAbandoned(ctx);

      try {
        return await runWithRetry();
      } catch (second) {
        if (second instanceof SessionExpiredError) {
          throw session.abandon('Session expired again right after logging in', second);
        }
        throw second;
      }
    }
  }

  private checkAbandoned(ctx: OperationContext): void {
    if (ctx.signal.aborted) {
      throw new DispatchTimeoutError(ctx.request.name, this.deps.dispatcher.requestTimeoutMs);
    }
  }

  private contextFor(request: ToolRequest, signal: AbortSignal): OperationContext {
    return {
      request,
      browser: this.deps.browser,
      planner: this.deps.planner,
      session: this.deps.session,
      artifacts: this.deps.artifacts,
      portal: this.deps.portal,
      defaultMaxSteps: this.deps.defaultMaxSteps,
      signal,
      logger: this.logger.child(request.name),
    };
  }

  private report(request: ToolRequest, result: ToolResult<ToolOutput>, attempts: number, durationMs: number): void {
    const entry = {
      requestId: request.requestId,
      toolName: request.name,
      outcome: result.ok ? ('Success' as const) : result.kind,
      retryable: result.ok ? false : result.retryable,
      attempts,
      durationMs,
      timestampMs: this.now(),
    };

    try {
      this.deps.audit.record(entry);
    } catch (err) {
      this.logger.error('Audit write failed', { requestId: request.requestId, code: errorCode(err) });
    }

    const fields = {
      tool: entry.toolName,
      requestId: entry.requestId,
      outcome: entry.outcome,
      retryable: entry.retryable,
      attempts,
      durationMs,
    };
    if (result.ok) {
      this.logger.info('Tool call completed', fields);
    } else {
      this.logger.warn('Tool call failed', fields);
    }
  }
}

