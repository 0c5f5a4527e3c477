import type { ToolFailure, ToolSuccess } from './dto/ToolResult.js';
import { PortalError, type FailureKind } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

/** 呼叫端可自行重試的分類 */
const RETRYABLE_KINDS: ReadonlySet<FailureKind> = new Set(['Timeout', 'Disconnected']);

export interface FailureContext {
  requestId: string;
  toolName: string;
}

/**
 * 結果正規化
 *
 * 任何錯誤跨出 tool-call 邊界前都在這裡轉成 ToolFailure。
 * 未辨識的錯誤一律為 Unknown，細節（含 stack）只寫入 server log。
 */
export class ResultNormalizer {
  constructor(private readonly logger: Logger = new Logger('ResultNormalizer')) {}

  success<T>(payload: T): ToolSuccess<T> {
    return { ok: true, payload };
  }

  failure(err: unknown, context: FailureContext): ToolFailure {
    if (err instanceof PortalError && err.kind !== 'Unknown') {
      if (err.cause !== undefined) {
        this.logger.debug('Mapped failure cause', { ...context, code: err.code, cause: describe(err.cause) });
      }
      return {
        ok: false,
        kind: err.kind,
        message: err.message,
        retryable: RETRYABLE_KINDS.has(err.kind),
      };
    }

    this.logger.error('Unrecognized failure', {
      ...context,
      error: describe(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return {
      ok: false,
      kind: 'Unknown',
      message: `The portal automation failed unexpectedly (request ${context.requestId})`,
      retryable: false,
    };
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
