import type { FailureKind } from '../../domain/errors/DomainErrors.js';

export interface ToolSuccess<T = unknown> {
  ok: true;
  payload: T;
}

export interface ToolFailure {
  ok: false;
  kind: FailureKind;
  message: string;
  retryable: boolean;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolFailure;
