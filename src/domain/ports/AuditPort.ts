import type { FailureKind } from '../errors/DomainErrors.js';

export type AuditOutcome = 'Success' | FailureKind;

/** 每個 tool 請求一筆；不含憑證或擷取內容 */
export interface AuditEntry {
  requestId: string;
  toolName: string;
  outcome: AuditOutcome;
  retryable: boolean;
  attempts: number;
  durationMs: number;
  timestampMs: number;
}

export interface AuditPort {
  record(entry: AuditEntry): void;
  recent(limit: number): AuditEntry[];
  close(): void;
}
