import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { AuditEntry, AuditOutcome, AuditPort } from '../../domain/ports/AuditPort.js';
import { errorCode } from '../../domain/errors/DomainErrors.js';
import { PRAGMA_SQL, SCHEMA_SQL } from './schema.js';
import { Logger } from '../../shared/Logger.js';

interface AuditRow {
  request_id: string;
  tool_name: string;
  outcome: string;
  retryable: number;
  attempts: number;
  duration_ms: number;
  timestamp_ms: number;
}

const OUTCOMES: ReadonlySet<string> = new Set<AuditOutcome>([
  'Success', 'InvalidRequest', 'AuthenticationFailed', 'SessionUnrecoverable',
  'Timeout', 'NotFound', 'Disconnected', 'Unknown',
]);

function isAuditOutcome(value: string): value is AuditOutcome {
  return OUTCOMES.has(value);
}

/**
 * SQLite 審計紀錄
 *
 * 只存請求中繼資料（tool、結果分類、耗時），不存參數或擷取內容。
 * 寫入失敗只記 log，不影響 tool 呼叫結果。
 */
export class SqliteAuditLog implements AuditPort {
  private readonly db: Database.Database;
  private readonly logger = new Logger('SqliteAuditLog');
  private readonly insert: Database.Statement<[string, string, string, number, number, number, number]>;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // PRAGMA 逐行執行
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }
    this.db.exec(SCHEMA_SQL);
    this.db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', '1')").run();

    this.insert = this.db.prepare(
      `INSERT INTO audit_log(request_id, tool_name, outcome, retryable, attempts, duration_ms, timestamp_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    this.logger.debug('Audit log opened', { dbPath });
  }

  record(entry: AuditEntry): void {
    try {
      this.insert.run(
        entry.requestId,
        entry.toolName,
        entry.outcome,
        entry.retryable ? 1 : 0,
        entry.attempts,
        Math.round(entry.durationMs),
        entry.timestampMs,
      );
    } catch (err) {
      this.logger.error('Failed to write audit entry', { requestId: entry.requestId, code: errorCode(err) });
    }
  }

  /** 最新的在前 */
  recent(limit: number): AuditEntry[] {
    const rows = this.db.prepare<[number], AuditRow>(
      `SELECT request_id, tool_name, outcome, retryable, attempts, duration_ms, timestamp_ms
       FROM audit_log ORDER BY timestamp_ms DESC, audit_id DESC LIMIT ?`,
    ).all(limit);

    return rows.map((row) => ({
      requestId: row.request_id,
      toolName: row.tool_name,
      outcome: isAuditOutcome(row.outcome) ? row.outcome : 'Unknown',
      retryable: row.retryable === 1,
      attempts: row.attempts,
      durationMs: row.duration_ms,
      timestampMs: row.timestamp_ms,
    }));
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
