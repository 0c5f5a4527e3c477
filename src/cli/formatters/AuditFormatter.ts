import type { AuditEntry } from '../../domain/ports/AuditPort.js';

export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'text';
}

/** audit 紀錄的 CLI 輸出 */
export function formatAuditEntries(entries: AuditEntry[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(entries, null, 2);
  }
  if (entries.length === 0) return 'No tool calls recorded.';

  return entries
    .map((e) => [
      new Date(e.timestampMs).toISOString(),
      e.toolName.padEnd(22),
      e.outcome.padEnd(20),
      `${e.durationMs}ms`.padStart(8),
      `attempts=${e.attempts}`,
      e.retryable ? 'retryable' : '',
    ].join('  ').trimEnd())
    .join('\n');
}
