import type { Command } from 'commander';
import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { loadConfig } from '../../config/ConfigLoader.js';
import { SqliteAuditLog } from '../../infrastructure/audit/SqliteAuditLog.js';
import { formatAuditEntries, isOutputFormat } from '../formatters/AuditFormatter.js';

interface AuditCommandOptions {
  configDir: string;
  limit: string;
  format: string;
}

/** 註冊 audit 指令：列出最近的 tool 呼叫紀錄 */
export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('Show recent tool calls from the audit log')
    .option('--config-dir <path>', 'Directory holding .portalmcp.json and .env', '.')
    .option('--limit <number>', 'Number of entries to show', '20')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((opts: AuditCommandOptions) => {
      const limit = Number(opts.limit);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`Invalid limit "${opts.limit}": must be a positive integer`);
      }
      if (!isOutputFormat(opts.format)) {
        throw new Error(`Invalid format "${opts.format}": use json or text`);
      }

      const configDir = path.resolve(opts.configDir);
      loadDotenv({ path: path.join(configDir, '.env') });
      const config = loadConfig(configDir);

      const audit = new SqliteAuditLog(path.resolve(configDir, config.storage.auditDbPath));
      try {
        process.stdout.write(formatAuditEntries(audit.recent(limit), opts.format) + '\n');
      } finally {
        audit.close();
      }
    });
}
