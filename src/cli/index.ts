#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { registerMcpCommand } from './commands/mcp.js';
import { registerAuditCommand } from './commands/audit.js';
import { packageVersion } from '../shared/version.js';

const program = new Command();

program
  .name('portalmcp')
  .description('MCP server that automates a university student portal')
  .version(packageVersion());

registerMcpCommand(program);
registerAuditCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError && (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')) {
      process.exit(0);
    }
    process.stderr.write(`Error: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
    process.exit(1);
  }
}

void main();
