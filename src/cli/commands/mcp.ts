import type { Command } from 'commander';
import path from 'node:path';
import type http from 'node:http';
import { config as loadDotenv } from 'dotenv';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createPortalRuntime } from '../../mcp/runtime.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { startHttpTransport } from '../../mcp/transports/HttpTransport.js';
import { errorCode } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { packageVersion } from '../../shared/version.js';

interface McpCommandOptions {
  configDir: string;
  http?: boolean;
  port?: string;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   portalmcp mcp [--config-dir .] [--http] [--port 8000]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start the MCP server (stdio by default)')
    .option('--config-dir <path>', 'Directory holding .portalmcp.json and .env', '.')
    .option('--http', 'Serve MCP over HTTP on /mcp instead of stdio')
    .option('--port <number>', 'HTTP port (overrides MCP_PORT)')
    .action(async (opts: McpCommandOptions) => {
      const configDir = path.resolve(opts.configDir);
      loadDotenv({ path: path.join(configDir, '.env') });

      const config = loadConfig(configDir);
      Logger.setDefaultLevel(config.logging.level);
      const logger = new Logger('mcp');

      const transport = opts.http ? 'http' : config.server.transport;
      const port = opts.port !== undefined ? parsePort(opts.port) : config.server.port;

      const runtime = createPortalRuntime(config, configDir, packageVersion());
      let httpServer: http.Server | undefined;

      // 優雅關閉：關閉瀏覽器、清除暫存下載、關閉 audit DB
      const shutdown = (reason: string) => {
        logger.info('Shutting down', { reason });
        httpServer?.close();
        runtime.shutdown().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Shutdown failed', { code: errorCode(err) });
            process.exit(1);
          },
        );
      };

      if (transport === 'http') {
        httpServer = await startHttpTransport({
          host: config.server.host,
          port,
          createServer: runtime.createServer,
          health: runtime.health,
        });
      } else {
        // stdio 模式：持續執行直到 stdin 關閉
        await startStdioTransport(runtime.createServer());
        process.stdin.once('close', () => shutdown('stdin closed'));
      }
      logger.info('Portal MCP server started', { transport, baseUrl: config.portal.baseUrl });

      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port "${value}": must be between 1 and 65535`);
  }
  return port;
}
