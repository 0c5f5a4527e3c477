import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import http from 'node:http';
import { errorCode } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * HTTP Transport（Streamable HTTP，stateless）
 *
 * POST /mcp：每個請求建立新的 server + transport，tool 呼叫仍經同一個 dispatcher 排隊。
 * GET /health：存活檢查與 session 狀態。
 */

const logger = new Logger('HttpTransport');

export interface HttpTransportOptions {
  host: string;
  port: number;
  /** 每個 MCP 請求各自的 server 實例 */
  createServer: () => McpServer;
  health: () => Record<string, unknown>;
}

export async function startHttpTransport(options: HttpTransportOptions): Promise<http.Server> {
  const httpServer = http.createServer((req, res) => {
    handle(req, res, options).catch((err: unknown) => {
      logger.error('HTTP request failed', { code: errorCode(err), path: req.url });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        }));
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      logger.info(`MCP HTTP server listening on http://${options.host}:${options.port}/mcp`);
      resolve(httpServer);
    });
  });
}

async function handle(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  options: HttpTransportOptions,
): Promise<void> {
  const url = new URL(req.url ?? '/', `http://${options.host}:${options.port}`);

  if (url.pathname === '/health' && req.method === 'GET') {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ status: 'ok', ...options.health() }));
    return;
  }

  if (url.pathname !== '/mcp') {
    res.writeHead(404);
    res.end('Not found');
    return;
  }

  if (req.method !== 'POST') {
    // stateless 模式不提供 SSE 串流與 session 刪除
    res.writeHead(405, { 'Content-Type': 'application/json', Allow: 'POST' });
    res.end(JSON.stringify({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    }));
    return;
  }

  const server = options.createServer();
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
      logger.warn('Failed to release MCP request resources', { code: errorCode(err) });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}
