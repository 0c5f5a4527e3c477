import path from 'node:path';
import type { PortalMcpConfig } from '../config/types.js';
import type { BrowserPort } from '../domain/ports/BrowserPort.js';
import type { PlannerPort } from '../domain/ports/PlannerPort.js';
import type { AuditPort } from '../domain/ports/AuditPort.js';
import type { CredentialPort } from '../domain/ports/CredentialPort.js';
import type { ArtifactPort } from '../domain/ports/ArtifactPort.js';
import { PortalSession } from '../application/PortalSession.js';
import { TaskDispatcher } from '../application/TaskDispatcher.js';
import { ToolRegistry } from '../application/ToolRegistry.js';
import { PORTAL_TOOLS } from '../application/tools/index.js';
import { EnvCredentialStore } from '../infrastructure/credentials/EnvCredentialStore.js';
import { PlaywrightBrowserAdapter } from '../infrastructure/browser/PlaywrightBrowserAdapter.js';
import { HttpPlannerAdapter } from '../infrastructure/llm/HttpPlannerAdapter.js';
import { NullPlannerAdapter } from '../infrastructure/llm/NullPlannerAdapter.js';
import { ArtifactDirectory } from '../infrastructure/artifacts/ArtifactDirectory.js';
import { SqliteAuditLog } from '../infrastructure/audit/SqliteAuditLog.js';
import { createMcpServer, SERVER_NAME } from './McpServer.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorCode } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

/** 測試或嵌入時可替換的 adapter */
export interface RuntimeOverrides {
  browser?: BrowserPort;
  planner?: PlannerPort;
  audit?: AuditPort;
  credentials?: CredentialPort;
  artifacts?: ArtifactPort;
}

export interface PortalRuntime {
  readonly registry: ToolRegistry;
  readonly session: PortalSession;
  readonly dispatcher: TaskDispatcher;
  readonly audit: AuditPort;
  createServer(): McpServer;
  health(): Record<string, unknown>;
  /** 等待執行中的呼叫結束後關閉瀏覽器、清除暫存下載、關閉 audit DB */
  shutdown(): Promise<void>;
}

/**
 * 組裝整個 server：config → adapters → session / dispatcher → MCP server factory
 * @param baseDir - 相對路徑（下載、截圖、audit DB）的基準目錄
 */
export function createPortalRuntime(
  config: PortalMcpConfig,
  baseDir: string,
  version: string,
  overrides: RuntimeOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): PortalRuntime {
  const logger = new Logger('PortalRuntime');
  const credentials = overrides.credentials ?? new EnvCredentialStore(env);
  const browser = overrides.browser ?? new PlaywrightBrowserAdapter(config.portal, config.browser);
  const artifacts = overrides.artifacts ?? new ArtifactDirectory(
    path.resolve(baseDir, config.storage.downloadDir),
    path.resolve(baseDir, config.storage.screenshotDir),
  );
  const audit = overrides.audit ?? new SqliteAuditLog(path.resolve(baseDir, config.storage.auditDbPath));
  const planner = overrides.planner ?? createPlanner(config, credentials);

  const registry = new ToolRegistry(PORTAL_TOOLS);
  const session = new PortalSession(browser, credentials, artifacts);
  const dispatcher = new TaskDispatcher({
    registry,
    session,
    browser,
    planner,
    artifacts,
    audit,
    portal: config.portal,
    dispatcher: config.dispatcher,
    defaultMaxSteps: config.llm.defaultMaxSteps,
  });

  let stopped = false;

  return {
    registry,
    session,
    dispatcher,
    audit,
    createServer: () => createMcpServer({ dispatcher, registry, portalBaseUrl: config.portal.baseUrl, version }),
    health: () => ({ name: SERVER_NAME, version, session: session.current, pending: dispatcher.pending }),
    async shutdown() {
      if (stopped) return;
      stopped = true;
      try {
        // 在執行槽內關閉，避免與進行中的 operation 搶 session 狀態；最多等一個請求的預算
        const graceMs = config.dispatcher.requestTimeoutMs;
        const drained = await dispatcher.runExclusive(() => session.shutdown(), graceMs);
        if (!drained) {
          logger.warn('Tool calls still running at shutdown; closing the browser anyway', {
            pending: dispatcher.pending,
            graceMs,
          });
          await session.shutdown();
        }
      } catch (err) {
        logger.warn('Session shutdown failed', { code: errorCode(err) });
      }
      audit.close();
      logger.info('Portal runtime stopped');
    },
  };
}

function createPlanner(config: PortalMcpConfig, credentials: CredentialPort): PlannerPort {
  if (config.llm.provider === 'openai-compatible') {
    return new HttpPlannerAdapter({
      baseUrl: config.llm.baseUrl,
      apiKey: credentials.apiKey(),
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });
  }
  return new NullPlannerAdapter();
}
