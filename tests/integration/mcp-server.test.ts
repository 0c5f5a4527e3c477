import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createPortalRuntime, type PortalRuntime } from '../../src/mcp/runtime.js';
import { toCallToolResponse } from '../../src/mcp/McpServer.js';
import { NullPlannerAdapter } from '../../src/infrastructure/llm/NullPlannerAdapter.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import type { PortalMcpConfig } from '../../src/config/types.js';
import {
  FAST_DISPATCH,
  FakeArtifacts,
  FakeBrowser,
  MemoryAudit,
  StaticCredentials,
  TEST_PORTAL,
} from '../helpers/fakes.js';

const CONFIG: PortalMcpConfig = { ...DEFAULT_CONFIG, portal: TEST_PORTAL, dispatcher: FAST_DISPATCH };

function parseResult(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  return { text: first?.type === 'text' ? first.text : '', isError: parsed.isError === true };
}

/**
 * Feature: MCP Server 整合
 *
 * 作為 LLM client，我需要透過 MCP 工具操作學生入口網站，
 * 並以固定格式收到成功文字或失敗分類。
 */
describe('MCP Server', () => {
  let browser: FakeBrowser;
  let audit: MemoryAudit;
  let runtime: PortalRuntime;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    browser = new FakeBrowser();
    audit = new MemoryAudit();
    runtime = createPortalRuntime(CONFIG, '/tmp/portal-test', '0.1.0', {
      browser,
      audit,
      artifacts: new FakeArtifacts(),
      credentials: new StaticCredentials(),
      planner: new NullPlannerAdapter(),
    }, {});

    server = runtime.createServer();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await runtime.shutdown();
  });

  /**
   * Scenario: 列出工具
   * When client 呼叫 tools/list
   * Then 回傳 8 個固定工具
   */
  it('lists the portal tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      'portal_login',
      'portal_logout',
      'portal_status',
      'portal_navigate_and_extract',
      'portal_download_document',
      'portal_get_notifications',
      'portal_get_class_schedule',
      'portal_custom_task',
    ]);
    expect(client.getInstructions()).toContain('portal-mcp: automates the student portal at https://portal.test');
  });

  it('reports status without opening the browser', async () => {
    const result = parseResult(await client.callTool({ name: 'portal_status', arguments: {} }));

    expect(result).toEqual({
      text: 'State: LoggedOut\nLast activity: never\nConsecutive failures: 0',
      isError: false,
    });
    expect(browser.open).not.toHaveBeenCalled();
  });

  it('logs in and returns the profile', async () => {
    const result = parseResult(await client.callTool({ name: 'portal_login', arguments: {} }));

    expect(result.text).toBe('Logged in successfully.\n\nname: Ana Souza\nregistration: 2020000001');
    expect(runtime.session.current).toBe('Active');
  });

  /**
   * Scenario: 帳密錯誤
   * Given 入口網站拒絕帳密
   * When 呼叫 portal_login
   * Then 回傳 isError 與 AuthenticationFailed
   */
  it('returns failures as JSON with isError', async () => {
    browser.loginImpl = async () => ({ status: 'rejected', reason: 'Usuário e/ou senha inválidos' });

    const result = parseResult(await client.callTool({ name: 'portal_login', arguments: {} }));

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      kind: 'AuthenticationFailed',
      message: 'Usuário e/ou senha inválidos',
      retryable: false,
    });
    expect(audit.entries).toEqual([expect.objectContaining({ toolName: 'login', outcome: 'AuthenticationFailed' })]);
  });

  it('logs in automatically for portal tools', async () => {
    const result = parseResult(await client.callTool({ name: 'portal_get_class_schedule', arguments: {} }));

    expect(result.text).toBe('No classes found in the schedule.');
    expect(browser.login).toHaveBeenCalledTimes(1);
  });

  /**
   * Scenario: 參數型別錯誤
   * When 以數字作為 documentType 呼叫 portal_download_document
   * Then 回傳 InvalidRequest 分類，而不是 protocol 錯誤
   */
  it('maps wrongly typed arguments to InvalidRequest', async () => {
    const result = parseResult(await client.callTool({ name: 'portal_download_document', arguments: { documentType: 5 } }));

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      kind: 'InvalidRequest',
      message: 'Invalid arguments for "download-document": documentType: Expected string, received number',
      retryable: false,
    });
    expect(browser.download).not.toHaveBeenCalled();
    expect(audit.entries).toEqual([expect.objectContaining({ toolName: 'download-document', outcome: 'InvalidRequest' })]);
  });

  it('keeps argument descriptions in the tool listing', async () => {
    const { tools } = await client.listTools();
    const download = tools.find((t) => t.name === 'portal_download_document');

    expect(download?.inputSchema.properties).toMatchObject({
      documentType: { description: 'Document key, e.g. "historico_academico"' },
      semester: { description: 'Academic period, for documents that take one' },
    });
  });

  it('rejects custom tasks when no LLM provider is configured', async () => {
    const result = parseResult(await client.callTool({ name: 'portal_custom_task', arguments: { task: 'find my grades' } }));

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toMatchObject({ kind: 'InvalidRequest', retryable: false });
  });

  /**
   * Scenario: 關閉時仍有呼叫在執行
   * Given portal_get_class_schedule 正在等待頁面
   * When runtime 開始關閉
   * Then 先讓該呼叫正常完成，之後才關閉瀏覽器
   */
  it('lets an in-flight call finish before closing the browser', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    browser.navigateImpl = async (target) => {
      await gate;
      return { url: `https://portal.test${target.path}`, title: 'Horário' };
    };

    const call = client.callTool({ name: 'portal_get_class_schedule', arguments: {} });
    await vi.waitFor(() => expect(browser.navigate).toHaveBeenCalledTimes(1));
    const stopping = runtime.shutdown();
    expect(browser.close).not.toHaveBeenCalled();

    release();
    const result = parseResult(await call);
    await stopping;

    expect(result).toEqual({ text: 'No classes found in the schedule.', isError: false });
    expect(audit.entries).toEqual([expect.objectContaining({ toolName: 'get-class-schedule', outcome: 'Success' })]);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(runtime.session.current).toBe('LoggedOut');
  });

  it('exposes health and shuts down once', async () => {
    await client.callTool({ name: 'portal_login', arguments: {} });

    expect(runtime.health()).toEqual({ name: 'portal-mcp', version: '0.1.0', session: 'Active', pending: 0 });

    await runtime.shutdown();
    await runtime.shutdown();

    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(audit.closed).toBe(true);
    expect(runtime.session.current).toBe('LoggedOut');
  });
});

describe('toCallToolResponse', () => {
  it('maps success to text content', () => {
    expect(toCallToolResponse({ ok: true, payload: { data: {}, text: 'Logged out.' } })).toEqual({
      content: [{ type: 'text', text: 'Logged out.' }],
    });
  });

  it('maps failure to an error payload', () => {
    expect(toCallToolResponse({ ok: false, kind: 'Timeout', message: 'late', retryable: true })).toEqual({
      content: [{ type: 'text', text: '{"kind":"Timeout","message":"late","retryable":true}' }],
      isError: true,
    });
  });
});
