import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { CONFIG_FILE_NAME, envOverrides, loadConfig } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  const tempDirs: string[] = [];

  function configDir(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portalmcp-config-'));
    tempDirs.push(dir);
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), content);
    return dir;
  }

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path', undefined, {});
    expect(config.dispatcher).toEqual({ requestTimeoutMs: 180000, maxRetries: 2, baseDelayMs: 1000 });
    expect(config.llm.provider).toBe('none');
    expect(config.server.transport).toBe('stdio');
    expect(Object.keys(config.portal.sections)).toEqual(['grades', 'transcript', 'enrollment', 'schedule', 'notices']);
  });

  it('should merge partial config over defaults', () => {
    const config = loadConfig('/nonexistent/path', { dispatcher: { requestTimeoutMs: 60000 } }, {});
    expect(config.dispatcher.requestTimeoutMs).toBe(60000);
    // 其他欄位仍用 defaults
    expect(config.dispatcher.maxRetries).toBe(2);
  });

  it('should merge the config file and keep default sections', () => {
    const dir = configDir(JSON.stringify({
      portal: {
        baseUrl: 'https://sigaa.example.edu',
        sections: {
          library: {
            title: 'Biblioteca',
            path: '/sigaa/biblioteca.jsf',
            aliases: ['biblioteca'],
            extract: { kind: 'list', itemSelector: 'li.emprestimo' },
          },
        },
      },
    }));

    const config = loadConfig(dir, undefined, {});

    expect(config.portal.baseUrl).toBe('https://sigaa.example.edu');
    expect(config.portal.sections.library.aliases).toEqual(['biblioteca']);
    expect(config.portal.sections.grades.title).toBe('Consultar Notas');
  });

  it('should let environment variables win over the file', () => {
    const dir = configDir(JSON.stringify({ server: { transport: 'stdio', port: 7000 } }));

    const config = loadConfig(dir, undefined, {
      PORTAL_BASE_URL: 'https://portal.example.edu',
      MCP_TRANSPORT: 'http',
      MCP_PORT: '9000',
      LOG_LEVEL: 'DEBUG',
      BROWSER_HEADLESS: 'false',
      REQUEST_TIMEOUT_MS: '90000',
      PORTAL_LLM_API_KEY: 'test-secret',
    });

    expect(config.portal.baseUrl).toBe('https://portal.example.edu');
    expect(config.server).toMatchObject({ transport: 'http', port: 9000 });
    expect(config.logging.level).toBe('debug');
    expect(config.browser.headless).toBe(false);
    expect(config.dispatcher.requestTimeoutMs).toBe(90000);
    expect(config.llm.provider).toBe('openai-compatible');
  });

  it('should ignore non-numeric numeric variables', () => {
    expect(envOverrides({ MCP_PORT: 'abc' }).server.port).toBeUndefined();
    expect(loadConfig('/nonexistent', undefined, { MCP_PORT: 'abc' }).server.port).toBe(8000);
  });

  it('should reject an out-of-range port', () => {
    expect(() => loadConfig('/nonexistent', undefined, { MCP_PORT: '70000' }))
      .toThrow('Invalid configuration (server.port: port must be between 1 and 65535)');
  });

  it('should validate the portal URL', () => {
    expect(() => loadConfig('/nonexistent', { portal: { baseUrl: 'sigaa.example.edu' } }, {}))
      .toThrow('portal.baseUrl must be an http(s) URL');
  });

  it('should validate the request budget is a positive integer', () => {
    expect(() => loadConfig('/nonexistent', { dispatcher: { requestTimeoutMs: 0 } }, {}))
      .toThrow('requestTimeoutMs must be a positive integer');
  });

  it('should report unparseable files', () => {
    const dir = configDir('{ not json');
    expect(() => loadConfig(dir, undefined, {})).toThrow(`Cannot parse ${path.join(dir, CONFIG_FILE_NAME)}`);
  });
});
