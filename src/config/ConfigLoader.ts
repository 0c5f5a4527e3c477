import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { PortalMcpConfig, PartialConfig } from './types.js';

export type { PortalMcpConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.portalmcp.json';

const positiveInt = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a positive integer` })
    .int(`${name} must be a positive integer`)
    .positive(`${name} must be a positive integer`);

const selectorMap = z.record(z.string().min(1));

const extractionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('table'), rowSelector: z.string().min(1), columns: selectorMap }),
  z.object({ kind: z.literal('list'), itemSelector: z.string().min(1), fields: selectorMap.optional() }),
  z.object({ kind: z.literal('fields'), fields: selectorMap }),
]);

const configSchema: z.ZodType<PortalMcpConfig> = z.object({
  version: z.number(),
  portal: z.object({
    baseUrl: z.string().regex(/^https?:\/\//, 'portal.baseUrl must be an http(s) URL'),
    loginPath: z.string(),
    logoutPath: z.string(),
    loginUrlMarkers: z.array(z.string().min(1)),
    homeUrlMarker: z.string(),
    login: z.object({
      username: z.string(),
      password: z.string(),
      submit: z.string(),
      error: z.string(),
      captcha: z.string(),
      twoFactor: z.string(),
      profile: selectorMap,
    }),
    sections: z.record(z.object({
      title: z.string(),
      path: z.string(),
      aliases: z.array(z.string()),
      extract: extractionSchema,
    })).refine((s) => Object.keys(s).length > 0, 'portal.sections must not be empty'),
    documents: z.record(z.object({
      title: z.string(),
      path: z.string(),
      trigger: z.string(),
      semesterField: z.string().optional(),
      formats: z.array(z.enum(['pdf', 'html'])).min(1),
    })).refine((d) => Object.keys(d).length > 0, 'portal.documents must not be empty'),
  }),
  browser: z.object({
    headless: z.boolean(),
    executablePath: z.string().optional(),
    navigationTimeoutMs: positiveInt('navigationTimeoutMs'),
    actionTimeoutMs: positiveInt('actionTimeoutMs'),
    downloadTimeoutMs: positiveInt('downloadTimeoutMs'),
    viewport: z.object({ width: positiveInt('viewport.width'), height: positiveInt('viewport.height') }),
  }),
  dispatcher: z.object({
    requestTimeoutMs: positiveInt('requestTimeoutMs'),
    maxRetries: z.number().int().min(0, 'maxRetries must be a non-negative integer'),
    baseDelayMs: z.number().min(0, 'baseDelayMs must not be negative'),
  }),
  storage: z.object({
    downloadDir: z.string().min(1),
    screenshotDir: z.string().min(1),
    auditDbPath: z.string().min(1),
  }),
  llm: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string(),
    model: z.string(),
    defaultMaxSteps: positiveInt('defaultMaxSteps'),
    timeoutMs: positiveInt('llm.timeoutMs'),
  }),
  server: z.object({
    transport: z.enum(['stdio', 'http']),
    host: z.string(),
    port: z.number().int().min(1, 'port must be between 1 and 65535').max(65535, 'port must be between 1 and 65535'),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base（陣列整個取代） */
function deepMerge(base: unknown, partial: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(partial)) {
    return partial === undefined ? base : partial;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    result[key] = isPlainObject(val) && isPlainObject(result[key])
      ? deepMerge(result[key], val)
      : val;
  }
  return result;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * 環境變數轉為設定層
 * PORTAL_BASE_URL、DOWNLOAD_PATH、SCREENSHOT_PATH、CHROME_BIN、BROWSER_HEADLESS、
 * MCP_TRANSPORT、MCP_PORT、LOG_LEVEL、OPENAI_BASE_URL、PORTAL_LLM_MODEL、REQUEST_TIMEOUT_MS
 */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  const layer: Record<string, Record<string, unknown>> = {
    portal: {}, browser: {}, dispatcher: {}, storage: {}, llm: {}, server: {}, logging: {},
  };

  if (env.PORTAL_BASE_URL) layer.portal.baseUrl = env.PORTAL_BASE_URL;
  if (env.DOWNLOAD_PATH) layer.storage.downloadDir = env.DOWNLOAD_PATH;
  if (env.SCREENSHOT_PATH) layer.storage.screenshotDir = env.SCREENSHOT_PATH;
  if (env.CHROME_BIN) layer.browser.executablePath = env.CHROME_BIN;
  if (env.BROWSER_HEADLESS) layer.browser.headless = env.BROWSER_HEADLESS !== 'false';
  if (env.MCP_TRANSPORT) layer.server.transport = env.MCP_TRANSPORT;
  layer.server.port = parseNumber(env.MCP_PORT);
  if (env.LOG_LEVEL) layer.logging.level = env.LOG_LEVEL.toLowerCase();
  if (env.OPENAI_BASE_URL) layer.llm.baseUrl = env.OPENAI_BASE_URL;
  if (env.PORTAL_LLM_MODEL) layer.llm.model = env.PORTAL_LLM_MODEL;
  // 提供 API key 即啟用 planner
  if (env.PORTAL_LLM_API_KEY || env.OPENAI_API_KEY) layer.llm.provider = 'openai-compatible';
  layer.dispatcher.requestTimeoutMs = parseNumber(env.REQUEST_TIMEOUT_MS);

  return layer;
}

/**
 * 載入設定：讀取 .portalmcp.json（若存在）並合併到預設值上
 * @param configDir - 設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數（優先於所有層級）
 */
export function loadConfig(
  configDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): PortalMcpConfig {
  let fileConfig: unknown = {};

  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    try {
      fileConfig = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // 合併順序：defaults < file config < overrides < env
  let merged = deepMerge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, overrides);
  }
  merged = deepMerge(merged, envOverrides(env));

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration (${details})`);
  }
  return parsed.data;
}
