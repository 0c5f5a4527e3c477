import type { LogLevel } from '../shared/Logger.js';
import type { ExtractionSpec } from '../domain/ports/BrowserPort.js';

/** 入口頁面中的登入表單 selectors */
export interface LoginSelectors {
  username: string;
  password: string;
  submit: string;
  /** 登入失敗訊息容器 */
  error: string;
  captcha: string;
  twoFactor: string;
  /** 個人資料欄位（登入成功後擷取） */
  profile: Record<string, string>;
}

/** 入口網站的一個區塊（成績、課表、公告…） */
export interface SectionConfig {
  title: string;
  /** 相對於 baseUrl 的路徑 */
  path: string;
  aliases: string[];
  extract: ExtractionSpec;
}

/** 可下載的文件 */
export interface DocumentConfig {
  title: string;
  /** 產生文件的頁面 */
  path: string;
  /** 觸發下載的元素；{format} 與 {semester} 會被替換 */
  trigger: string;
  /** 學期選擇欄位（可選） */
  semesterField?: string;
  formats: Array<'pdf' | 'html'>;
}

export interface PortalConfig {
  baseUrl: string;
  loginPath: string;
  logoutPath: string;
  /** 目前網址符合任一片段即視為被導回登入頁（session 已失效） */
  loginUrlMarkers: string[];
  /** 登入成功後網址需包含的片段 */
  homeUrlMarker: string;
  login: LoginSelectors;
  sections: Record<string, SectionConfig>;
  documents: Record<string, DocumentConfig>;
}

export interface BrowserConfig {
  headless: boolean;
  executablePath?: string;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  downloadTimeoutMs: number;
  viewport: { width: number; height: number };
}

/** Dispatcher 的逾時與重試設定 */
export interface DispatcherConfig {
  /** 單一請求總預算（排隊 + 執行） */
  requestTimeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
}

export interface StorageConfig {
  downloadDir: string;
  screenshotDir: string;
  auditDbPath: string;
}

/** LLM planner 設定 */
export interface LLMConfig {
  /** 'openai-compatible' 或 'none'（停用 custom task） */
  provider: 'openai-compatible' | 'none';
  baseUrl: string;
  model: string;
  defaultMaxSteps: number;
  timeoutMs: number;
}

export interface ServerConfig {
  transport: 'stdio' | 'http';
  host: string;
  port: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface PortalMcpConfig {
  version: number;
  portal: PortalConfig;
  browser: BrowserConfig;
  dispatcher: DispatcherConfig;
  storage: StorageConfig;
  llm: LLMConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof PortalMcpConfig]?: Partial<PortalMcpConfig[K]>;
};
