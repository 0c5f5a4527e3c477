import type { PortalCredentials } from '../entities/PortalCredentials.js';

/**
 * 瀏覽器引擎抽象介面
 *
 * 核心只下高階指令（開啟、導航、擷取、下載、關閉），不接觸 DOM。
 * 失敗只會以 BrowserTimeoutError / ResourceNotFoundError / BrowserDisconnectedError
 * 呈現；導航落在登入頁時拋出 SessionExpiredError。
 */

/** 擷取規格：table（每列一筆）、list（每項一筆）、fields（單筆具名欄位） */
export type ExtractionSpec =
  | { kind: 'table'; rowSelector: string; columns: Record<string, string> }
  | { kind: 'list'; itemSelector: string; fields?: Record<string, string> }
  | { kind: 'fields'; fields: Record<string, string> };

export interface ExtractedRecord {
  url: string;
  title: string;
  items: Array<Record<string, string>>;
}

export interface NavigationTarget {
  /** 相對於入口網站 baseUrl 的路徑 */
  path: string;
}

export interface PageSnapshot {
  url: string;
  title: string;
  /** 頁面可見文字（readPage 時才提供，已截斷） */
  text?: string;
}

export interface DownloadTarget {
  pagePath: string;
  trigger: string;
  /** 需要先選擇學期時提供 */
  semester?: { field: string; value: string };
  /** 下載暫存目錄 */
  destinationDir: string;
}

export interface DownloadResult {
  /** 暫存檔路徑（由 ArtifactDirectory 認領後改名） */
  localPath: string;
  sourceUrl: string;
  suggestedFilename: string;
}

export type StudentProfile = Record<string, string>;

export type LoginOutcome =
  | { status: 'accepted'; profile: StudentProfile }
  | { status: 'rejected'; reason: string }
  | { status: 'challenge'; challenge: 'captcha' | 'two-factor' };

export interface BrowserPort {
  open(): Promise<void>;
  isOpen(): boolean;
  navigate(target: NavigationTarget): Promise<PageSnapshot>;
  /** 讀取目前頁面的標題、網址與可見文字 */
  readPage(maxChars?: number): Promise<PageSnapshot>;
  extract(spec: ExtractionSpec): Promise<ExtractedRecord>;
  download(target: DownloadTarget): Promise<DownloadResult>;
  screenshot(filePath: string): Promise<string>;
  login(credentials: PortalCredentials): Promise<LoginOutcome>;
  /** 遠端登出（best-effort，由呼叫端決定是否忽略失敗） */
  logout(): Promise<void>;
  currentUrl(): string | undefined;
  close(): Promise<void>;
}
