import { vi } from 'vitest';
import type {
  BrowserPort,
  DownloadResult,
  DownloadTarget,
  ExtractedRecord,
  ExtractionSpec,
  LoginOutcome,
  NavigationTarget,
  PageSnapshot,
} from '../../src/domain/ports/BrowserPort.js';
import type { ArtifactMetadata, ArtifactPort } from '../../src/domain/ports/ArtifactPort.js';
import type { AuditEntry, AuditPort } from '../../src/domain/ports/AuditPort.js';
import type { CredentialPort } from '../../src/domain/ports/CredentialPort.js';
import type {
  PlanOptions,
  PlannerContext,
  PlannerPort,
  PlannerToolbox,
  PlanResult,
} from '../../src/domain/ports/PlannerPort.js';
import type { DownloadedArtifact } from '../../src/domain/entities/DownloadedArtifact.js';
import { PortalCredentials } from '../../src/domain/entities/PortalCredentials.js';
import { CredentialsMissingError } from '../../src/domain/errors/DomainErrors.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import type { DispatcherConfig, PortalConfig } from '../../src/config/types.js';

export const TEST_BASE_URL = 'https://portal.test';

export const TEST_PORTAL: PortalConfig = { ...DEFAULT_CONFIG.portal, baseUrl: TEST_BASE_URL };

/** 測試用：極短退避，預算足夠 */
export const FAST_DISPATCH: DispatcherConfig = { requestTimeoutMs: 2000, maxRetries: 2, baseDelayMs: 1 };

/**
 * 記憶體內的 BrowserPort
 * 預設行為：登入成功、導航回傳對應網址、擷取回傳空列表。
 * 各 *Impl 可在測試中替換。
 */
export class FakeBrowser implements BrowserPort {
  opened = false;
  url: string | undefined;

  loginImpl: (credentials: PortalCredentials) => Promise<LoginOutcome> = async () => ({
    status: 'accepted',
    profile: { name: 'Ana Souza', registration: '2020000001' },
  });
  navigateImpl: (target: NavigationTarget) => Promise<PageSnapshot> = async (target) => ({
    url: `${TEST_BASE_URL}${target.path}`,
    title: 'Portal page',
  });
  extractImpl: (spec: ExtractionSpec) => Promise<ExtractedRecord> = async () => ({
    url: this.url ?? TEST_BASE_URL,
    title: 'Portal page',
    items: [],
  });
  downloadImpl: (target: DownloadTarget) => Promise<DownloadResult> = async (target) => ({
    localPath: `${target.destinationDir}/file.partial`,
    sourceUrl: `${TEST_BASE_URL}/doc`,
    suggestedFilename: 'doc.pdf',
  });
  logoutImpl: () => Promise<void> = async () => {};

  readonly open = vi.fn(async () => {
    this.opened = true;
  });
  readonly login = vi.fn(async (credentials: PortalCredentials) => this.loginImpl(credentials));
  readonly navigate = vi.fn(async (target: NavigationTarget) => {
    const page = await this.navigateImpl(target);
    this.url = page.url;
    return page;
  });
  readonly readPage = vi.fn(async (_maxChars?: number): Promise<PageSnapshot> => ({
    url: this.url ?? TEST_BASE_URL,
    title: 'Portal page',
    text: 'page text',
  }));
  readonly extract = vi.fn(async (spec: ExtractionSpec) => this.extractImpl(spec));
  readonly download = vi.fn(async (target: DownloadTarget) => this.downloadImpl(target));
  readonly screenshot = vi.fn(async (filePath: string) => filePath);
  readonly logout = vi.fn(async () => this.logoutImpl());
  readonly close = vi.fn(async () => {
    this.opened = false;
  });

  isOpen(): boolean {
    return this.opened;
  }

  currentUrl(): string | undefined {
    return this.url;
  }
}

export class FakeArtifacts implements ArtifactPort {
  readonly tempDir = '/tmp/portal-test/.incoming';
  claimImpl: (tempPath: string, meta: ArtifactMetadata) => Promise<DownloadedArtifact> = async (_tempPath, meta) => ({
    localPath: `/tmp/portal-test/${meta.documentType}.${meta.format}`,
    sourceUrl: meta.sourceUrl,
    sizeBytes: 2048,
    createdAt: 1700000000000,
  });

  readonly claim = vi.fn(async (tempPath: string, meta: ArtifactMetadata) => this.claimImpl(tempPath, meta));
  readonly discard = vi.fn(async (_filePath: string) => {});
  readonly screenshotPath = vi.fn(async (prefix: string) => `/tmp/portal-test/${prefix}.png`);
  readonly purgeTemp = vi.fn(async () => {});
}

export class MemoryAudit implements AuditPort {
  readonly entries: AuditEntry[] = [];
  closed = false;

  record(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  recent(limit: number): AuditEntry[] {
    return [...this.entries].reverse().slice(0, limit);
  }

  close(): void {
    this.closed = true;
  }
}

export class StaticCredentials implements CredentialPort {
  constructor(
    private readonly username: string | undefined = 'student',
    private readonly password: string | undefined = 'test-secret',
  ) {}

  resolve(): PortalCredentials {
    if (!this.username || !this.password) throw new CredentialsMissingError();
    return new PortalCredentials(this.username, this.password);
  }

  apiKey(): string | undefined {
    return undefined;
  }
}

export class FakePlanner implements PlannerPort {
  readonly providerId = 'fake';
  readonly plan = vi.fn(async (
    _goal: string,
    _context: PlannerContext,
    _toolbox: PlannerToolbox,
    _options: PlanOptions,
  ): Promise<PlanResult> => ({
    completed: true,
    summary: 'Found it',
    data: { grade: '9.5' },
    steps: [{ action: 'extract_section', detail: 'grades' }],
  }));
}
