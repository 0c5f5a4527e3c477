import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  chromium,
  errors as playwrightErrors,
  type Browser,
  type BrowserContext,
  type Locator,
  type Page,
} from 'playwright-core';
import type {
  BrowserPort,
  DownloadResult,
  DownloadTarget,
  ExtractedRecord,
  ExtractionSpec,
  LoginOutcome,
  NavigationTarget,
  PageSnapshot,
  StudentProfile,
} from '../../domain/ports/BrowserPort.js';
import type { PortalCredentials } from '../../domain/entities/PortalCredentials.js';
import type { BrowserConfig, PortalConfig } from '../../config/types.js';
import {
  BrowserDisconnectedError,
  BrowserTimeoutError,
  PortalError,
  ResourceNotFoundError,
  SessionExpiredError,
} from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/** 代表瀏覽器或頁面已不存在的 Playwright 訊息片段 */
const DISCONNECT_PATTERNS = [
  /has been closed/i,
  /browser has disconnected/i,
  /target closed/i,
  /connection closed/i,
  /net::ERR_(INTERNET_DISCONNECTED|CONNECTION_(REFUSED|RESET|CLOSED)|NAME_NOT_RESOLVED|NETWORK_CHANGED)/,
];

const DEFAULT_READ_CHARS = 4000;

/**
 * Playwright（Chromium）實作的 BrowserPort
 *
 * 每個 session 一個 browser + context + page；所有 Playwright 錯誤在此轉成
 * domain 錯誤，呼叫端只會看到 Timeout / NotFound / Disconnected / SessionExpired。
 */
export class PlaywrightBrowserAdapter implements BrowserPort {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private readonly logger = new Logger('PlaywrightBrowser');

  constructor(
    private readonly portal: PortalConfig,
    private readonly config: BrowserConfig,
  ) {}

  async open(): Promise<void> {
    if (this.isOpen()) return;
    await this.close();

    await this.guard('open', async () => {
      const browser = await chromium.launch({
        headless: this.config.headless,
        executablePath: this.config.executablePath,
        args: ['--no-sandbox', '--disable-dev-shm-usage'],
      });
      browser.on('disconnected', () => {
        if (this.browser === browser) {
          this.logger.warn('Browser disconnected');
          this.browser = null;
          this.context = null;
          this.page = null;
        }
      });
      this.browser = browser;
      this.context = await browser.newContext({ viewport: this.config.viewport, acceptDownloads: true });
      this.page = await this.context.newPage();
      this.page.setDefaultTimeout(this.config.actionTimeoutMs);
      this.page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);
      this.logger.debug('Browser launched', { headless: this.config.headless });
    });
  }

  isOpen(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async navigate(target: NavigationTarget): Promise<PageSnapshot> {
    return this.guard('navigate', async () => {
      const page = this.requirePage();
      const response = await page.goto(this.urlFor(target.path), { waitUntil: 'domcontentloaded' });
      this.assertSessionAlive(page);
      if (response && response.status() === 404) {
        throw new ResourceNotFoundError(`Portal page not found: ${target.path}`);
      }
      return { url: page.url(), title: await page.title() };
    });
  }

  async readPage(maxChars = DEFAULT_READ_CHARS): Promise<PageSnapshot> {
    return this.guard('readPage', async () => {
      const page = this.requirePage();
      this.assertSessionAlive(page);
      const text = normalizeText(await page.locator('body').innerText());
      return {
        url: page.url(),
        title: await page.title(),
        text: text.length > maxChars ? `${text.slice(0, maxChars)}…` : text,
      };
    });
  }

  async extract(spec: ExtractionSpec): Promise<ExtractedRecord> {
    return this.guard('extract', async () => {
      const page = this.requirePage();
      this.assertSessionAlive(page);
      const items = await extractItems(page, spec);
      return { url: page.url(), title: await page.title(), items };
    });
  }

  async download(target: DownloadTarget): Promise<DownloadResult> {
    await this.navigate({ path: target.pagePath });

    return this.guard('download', async () => {
      const page = this.requirePage();

      if (target.semester) {
        const select = page.locator(target.semester.field).first();
        if ((await select.count()) === 0) {
          throw new ResourceNotFoundError('Semester selector not found on the document page');
        }
        await select.selectOption(target.semester.value);
      }

      const trigger = page.locator(target.trigger).first();
      if ((await trigger.count()) === 0) {
        throw new ResourceNotFoundError('Document link not found on the portal page');
      }

      await fs.mkdir(target.destinationDir, { recursive: true });
      const [download] = await Promise.all([
        page.waitForEvent('download', { timeout: this.config.downloadTimeoutMs }),
        trigger.click(),
      ]);

      const tempPath = path.join(target.destinationDir, `${randomUUID()}.partial`);
      try {
        await download.saveAs(tempPath);
        const failure = await download.failure();
        if (failure) {
          throw new BrowserDisconnectedError(`Download failed: ${failure}`);
        }
      } catch (err) {
        await fs.rm(tempPath, { force: true });
        throw err;
      }

      return { localPath: tempPath, sourceUrl: download.url(), suggestedFilename: download.suggestedFilename() };
    });
  }

  async screenshot(filePath: string): Promise<string> {
    return this.guard('screenshot', async () => {
      await this.requirePage().screenshot({ path: filePath, fullPage: true });
      return filePath;
    });
  }

  async login(credentials: PortalCredentials): Promise<LoginOutcome> {
    const { login } = this.portal;

    return this.guard('login', async () => {
      const page = this.requirePage();
      await page.goto(this.urlFor(this.portal.loginPath), { waitUntil: 'domcontentloaded' });

      if (await isPresent(page.locator(login.captcha))) {
        return { status: 'challenge', challenge: 'captcha' };
      }

      await page.locator(login.username).first().fill(credentials.username);
      await page.locator(login.password).first().fill(credentials.password);
      await page.locator(login.submit).first().click();
      await page.waitForLoadState('domcontentloaded');

      if (await isPresent(page.locator(login.twoFactor))) {
        return { status: 'challenge', challenge: 'two-factor' };
      }
      if (await isPresent(page.locator(login.captcha))) {
        return { status: 'challenge', challenge: 'captcha' };
      }

      const url = page.url();
      if (url.includes(this.portal.homeUrlMarker) && !this.isLoginUrl(url)) {
        return { status: 'accepted', profile: await this.readProfile(page) };
      }

      const errorBox = page.locator(login.error).first();
      const reason = (await errorBox.count()) > 0 ? normalizeText(await errorBox.innerText()) : '';
      return { status: 'rejected', reason: reason || 'Portal did not accept the credentials' };
    });
  }

  async logout(): Promise<void> {
    await this.guard('logout', async () => {
      await this.requirePage().goto(this.urlFor(this.portal.logoutPath), { waitUntil: 'domcontentloaded' });
    });
  }

  currentUrl(): string | undefined {
    return this.page?.url();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    this.page = null;
    if (browser) {
      await browser.close();
      this.logger.debug('Browser closed');
    }
  }

  private requirePage(): Page {
    if (!this.page || !this.isOpen()) {
      throw new BrowserDisconnectedError('Browser is not running');
    }
    return this.page;
  }

  private urlFor(portalPath: string): string {
    return new URL(portalPath, this.portal.baseUrl).toString();
  }

  private isLoginUrl(url: string): boolean {
    return this.portal.loginUrlMarkers.some((marker) => url.includes(marker));
  }

  /** 被導回登入頁即代表 session 已在遠端失效 */
  private assertSessionAlive(page: Page): void {
    if (this.isLoginUrl(page.url())) {
      throw new SessionExpiredError('Portal redirected to the login page');
    }
  }

  private async readProfile(page: Page): Promise<StudentProfile> {
    const profile: StudentProfile = {};
    for (const [field, selector] of Object.entries(this.portal.login.profile)) {
      const value = await textOf(page.locator(selector));
      if (value) profile[field] = value;
    }
    return profile;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw translateError(operation, err);
    }
  }
}

/** Playwright 錯誤 → domain 錯誤 */
export function translateError(operation: string, err: unknown): unknown {
  if (err instanceof PortalError) return err;
  if (err instanceof playwrightErrors.TimeoutError) {
    return new BrowserTimeoutError(`Browser ${operation} timed out`, { cause: err });
  }
  if (err instanceof Error && DISCONNECT_PATTERNS.some((p) => p.test(err.message))) {
    return new BrowserDisconnectedError(`Browser ${operation} failed: connection lost`, { cause: err });
  }
  return err;
}

async function extractItems(page: Page, spec: ExtractionSpec): Promise<Array<Record<string, string>>> {
  switch (spec.kind) {
    case 'table':
      return collect(page.locator(spec.rowSelector), spec.columns);
    case 'list':
      return spec.fields
        ? collect(page.locator(spec.itemSelector), spec.fields)
        : collectText(page.locator(spec.itemSelector));
    case 'fields': {
      const record: Record<string, string> = {};
      for (const [name, selector] of Object.entries(spec.fields)) {
        record[name] = await textOf(page.locator(selector));
      }
      return Object.values(record).some((v) => v !== '') ? [record] : [];
    }
  }
}

/** 每個容器元素一筆，空白列略過 */
async function collect(containers: Locator, fields: Record<string, string>): Promise<Array<Record<string, string>>> {
  const items: Array<Record<string, string>> = [];
  const count = await containers.count();
  for (let i = 0; i < count; i++) {
    const container = containers.nth(i);
    const record: Record<string, string> = {};
    for (const [name, selector] of Object.entries(fields)) {
      record[name] = await textOf(container.locator(selector));
    }
    if (Object.values(record).some((v) => v !== '')) items.push(record);
  }
  return items;
}

async function collectText(items: Locator): Promise<Array<Record<string, string>>> {
  const texts = await items.allInnerTexts();
  return texts.map(normalizeText).filter((t) => t !== '').map((text) => ({ text }));
}

async function textOf(locator: Locator): Promise<string> {
  const first = locator.first();
  return (await first.count()) > 0 ? normalizeText(await first.innerText()) : '';
}

async function isPresent(locator: Locator): Promise<boolean> {
  return (await locator.count()) > 0 && locator.first().isVisible();
}

function normalizeText(text: string): string {
  return text.replace(/[ \t ]+/g, ' ').replace(/\s*\n\s*/g, '\n').trim();
}
