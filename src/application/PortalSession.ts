import type { BrowserPort, StudentProfile } from '../domain/ports/BrowserPort.js';
import type { CredentialPort } from '../domain/ports/CredentialPort.js';
import type { ArtifactPort } from '../domain/ports/ArtifactPort.js';
import type { SessionSnapshot, SessionState } from '../domain/entities/Session.js';
import type { PortalCredentials } from '../domain/entities/PortalCredentials.js';
import {
  AuthenticationFailedError,
  IllegalTransitionError,
  LoginChallengeError,
  PortalError,
  SessionUnrecoverableError,
  errorCode,
  isTransient,
} from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

/** 合法轉移；logout 可從任何狀態回到 LoggedOut */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  LoggedOut: ['LoggingIn', 'LoggedOut'],
  LoggingIn: ['Active', 'LoggedOut', 'Degraded'],
  Active: ['Degraded', 'LoggedOut'],
  Degraded: ['LoggingIn', 'LoggedOut'],
};

/** 一般登入最多連續嘗試次數（第二次暫時性失敗即放棄） */
const MAX_LOGIN_ATTEMPTS = 2;

export interface LoginOptions {
  /** 已登入時仍強制重新登入 */
  force?: boolean;
  /** 覆蓋憑證；登入成功後才採用，保留到 logout 為止供重新登入使用 */
  credentials?: PortalCredentials;
}

export interface LoginResult {
  alreadyActive: boolean;
  profile?: StudentProfile;
}

export type RemoteLogoutStatus = 'done' | 'skipped' | 'failed';

/**
 * Portal session 狀態機
 *
 * LoggedOut → LoggingIn → Active → (session 失效) Degraded → LoggingIn / LoggedOut。
 * 所有轉移都在 TaskDispatcher 的獨占執行槽內發生，因此同一時間只有一個轉移在進行；
 * 本類別不自行加鎖。
 */
export class PortalSession {
  private state: SessionState = 'LoggedOut';
  private lastActivityAt?: number;
  private consecutiveFailureCount = 0;
  private profile?: StudentProfile;
  private credentialOverride?: PortalCredentials;
  /** login tool 傳入、尚未被 portal 接受的憑證 */
  private candidateCredentials?: PortalCredentials;
  private readonly logger = new Logger('PortalSession');

  constructor(
    private readonly browser: BrowserPort,
    private readonly credentials: CredentialPort,
    private readonly artifacts: ArtifactPort,
    private readonly now: () => number = Date.now,
  ) {}

  get current(): SessionState {
    return this.state;
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.state,
      lastActivityAt: this.lastActivityAt,
      consecutiveFailureCount: this.consecutiveFailureCount,
      profile: this.profile ? { ...this.profile } : undefined,
      currentUrl: this.browser.isOpen() ? this.browser.currentUrl() : undefined,
    };
  }

  /**
   * 確保狀態為 Active，必要時登入
   *
   * - 帳密被拒或出現 CAPTCHA / 2FA：回到 LoggedOut，立即拋出（不重試）
   * - 暫時性失敗：進入 Degraded 並再試一次；連續第二次失敗則回到 LoggedOut，
   *   拋出 SessionUnrecoverableError
   */
  async ensureActive(): Promise<void> {
    if (this.state === 'Active') return;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.attemptLogin();
        return;
      } catch (err) {
        if (this.state !== 'Degraded') throw err;
        if (attempt >= MAX_LOGIN_ATTEMPTS) {
          throw this.giveUp('Login failed twice in a row', err);
        }
        this.logger.warn('Login attempt failed, retrying', { attempt, code: errorCode(err) });
      }
    }
  }

  /**
   * 操作中偵測到 session 失效後的唯一一次重新登入
   * 需先呼叫 markDegraded()。
   */
  async relogin(): Promise<void> {
    if (this.state !== 'Degraded') {
      throw new IllegalTransitionError(this.state, 'LoggingIn');
    }
    try {
      await this.attemptLogin();
    } catch (err) {
      if (err instanceof AuthenticationFailedError || err instanceof LoginChallengeError) throw err;
      throw this.giveUp('Re-login after session expiry failed', err);
    }
  }

  /** login tool 的進入點 */
  async login(options: LoginOptions = {}): Promise<LoginResult> {
    if (this.state === 'Active' && !options.force) {
      return { alreadyActive: true, profile: this.profile };
    }
    if (this.state === 'Active' || this.state === 'Degraded') {
      // 強制重新登入：先丟棄本地 session，瀏覽器保留
      this.profile = undefined;
      this.transition('LoggedOut');
    }
    this.candidateCredentials = options.credentials;
    try {
      await this.ensureActive();
    } finally {
      this.candidateCredentials = undefined;
    }
    return { alreadyActive: false, profile: this.profile };
  }

  /** 操作偵測到 session 已被遠端作廢（probe_failed） */
  markDegraded(): void {
    if (this.state !== 'Active') {
      this.logger.debug('markDegraded ignored', { state: this.state });
      return;
    }
    this.transition('Degraded');
  }

  /** 重新登入後 session 仍立即失效：放棄並回到 LoggedOut */
  abandon(reason: string, cause: unknown): SessionUnrecoverableError {
    return this.giveUp(reason, cause);
  }

  /**
   * 明確登出：遠端登出為 best-effort，本地狀態一律清除
   * 可重複呼叫，結果恆為 LoggedOut。
   */
  async logout(): Promise<RemoteLogoutStatus> {
    let remote: RemoteLogoutStatus = 'skipped';
    if ((this.state === 'Active' || this.state === 'Degraded') && this.browser.isOpen()) {
      try {
        await this.browser.logout();
        remote = 'done';
      } catch (err) {
        remote = 'failed';
        this.logger.warn('Remote logout failed; clearing local session anyway', { code: errorCode(err) });
      }
    }
    await this.teardown();
    return remote;
  }

  /** 程序結束時的清理（不做遠端登出） */
  async shutdown(): Promise<void> {
    await this.teardown();
  }

  /** Dispatcher 每次完成 portal 操作後更新 */
  recordOutcome(success: boolean): void {
    this.lastActivityAt = this.now();
    this.consecutiveFailureCount = success ? 0 : this.consecutiveFailureCount + 1;
  }

  private async attemptLogin(): Promise<void> {
    let creds: PortalCredentials;
    try {
      creds = this.candidateCredentials ?? this.credentialOverride ?? this.credentials.resolve();
    } catch (err) {
      if (this.state === 'Degraded') this.transition('LoggedOut');
      throw err;
    }

    this.transition('LoggingIn');
    try {
      if (!this.browser.isOpen()) {
        await this.browser.open();
      }
      const outcome = await this.browser.login(creds);

      switch (outcome.status) {
        case 'accepted':
          if (this.candidateCredentials) this.credentialOverride = this.candidateCredentials;
          this.profile = outcome.profile;
          this.transition('Active');
          this.logger.info('Portal session active');
          return;
        case 'rejected':
          // 被拒的覆蓋憑證不再沿用，之後回到設定檔帳密
          this.credentialOverride = undefined;
          this.transition('LoggedOut');
          throw new AuthenticationFailedError(outcome.reason || 'Portal rejected the configured credentials');
        case 'challenge':
          this.credentialOverride = undefined;
          this.transition('LoggedOut');
          throw new LoginChallengeError(outcome.challenge);
      }
    } catch (err) {
      if (this.state !== 'LoggingIn') throw err;
      if (isTransient(err)) {
        this.transition('Degraded');
      } else {
        this.transition('LoggedOut');
      }
      throw err;
    }
  }

  private giveUp(reason: string, cause: unknown): SessionUnrecoverableError {
    this.profile = undefined;
    if (this.state !== 'LoggedOut') this.transition('LoggedOut');
    const detail = cause instanceof PortalError ? `: ${cause.message}` : '';
    return new SessionUnrecoverableError(`${reason}${detail}`, { cause });
  }

  private async teardown(): Promise<void> {
    if (this.browser.isOpen()) {
      try {
        await this.browser.close();
      } catch (err) {
        this.logger.warn('Browser close failed', { code: errorCode(err) });
      }
    }
    try {
      await this.artifacts.purgeTemp();
    } catch (err) {
      this.logger.warn('Temp download purge failed', { code: errorCode(err) });
    }
    this.profile = undefined;
    this.credentialOverride = undefined;
    this.transition('LoggedOut');
  }

  private transition(to: SessionState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.state = to;
    if (from !== to) {
      this.logger.debug('Session transition', { from, to });
    }
  }
}

