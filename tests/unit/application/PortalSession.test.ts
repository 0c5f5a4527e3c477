import { describe, it, expect, beforeEach } from 'vitest';
import { PortalSession } from '../../../src/application/PortalSession.js';
import { PortalCredentials } from '../../../src/domain/entities/PortalCredentials.js';
import {
  AuthenticationFailedError,
  BrowserDisconnectedError,
  BrowserTimeoutError,
  CredentialsMissingError,
  IllegalTransitionError,
  LoginChallengeError,
  SessionUnrecoverableError,
} from '../../../src/domain/errors/DomainErrors.js';
import { FakeArtifacts, FakeBrowser, StaticCredentials } from '../../helpers/fakes.js';

/**
 * Feature: Portal session 狀態機
 *
 * 作為 dispatcher，我需要一個單一、可預測的登入狀態，
 * 才能在 session 失效時恰好重新登入一次。
 */
describe('PortalSession', () => {
  let browser: FakeBrowser;
  let artifacts: FakeArtifacts;
  let session: PortalSession;
  let clock: number;

  beforeEach(() => {
    browser = new FakeBrowser();
    artifacts = new FakeArtifacts();
    clock = 1000;
    session = new PortalSession(browser, new StaticCredentials(), artifacts, () => clock);
  });

  it('starts logged out with an empty snapshot', () => {
    expect(session.current).toBe('LoggedOut');
    expect(session.snapshot()).toEqual({
      state: 'LoggedOut',
      lastActivityAt: undefined,
      consecutiveFailureCount: 0,
      profile: undefined,
      currentUrl: undefined,
    });
  });

  describe('Scenario: ensureActive', () => {
    it('opens the browser and logs in when logged out', async () => {
      await session.ensureActive();

      expect(session.current).toBe('Active');
      expect(browser.open).toHaveBeenCalledTimes(1);
      expect(browser.login).toHaveBeenCalledTimes(1);
      expect(session.snapshot().profile).toEqual({ name: 'Ana Souza', registration: '2020000001' });
    });

    it('is a no-op when already active', async () => {
      await session.ensureActive();
      await session.ensureActive();

      expect(browser.login).toHaveBeenCalledTimes(1);
    });

    it('rejected credentials → LoggedOut + AuthenticationFailed, not retried', async () => {
      browser.loginImpl = async () => ({ status: 'rejected', reason: 'Usuário e/ou senha inválidos' });

      await expect(session.ensureActive()).rejects.toThrow(AuthenticationFailedError);
      await expect(session.ensureActive()).rejects.toThrow('Usuário e/ou senha inválidos');
      expect(session.current).toBe('LoggedOut');
      expect(browser.login).toHaveBeenCalledTimes(2);
    });

    it('a CAPTCHA prompt surfaces as LoginChallengeError', async () => {
      browser.loginImpl = async () => ({ status: 'challenge', challenge: 'captcha' });

      const err = await session.ensureActive().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(LoginChallengeError);
      expect(err).toMatchObject({ kind: 'AuthenticationFailed', challenge: 'captcha' });
      expect(session.current).toBe('LoggedOut');
    });

    it('one transient failure goes through Degraded and the second attempt succeeds', async () => {
      let calls = 0;
      browser.loginImpl = async () => {
        calls++;
        if (calls === 1) throw new BrowserTimeoutError('slow login');
        return { status: 'accepted', profile: {} };
      };

      await session.ensureActive();

      expect(session.current).toBe('Active');
      expect(calls).toBe(2);
    });

    it('two consecutive transient failures → LoggedOut + SessionUnrecoverable', async () => {
      browser.loginImpl = async () => {
        throw new BrowserDisconnectedError('net::ERR_CONNECTION_RESET');
      };

      const err = await session.ensureActive().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SessionUnrecoverableError);
      expect(err).toMatchObject({ message: 'Login failed twice in a row: net::ERR_CONNECTION_RESET' });
      expect(session.current).toBe('LoggedOut');
      expect(browser.login).toHaveBeenCalledTimes(2);
    });

    it('missing credentials fail before the browser is opened', async () => {
      session = new PortalSession(browser, new StaticCredentials(undefined, undefined), artifacts);

      await expect(session.ensureActive()).rejects.toThrow(CredentialsMissingError);
      expect(browser.open).not.toHaveBeenCalled();
      expect(session.current).toBe('LoggedOut');
    });
  });

  describe('Scenario: session invalidated mid-operation', () => {
    it('markDegraded + relogin returns to Active', async () => {
      await session.ensureActive();
      session.markDegraded();
      expect(session.current).toBe('Degraded');

      await session.relogin();

      expect(session.current).toBe('Active');
      expect(browser.login).toHaveBeenCalledTimes(2);
    });

    it('a failed relogin gives up after a single attempt', async () => {
      await session.ensureActive();
      session.markDegraded();
      browser.loginImpl = async () => {
        throw new BrowserTimeoutError('timeout');
      };

      await expect(session.relogin()).rejects.toThrow(SessionUnrecoverableError);
      expect(session.current).toBe('LoggedOut');
      expect(browser.login).toHaveBeenCalledTimes(2);
    });

    it('relogin outside Degraded is an illegal transition', async () => {
      await expect(session.relogin()).rejects.toThrow(IllegalTransitionError);
    });

    it('markDegraded is ignored unless Active', () => {
      session.markDegraded();
      expect(session.current).toBe('LoggedOut');
    });
  });

  describe('Scenario: login tool', () => {
    it('reports already-active without touching the browser', async () => {
      await session.login();
      const result = await session.login();

      expect(result.alreadyActive).toBe(true);
      expect(browser.login).toHaveBeenCalledTimes(1);
    });

    it('force re-login performs a fresh login', async () => {
      await session.login();
      const result = await session.login({ force: true });

      expect(result.alreadyActive).toBe(false);
      expect(browser.login).toHaveBeenCalledTimes(2);
      expect(session.current).toBe('Active');
    });

    it('uses override credentials until logout', async () => {
      await session.login({ credentials: new PortalCredentials('other', 'test-secret-2') });
      expect(browser.login.mock.calls[0][0].username).toBe('other');

      await session.logout();
      await session.login();
      expect(browser.login.mock.calls[1][0].username).toBe('student');
    });

    it('drops rejected override credentials and falls back to the configured ones', async () => {
      // Given: portal 只接受設定檔中的帳號
      browser.loginImpl = async (credentials) =>
        credentials.username === 'student'
          ? { status: 'accepted', profile: { name: 'Ana Souza', registration: '2020000001' } }
          : { status: 'rejected', reason: 'Usuário e/ou senha inválidos' };

      // When: 以打錯的覆蓋帳密登入，之後 dispatcher 要求 session
      await expect(session.login({ credentials: new PortalCredentials('typo', 'test-secret-2') })).rejects.toBeInstanceOf(
        AuthenticationFailedError,
      );
      await session.ensureActive();

      // Then: 第二次登入使用設定檔帳密
      expect(browser.login.mock.calls.map(([creds]) => creds.username)).toEqual(['typo', 'student']);
      expect(session.current).toBe('Active');
    });

    it('drops an accepted override once the portal later rejects it', async () => {
      await session.login({ credentials: new PortalCredentials('other', 'test-secret-2') });
      browser.loginImpl = async (credentials) =>
        credentials.username === 'student'
          ? { status: 'accepted', profile: { name: 'Ana Souza', registration: '2020000001' } }
          : { status: 'rejected', reason: 'Senha expirada' };

      await expect(session.login({ force: true })).rejects.toBeInstanceOf(AuthenticationFailedError);
      await session.ensureActive();

      expect(browser.login.mock.calls.map(([creds]) => creds.username)).toEqual(['other', 'other', 'student']);
    });

    it('ignores override credentials while a session is already active', async () => {
      await session.login();
      const result = await session.login({ credentials: new PortalCredentials('other', 'test-secret-2') });

      expect(result.alreadyActive).toBe(true);
      await session.login({ force: true });
      expect(browser.login.mock.calls.map(([creds]) => creds.username)).toEqual(['student', 'student']);
    });
  });

  describe('Scenario: logout', () => {
    it('logs out remotely, closes the browser and purges temp downloads', async () => {
      await session.ensureActive();

      const remote = await session.logout();

      expect(remote).toBe('done');
      expect(browser.logout).toHaveBeenCalledTimes(1);
      expect(browser.close).toHaveBeenCalledTimes(1);
      expect(artifacts.purgeTemp).toHaveBeenCalledTimes(1);
      expect(session.current).toBe('LoggedOut');
      expect(session.snapshot().profile).toBeUndefined();
    });

    it('always ends LoggedOut even when the remote logout fails', async () => {
      await session.ensureActive();
      browser.logoutImpl = async () => {
        throw new BrowserDisconnectedError('gone');
      };

      await expect(session.logout()).resolves.toBe('failed');
      expect(session.current).toBe('LoggedOut');
    });

    it('is idempotent', async () => {
      await expect(session.logout()).resolves.toBe('skipped');
      await expect(session.logout()).resolves.toBe('skipped');
      expect(browser.logout).not.toHaveBeenCalled();
      expect(session.current).toBe('LoggedOut');
    });
  });

  it('recordOutcome tracks activity time and consecutive failures', () => {
    session.recordOutcome(false);
    clock = 2000;
    session.recordOutcome(false);
    expect(session.snapshot()).toMatchObject({ lastActivityAt: 2000, consecutiveFailureCount: 2 });

    session.recordOutcome(true);
    expect(session.snapshot().consecutiveFailureCount).toBe(0);
  });
});
