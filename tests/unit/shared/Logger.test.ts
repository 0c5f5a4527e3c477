import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, isLogLevel, redact } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function captureStderr(): string[] {
    const lines: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });
    return lines;
  }

  it('writes one JSON line per entry to stderr', () => {
    const lines = captureStderr();

    new Logger('TaskDispatcher', 'debug').info('Tool call completed', { tool: 'login', attempts: 1 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'info',
      context: 'TaskDispatcher',
      message: 'Tool call completed',
      tool: 'login',
      attempts: 1,
    });
  });

  it('drops entries below the minimum level', () => {
    const lines = captureStderr();
    const logger = new Logger('PortalSession', 'warn');

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(lines.map((l) => JSON.parse(l).message)).toEqual(['kept']);
  });

  it('masks credential fields', () => {
    const lines = captureStderr();

    new Logger('Cli', 'debug').error('Login failed', { username: 'student', password: 'test-secret', code: 'AUTH_REJECTED' });

    expect(JSON.parse(lines[0])).toMatchObject({ username: '****', password: '****', code: 'AUTH_REJECTED' });
  });

  it('child loggers extend the context', () => {
    const lines = captureStderr();

    new Logger('TaskDispatcher', 'info').child('login').info('hello');

    expect(JSON.parse(lines[0]).context).toBe('TaskDispatcher:login');
  });

  it('redacts nested objects and arrays', () => {
    expect(redact({ llm: { apiKey: 'test-secret', model: 'm' }, list: [{ token: 'x' }] })).toEqual({
      llm: { apiKey: '****', model: 'm' },
      list: [{ token: '****' }],
    });
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
