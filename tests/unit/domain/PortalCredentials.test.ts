import { inspect } from 'node:util';
import { describe, it, expect } from 'vitest';
import { PortalCredentials } from '../../../src/domain/entities/PortalCredentials.js';

describe('PortalCredentials', () => {
  const creds = new PortalCredentials('student', 'test-secret');

  it('exposes values only through explicit accessors', () => {
    expect(creds.username).toBe('student');
    expect(creds.password).toBe('test-secret');
  });

  it('masks itself when serialized or printed', () => {
    expect(JSON.stringify({ creds })).toBe('{"creds":"[credentials]"}');
    expect(`${creds}`).toBe('[credentials]');
    expect(inspect(creds)).toBe('[credentials]');
  });
});
