import { describe, it, expect } from 'vitest';
import { AuthUtils } from '../../src/utils/AuthUtils.js';
import { AuthenticationError } from '../../src/types/errors.js';

describe('AuthUtils', () => {
  describe('parseAuthorizationHeader', () => {
    it('returns undefined without a header', () => {
      expect(AuthUtils.parseAuthorizationHeader(undefined)).toBeUndefined();
      expect(AuthUtils.parseAuthorizationHeader('  ')).toBeUndefined();
    });

    it('decodes Basic credentials, keeping colons in the password', () => {
      const header = AuthUtils.encodeBasic('clerk', 'test:secret');

      expect(header).toBe('Basic ' + Buffer.from('clerk:test:secret').toString('base64'));
      expect(AuthUtils.parseAuthorizationHeader(header)).toEqual({
        kind: 'basic',
        username: 'clerk',
        password: 'test:secret',
      });
    });

    it('accepts the scheme in any case', () => {
      expect(AuthUtils.parseAuthorizationHeader('bearer test-token')).toEqual({ kind: 'token', token: 'test-token' });
    });

    it('rejects unusable headers', () => {
      expect(() => AuthUtils.parseAuthorizationHeader('Basic')).toThrow('Malformed Authorization header');
      expect(() => AuthUtils.parseAuthorizationHeader('Basic ' + Buffer.from('nocolon').toString('base64')))
        .toThrow('Malformed Basic credentials');
      expect(() => AuthUtils.parseAuthorizationHeader('Digest abc')).toThrow(AuthenticationError);
    });
  });

  describe('credentialKey', () => {
    it('is stable per credential set and hides the secret', () => {
      const a = AuthUtils.credentialKey({ kind: 'basic', username: 'u', password: 'test-secret' });
      const b = AuthUtils.credentialKey({ kind: 'basic', username: 'u', password: 'test-secret' });
      const other = AuthUtils.credentialKey({ kind: 'basic', username: 'u', password: 'other' });

      expect(a).toBe(b);
      expect(a).not.toBe(other);
      expect(a).toMatch(/^[0-9a-f]{64}$/);
      expect(a).not.toContain('test-secret');
    });

    it('does not confuse basic and token credentials', () => {
      const basic = AuthUtils.credentialKey({ kind: 'basic', username: 'x', password: '' });
      const token = AuthUtils.credentialKey({ kind: 'token', token: 'x' });

      expect(basic).not.toBe(token);
    });
  });

  it('formats keys for logs', () => {
    expect(AuthUtils.formatKeyForLog('abc')).toBe('***');
    expect(AuthUtils.formatKeyForLog('0123456789abcdef')).toBe('***89abcdef');
  });
});
