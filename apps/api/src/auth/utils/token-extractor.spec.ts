import type { Request } from 'express';
import { buildTestAuthConfig } from '../../../test/fixtures/auth-config';
import {
  extractAccessToken,
  extractRefreshToken,
  isSafeRedirect,
  requestPath,
} from './token-extractor';

function fakeRequest(
  cookies: Record<string, unknown>,
  authorization?: string,
): Request {
  return { cookies, headers: { authorization } } as unknown as Request;
}

describe('token extraction', () => {
  const { cookies } = buildTestAuthConfig();

  it('prefers the access_token cookie over the bearer header', () => {
    const req = fakeRequest({ access_token: 'from-cookie' }, 'Bearer from-header');

    expect(extractAccessToken(req, cookies)).toBe('from-cookie');
  });

  it('falls back to a case-insensitive bearer header', () => {
    expect(extractAccessToken(fakeRequest({}, 'bearer from-header'), cookies)).toBe(
      'from-header',
    );
  });

  it('ignores empty cookies and other schemes', () => {
    expect(extractAccessToken(fakeRequest({ access_token: '' }, 'Basic dXNlcg=='), cookies)).toBeNull();
  });

  it('takes the refresh token from the body before the cookie', () => {
    const req = fakeRequest({ refresh_token: 'from-cookie' });

    expect(extractRefreshToken(req, cookies, 'from-body')).toBe('from-body');
    expect(extractRefreshToken(req, cookies)).toBe('from-cookie');
  });
});

describe('requestPath', () => {
  it('drops the query string', () => {
    expect(requestPath('/admin/sessions?x=1')).toBe('/admin/sessions');
  });

  it('keeps a leading double slash as part of the path', () => {
    expect(requestPath('//admin/sessions?x=1')).toBe('//admin/sessions');
  });
});

describe('isSafeRedirect', () => {
  it.each([
    ['/reports?page=2', true],
    ['//evil.example', false],
    ['https://evil.example', false],
    ['/\\evil.example', false],
    [undefined, false],
  ])('%s → %s', (target, expected) => {
    expect(isSafeRedirect(target)).toBe(expected);
  });
});
