import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiKeyGuard } from './api-key.guard';

function guardWithKey(key: string) {
  const cfg = new ConfigService({ INSIGHTS_API_KEY: key });
  return new ApiKeyGuard(cfg);
}

describe('ApiKeyGuard', () => {
  it('lets everything through when no key is configured', () => {
    expect(guardWithKey('').check('/api/detections/hoarder-tabs', {})).toBe(true);
  });

  it('keeps health public', () => {
    expect(guardWithKey('test-secret').check('/api/system/health', {})).toBe(true);
  });

  it('requires a key on other routes', () => {
    expect(() =>
      guardWithKey('test-secret').check('/api/activity/recent', {}),
    ).toThrow(UnauthorizedException);
  });

  it('rejects a wrong key', () => {
    expect(() =>
      guardWithKey('test-secret').check('/api/activity/recent', {
        'x-api-key': 'wrong-secret',
      }),
    ).toThrow(ForbiddenException);
  });

  it('rejects a key with the same length in characters but not in bytes', () => {
    expect(() =>
      guardWithKey('test-secret').check('/api/activity/recent', {
        'x-api-key': 'test-secr\u00e9t',
      }),
    ).toThrow(ForbiddenException);
  });

  it('accepts the key from x-api-key or a bearer token', () => {
    const guard = guardWithKey('test-secret');
    expect(guard.check('/api/activity/recent', { 'x-api-key': 'test-secret' })).toBe(
      true,
    );
    expect(
      guard.check('/api/activity/recent', { authorization: 'Bearer test-secret' }),
    ).toBe(true);
  });

  it('answers with the authentication_required body', () => {
    let caught: unknown;
    try {
      guardWithKey('test-secret').check('/api/activity/recent', {});
    } catch (e: unknown) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnauthorizedException);
    if (caught instanceof UnauthorizedException)
      expect(caught.getResponse()).toEqual({
        error: 'authentication_required',
        message: 'API key required',
      });
  });
});
