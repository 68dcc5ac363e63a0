import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('fills defaults for an empty environment', () => {
    const env = validateEnv({});
    expect(env.INSIGHTS_PORT).toBe(8080);
    expect(env.INSIGHTS_DB_PATH).toBe('data/insights.sqlite');
    expect(env.INSIGHTS_API_KEY).toBe('');
    expect(env.INSIGHTS_HOARDER_LOOKBACK_DAYS).toBe(30);
  });

  it('coerces numeric strings', () => {
    const env = validateEnv({
      INSIGHTS_PORT: '3000',
      INSIGHTS_HOARDER_LOOKBACK_DAYS: '14',
    });
    expect(env.INSIGHTS_PORT).toBe(3000);
    expect(env.INSIGHTS_HOARDER_LOOKBACK_DAYS).toBe(14);
  });

  it('keeps unrelated variables', () => {
    expect(validateEnv({ HOME: '/tmp' }).HOME).toBe('/tmp');
  });

  it('rejects an out-of-range lookback', () => {
    expect(() => validateEnv({ INSIGHTS_HOARDER_LOOKBACK_DAYS: '400' })).toThrow(
      /INSIGHTS_HOARDER_LOOKBACK_DAYS/,
    );
  });

  it('rejects a non-numeric port', () => {
    expect(() => validateEnv({ INSIGHTS_PORT: 'abc' })).toThrow(
      /^Invalid environment: INSIGHTS_PORT/,
    );
  });
});
