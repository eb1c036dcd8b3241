import { describe, it, expect } from 'vitest';
import { EnvValidationError, parseEnv } from '../../src/env.js';

describe('parseEnv', () => {
  it('applies defaults around the required token', () => {
    const env = parseEnv({ BOT_TOKEN: 'test-token' });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      LIVE_INTERVAL_SECONDS: 60,
      INTERVAL_MINUTES: 16,
      DAILY_HOUR_UTC: 9,
      KEEP_ALIVE_MINUTES: 4,
      LIVE_BATCH_SIZE: 25,
      INTERVAL_BATCH_SIZE: 40,
      DAILY_BATCH_SIZE: 50,
      COOLDOWN_HOURS: 24,
      RANK_FLOOR: 40,
      IMMEDIATE_REWARD_MIN: 100,
      IMMEDIATE_REWARD_MAX: 1000,
      SEND_DELAY_MS: 150,
      SCAM_THRESHOLD: 30,
      SUSPICIOUS_THRESHOLD: 15,
      QUARANTINE_AFTER_FAILURES: 3,
    });
    expect(env.ADMIN_CHAT_ID).toBeUndefined();
    expect(env.UPTIME_URL).toBeUndefined();
  });

  it('coerces numeric strings and treats blank optionals as unset', () => {
    const env = parseEnv({
      BOT_TOKEN: 'test-token',
      LIVE_INTERVAL_SECONDS: '30',
      ADMIN_CHAT_ID: '  ',
      UPTIME_URL: '',
      TWITTER_BEARER_TOKEN: 'test-bearer',
    });

    expect(env.LIVE_INTERVAL_SECONDS).toBe(30);
    expect(env.ADMIN_CHAT_ID).toBeUndefined();
    expect(env.UPTIME_URL).toBeUndefined();
    expect(env.TWITTER_BEARER_TOKEN).toBe('test-bearer');
  });

  it('lists every invalid variable', () => {
    try {
      parseEnv({ DAILY_HOUR_UTC: '24', UPTIME_URL: 'not a url' });
      expect.unreachable('parseEnv should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(EnvValidationError);
      const issues = error instanceof EnvValidationError ? error.issues : [];
      expect(issues.some((issue) => issue.includes('BOT_TOKEN'))).toBe(true);
      expect(issues.some((issue) => issue.includes('DAILY_HOUR_UTC'))).toBe(true);
      expect(issues.some((issue) => issue.includes('UPTIME_URL'))).toBe(true);
    }
  });

  it('rejects inverted thresholds and reward windows', () => {
    expect(() =>
      parseEnv({ BOT_TOKEN: 'test-token', SCAM_THRESHOLD: '10', SUSPICIOUS_THRESHOLD: '20' }),
    ).toThrow(/SUSPICIOUS_THRESHOLD must not exceed SCAM_THRESHOLD/);
    expect(() =>
      parseEnv({ BOT_TOKEN: 'test-token', IMMEDIATE_REWARD_MIN: '1000', IMMEDIATE_REWARD_MAX: '100' }),
    ).toThrow(/IMMEDIATE_REWARD_MIN must be below IMMEDIATE_REWARD_MAX/);
  });
});
