/**
 * Environment Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@stepwise/core/domain';
import { loadWizardEnv } from '../env.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('loadWizardEnv', () => {
  it('should apply defaults', () => {
    expect(loadWizardEnv({})).toEqual({
      logLevel: 'info',
      nodeEnv: 'production',
      sessionTtlSeconds: 900,
      signingSecret: null,
      redisUrl: null,
    });
  });

  it('should read every setting', () => {
    expect(
      loadWizardEnv({
        LOG_LEVEL: 'debug',
        NODE_ENV: 'development',
        WIZARD_SESSION_TTL_SECONDS: '600',
        WIZARD_SIGNING_SECRET: 'test-secret-value',
        REDIS_URL: 'redis://localhost:6379',
      })
    ).toEqual({
      logLevel: 'debug',
      nodeEnv: 'development',
      sessionTtlSeconds: 600,
      signingSecret: 'test-secret-value',
      redisUrl: 'redis://localhost:6379',
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadWizardEnv({ REDIS_URL: '', LOG_LEVEL: '' })).toMatchObject({
      logLevel: 'info',
      redisUrl: null,
    });
  });

  it('should cap the session TTL at one hour', () => {
    const error = captureError(() => loadWizardEnv({ WIZARD_SESSION_TTL_SECONDS: '7200' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.details).toEqual([
        'WIZARD_SESSION_TTL_SECONDS: Number must be less than or equal to 3600',
      ]);
    }
  });

  it('should list every invalid variable', () => {
    const error = captureError(() =>
      loadWizardEnv({ LOG_LEVEL: 'loud', WIZARD_SIGNING_SECRET: 'short' })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.message).toBe('Invalid environment configuration');
      expect(error.details).toHaveLength(2);
      expect(error.details[1]).toBe(
        'WIZARD_SIGNING_SECRET: String must contain at least 16 character(s)'
      );
    }
  });
});
