/**
 * Environment configuration tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseEnv } from '../../src/config/env.js';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = parseEnv({});

    assert.strictEqual(env.NODE_ENV, 'development');
    assert.strictEqual(env.MAX_PARALLEL, undefined);
    assert.strictEqual(env.PROCESS_DRAIN_TIMEOUT, 30000);
    assert.strictEqual(env.APPIUM_PATH, 'appium');
    assert.strictEqual(env.APPIUM_HOST, '127.0.0.1');
    assert.strictEqual(env.APPIUM_STARTUP_TIMEOUT, 60000);
    assert.strictEqual(env.APPIUM_DEBUG_OUTPUT, false);
    assert.strictEqual(env.LOG_LEVEL, 'info');
    assert.strictEqual(env.LOG_FORMAT, 'text');
  });

  it('should coerce numbers and flags', () => {
    const env = parseEnv({
      MAX_PARALLEL: '3',
      PROCESS_DRAIN_TIMEOUT: '5000',
      APPIUM_DEBUG_OUTPUT: 'true',
      ANDROID_HOME: '/opt/android-sdk',
    });

    assert.strictEqual(env.MAX_PARALLEL, 3);
    assert.strictEqual(env.PROCESS_DRAIN_TIMEOUT, 5000);
    assert.strictEqual(env.APPIUM_DEBUG_OUTPUT, true);
    assert.strictEqual(env.ANDROID_HOME, '/opt/android-sdk');
  });

  it('should list every invalid variable', () => {
    assert.throws(
      () => parseEnv({ MAX_PARALLEL: '0', LOG_FORMAT: 'xml' }),
      (error: unknown) =>
        error instanceof Error &&
        error.message.startsWith('Environment variable validation failed:\n  - MAX_PARALLEL: ') &&
        error.message.includes('\n  - LOG_FORMAT: ')
    );
  });
});
