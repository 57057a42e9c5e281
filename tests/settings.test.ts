/**
 * Settings tests
 */

import { strict as assert } from 'assert';
import { csrfFieldSetting, loadCsrfSettings, loadLogSettings, loadSettings } from '../src/settings.js';
import { ConfigurationError } from '../src/shared/error-handler.js';

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void) {
  try {
    fn();
    console.log(`  ✅ ${name}`);
    passed++;
  } catch (error) {
    console.error(`  ❌ ${name}: ${error instanceof Error ? error.message : String(error)}`);
    failed++;
  }
}

console.log('🧪 Running Settings Tests...\n');

test('defaults apply to an empty environment', () => {
  assert.deepEqual(loadSettings({}), {
    logLevel: 'info',
    jsonLogs: false,
    csrfField: '_csrf',
    csrfTokenBytes: 32,
    csrfTtlSeconds: 0,
  });
});

test('values are read and normalized', () => {
  const settings = loadSettings({
    FORMSMITH_LOG_LEVEL: ' DEBUG ',
    FORMSMITH_LOG_JSON: '1',
    FORMSMITH_CSRF_FIELD: ' authenticity_token ',
    FORMSMITH_CSRF_TOKEN_BYTES: '48',
    FORMSMITH_CSRF_TTL_SECONDS: '3600',
  });
  assert.deepEqual(settings, {
    logLevel: 'debug',
    jsonLogs: true,
    csrfField: 'authenticity_token',
    csrfTokenBytes: 48,
    csrfTtlSeconds: 3600,
  });
});

test('blank values fall back to defaults', () => {
  const settings = loadSettings({ FORMSMITH_CSRF_FIELD: '  ', FORMSMITH_CSRF_TOKEN_BYTES: '' });
  assert.equal(settings.csrfField, '_csrf');
  assert.equal(settings.csrfTokenBytes, 32);
});

test('an unknown log level is a configuration error', () => {
  assert.throws(() => loadSettings({ FORMSMITH_LOG_LEVEL: 'verbose' }), ConfigurationError);
});

test('too few token bytes is rejected', () => {
  assert.throws(
    () => loadSettings({ FORMSMITH_CSRF_TOKEN_BYTES: '8' }),
    /FORMSMITH_CSRF_TOKEN_BYTES must be an integer >= 16, got "8"/
  );
});

test('non-integer TTLs are rejected', () => {
  assert.throws(() => loadSettings({ FORMSMITH_CSRF_TTL_SECONDS: '1.5' }), ConfigurationError);
  assert.throws(() => loadSettings({ FORMSMITH_CSRF_TTL_SECONDS: '-1' }), ConfigurationError);
});

test('each group reads only its own variables', () => {
  const env = { FORMSMITH_CSRF_TTL_SECONDS: 'soon', FORMSMITH_LOG_LEVEL: 'loud', FORMSMITH_CSRF_FIELD: 'token' };
  assert.equal(csrfFieldSetting(env), 'token');
  assert.throws(() => loadCsrfSettings(env), /FORMSMITH_CSRF_TTL_SECONDS must be an integer >= 0, got "soon"/);
  assert.throws(() => loadLogSettings(env), ConfigurationError);
  assert.deepEqual(loadLogSettings({ FORMSMITH_CSRF_TTL_SECONDS: 'soon' }), { logLevel: 'info', jsonLogs: false });
  assert.equal(csrfFieldSetting({}), '_csrf');
});

console.log(`\n✅ Settings tests: ${passed} passed, ${failed} failed\n`);
if (failed > 0) {
  process.exit(1);
}
