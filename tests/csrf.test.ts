/**
 * CSRF helper tests
 *
 * Run: npx tsx tests/csrf.test.ts
 */

import { strict as assert } from 'assert';
import { CsrfProtection } from '../src/csrf/protection.js';
import { MemoryTokenStore } from '../src/csrf/store.js';
import { createFormBuilder } from '../src/form/builder.js';
import { ConfigurationError } from '../src/shared/error-handler.js';
import { Logger, type LogRecord } from '../src/shared/logger.js';
import { fingerprint } from '../src/shared/security.js';
import { MemoryWritable } from './helpers/memory-writable.js';

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>) {
  try {
    await fn();
    console.log(`  ✅ ${name}`);
    passed++;
  } catch (error) {
    console.error(`  ❌ ${name}: ${error instanceof Error ? error.message : String(error)}`);
    failed++;
  }
}

function quietLogger(records: LogRecord[] = []): Logger {
  return new Logger({ level: 'debug', destination: new MemoryWritable(), sink: (record) => records.push(record) });
}

function protection(store = new MemoryTokenStore({ ttlSeconds: 0 }), records: LogRecord[] = []): CsrfProtection {
  return new CsrfProtection({ store, field: '_csrf', tokenBytes: 16, logger: quietLogger(records) });
}

async function run() {
  console.log('🧪 Running CSRF Tests...\n');

  await test('a session keeps its token until rotated', async () => {
    const csrf = protection();
    const first = await csrf.token('session-1');
    assert.equal(first.length, 22);
    assert.match(first, /^[A-Za-z0-9_-]+$/);
    assert.equal(await csrf.token('session-1'), first);
    assert.notEqual(await csrf.token('session-2'), first);
  });

  await test('verify accepts only the stored token', async () => {
    const records: LogRecord[] = [];
    const csrf = protection(undefined, records);
    const token = await csrf.token('session-1');
    assert.equal(await csrf.verify('session-1', token), true);
    assert.equal(await csrf.verify('session-1', token + 'x'), false);
    assert.equal(await csrf.verify('session-1', undefined), false);
    assert.equal(await csrf.verify('session-1', ['array']), false);
    assert.equal(await csrf.verify('session-2', token), false);
    const warnings = records.filter((record) => record.level === 'warn').map((record) => record.message);
    assert.deepEqual(warnings, [
      'CSRF token mismatch',
      'CSRF token missing from submission',
      'CSRF token missing from submission',
      'No CSRF token stored for session',
    ]);
  });

  await test('log lines name sessions by fingerprint only', async () => {
    const sessionId = 's%3Asecret-session-cookie';
    const records: LogRecord[] = [];
    const output = new MemoryWritable();
    const csrf = new CsrfProtection({
      store: new MemoryTokenStore({ ttlSeconds: 0 }),
      tokenBytes: 16,
      logger: new Logger({ level: 'debug', destination: output, sink: (record) => records.push(record) }),
    });
    await csrf.token(sessionId);
    assert.equal(await csrf.verify(sessionId, 'forged'), false);
    assert.equal(await csrf.verify(sessionId, ''), false);

    assert.equal(records.length, 3);
    for (const record of records) {
      assert.equal(record.session, fingerprint(sessionId));
      assert.equal(record.sessionId, undefined);
    }
    assert.match(fingerprint(sessionId), /^[0-9a-f]{12}$/);
    assert.equal(output.toString().includes('secret-session-cookie'), false);
  });

  await test('rotate invalidates the previous token', async () => {
    const csrf = protection();
    const before = await csrf.token('s');
    const after = await csrf.rotate('s');
    assert.notEqual(after, before);
    assert.equal(await csrf.verify('s', before), false);
    assert.equal(await csrf.verify('s', after), true);
  });

  await test('revoke removes the token', async () => {
    const csrf = protection();
    const token = await csrf.token('s');
    await csrf.revoke('s');
    assert.equal(await csrf.verify('s', token), false);
  });

  await test('formConfig feeds the form builder', async () => {
    const csrf = new CsrfProtection({
      store: new MemoryTokenStore({ ttlSeconds: 0 }),
      field: 'authenticity_token',
      logger: quietLogger(),
    });
    const config = await csrf.formConfig('s');
    assert.equal(config.csrfField, 'authenticity_token');
    assert.equal(config.csrfToken, await csrf.token('s'));

    const form = createFormBuilder({ ...config, action: '/profile', method: 'POST' });
    assert.equal(
      form.open().toString(),
      `<form action="/profile" method="POST"><input type="hidden" name="authenticity_token" value="${config.csrfToken}">`
    );
  });

  await test('memory store expires tokens after their TTL', async () => {
    let now = 1_000;
    const store = new MemoryTokenStore({ ttlSeconds: 60, now: () => now });
    await store.set('a', 'token-a');
    await store.set('b', 'token-b');
    now += 59_999;
    assert.equal(await store.get('a'), 'token-a');
    now += 1;
    assert.equal(await store.get('a'), null);
    assert.equal(await store.cleanup(), 1);
    assert.equal(store.size, 0);
  });

  await test('too few random bytes is a configuration error', async () => {
    assert.throws(
      () => new CsrfProtection({ store: new MemoryTokenStore(), tokenBytes: 8, logger: quietLogger() }),
      ConfigurationError
    );
  });

  console.log(`\n✅ CSRF tests: ${passed} passed, ${failed} failed\n`);
  if (failed > 0) {
    process.exit(1);
  }
}

run().catch((error) => {
  console.error('Test runner failed:', error);
  process.exit(1);
});
