/**
 * Validation adapter tests
 */

import { strict as assert } from 'assert';
import { z } from 'zod';
import { createFormBuilder } from '../src/form/builder.js';
import { ConfigurationError, ValidationError } from '../src/shared/error-handler.js';
import { Logger, type LogRecord } from '../src/shared/logger.js';
import { defineForm } from '../src/validation/definition.js';
import { checkRules, parseRuleTag } from '../src/validation/rules.js';
import { FormValidator, getValidator, validate } from '../src/validation/validator.js';
import { MemoryWritable } from './helpers/memory-writable.js';

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

const signup = defineForm({
  Name: { form: 'name', rules: 'required' },
  Email: { form: 'email', rules: 'required,email' },
});

console.log('🧪 Running Validator Tests...\n');

test('rule failures are keyed by form name', () => {
  const outcome = validate({ Name: '', Email: 'nope' }, signup);
  assert.deepEqual(outcome, {
    errors: { name: 'Name is required', email: 'Email must be a valid email address' },
    failed: true,
  });
});

test('a valid record reports nothing', () => {
  assert.deepEqual(validate({ Name: 'Ada', Email: 'ada@example.com' }, signup), { errors: {}, failed: false });
});

test('missing properties count as empty', () => {
  assert.deepEqual(validate({}, signup).errors, { name: 'Name is required', email: 'Email is required' });
});

test('only the first failing rule is reported', () => {
  const form = defineForm({ Code: { form: 'code', rules: 'required,min=3,max=5' } });
  assert.deepEqual(validate({ Code: 'ab' }, form).errors, { code: 'Code must be at least 3 characters' });
  assert.deepEqual(validate({ Code: 'abcdef' }, form).errors, { code: 'Code must be at most 5 characters' });
});

test('optional empty values skip their rules', () => {
  const form = defineForm({ Website: { form: 'website', rules: 'url' } });
  assert.equal(validate({ Website: '' }, form).failed, false);
  assert.deepEqual(validate({ Website: 'ftp://example.com' }, form).errors, {
    website: 'Website must be a valid URL',
  });
});

test('labels replace the property name in messages', () => {
  const form = defineForm({ FullName: { form: 'full_name', label: 'Full name', rules: 'required' } });
  assert.deepEqual(validate({ FullName: null }, form).errors, { full_name: 'Full name is required' });
});

test('zod schemas can be used directly', () => {
  const form = defineForm({
    Age: { form: 'age', rules: z.number().int().min(18, 'Must be an adult') },
    Nick: { form: 'nick', rules: z.string() },
  });
  const outcome = validate({ Age: 12 }, form);
  assert.deepEqual(outcome.errors, { age: 'Must be an adult', nick: 'Required' });
});

test('numbers, lengths and choices', () => {
  assert.equal(checkRules(parseRuleTag('numeric'), '12.5', 'Price'), undefined);
  assert.equal(checkRules(parseRuleTag('numeric'), '12a', 'Price'), 'Price must be a number');
  assert.equal(checkRules(parseRuleTag('max=10'), 11, 'Qty'), 'Qty must be at most 10');
  assert.equal(checkRules(parseRuleTag('len=4'), 'abc', 'Pin'), 'Pin must be exactly 4 characters');
  assert.equal(checkRules(parseRuleTag('min=2'), ['a'], 'Tags'), 'Tags must be at least 2 items');
  assert.equal(checkRules(parseRuleTag('oneof=admin editor'), 'root', 'Role'), 'Role must be one of: admin, editor');
  assert.equal(checkRules(parseRuleTag('oneof=admin editor'), 'editor', 'Role'), undefined);
  assert.equal(checkRules(parseRuleTag('required'), false, 'Terms'), 'Terms is required');
  assert.equal(checkRules(parseRuleTag('required'), 0, 'Count'), undefined);
});

test('rule tags are parsed with their parameters', () => {
  assert.deepEqual(parseRuleTag(' required , max=120,,email '), [
    { name: 'required' },
    { name: 'max', param: '120' },
    { name: 'email' },
  ]);
});

test('bad rule tags fail when the form is defined', () => {
  assert.throws(() => defineForm({ A: { rules: 'required,uppercase' } }), ConfigurationError);
  assert.throws(() => parseRuleTag('min'), /needs a whole number/);
  assert.throws(() => parseRuleTag('max=ten'), ConfigurationError);
  assert.throws(() => parseRuleTag('oneof='), /space separated list/);
});

test('two properties cannot share a form name', () => {
  assert.throws(
    () => defineForm({ Email: { form: 'email' }, Contact: { form: 'email' } }),
    /both bound to form field "email"/
  );
});

test('bindings only list properties with a form name', () => {
  const form = defineForm({ Name: { form: 'name' }, age: { rules: 'numeric' } });
  assert.deepEqual(form.bindings, { Name: 'name' });
  assert.equal(form.formName('age'), 'age');
  assert.deepEqual(form.properties(), ['Name', 'age']);
});

test('structural failures throw instead of reporting field errors', () => {
  for (const record of [null, undefined, 'Ada', 42, ['Ada'], new Map([['Name', 'Ada']])]) {
    assert.throws(() => validate(record, signup), ValidationError);
  }
});

test('class instances are validated like plain records', () => {
  class Signup {
    Name = '';
    Email = 'ada@example.com';
  }
  assert.deepEqual(validate(new Signup(), signup), { errors: { name: 'Name is required' }, failed: true });
});

test('the shared validator is reused', () => {
  assert.equal(getValidator(), getValidator());
});

test('validation failures are logged at debug level', () => {
  const records: LogRecord[] = [];
  const logger = new Logger({ level: 'debug', destination: new MemoryWritable(), sink: (record) => records.push(record) });
  new FormValidator(logger).validate({ Name: '', Email: 'ada@example.com' }, signup);
  assert.equal(records.length, 1);
  assert.equal(records[0].message, 'Validation failed');
  assert.deepEqual(records[0].fields, ['name']);
});

test('validation errors feed straight into a form builder', () => {
  const record = { Name: '', Email: 'not-an-email' };
  const outcome = validate(record, signup);
  const form = createFormBuilder({ model: record, bindings: signup.bindings, errors: outcome.errors });
  assert.equal(
    form.email('email').toString(),
    '<input type="email" name="email" value="not-an-email" class="form-control is-invalid">'
  );
  assert.equal(
    form.fieldError('email').toString(),
    '<div class="invalid-feedback">Email must be a valid email address</div>'
  );
});

console.log(`\n✅ Validator tests: ${passed} passed, ${failed} failed\n`);
if (failed > 0) {
  process.exit(1);
}
