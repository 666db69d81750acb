import assert from 'node:assert/strict';
import test from 'node:test';
import { isTruthy } from '../src/config.js';
import { InvocationFailure, MalformedRowError, reportError, UsageError } from '../src/errors.js';
import { parseRunConfig } from '../src/options.js';
import { captureOutput } from './cli-test-helpers.js';

test('usage errors print to stdout with the usage text and exit 1', () => {
  let code = 0;
  const out = captureOutput(() => {
    code = reportError(new UsageError('Options -l and -ll cannot be combined; pick one intensity', 'Usage: kvbench-report [options]'));
  });
  assert.equal(code, 1);
  assert.deepEqual(out.stdout, ['Error: Options -l and -ll cannot be combined; pick one intensity\n\nUsage: kvbench-report [options]']);
  assert.deepEqual(out.stderr, []);
});

test('a rejected option combination is reported as a usage error', () => {
  let code = 0;
  const out = captureOutput(() => {
    try {
      parseRunConfig(['-l', '-ll']);
      assert.fail('expected a usage error');
    } catch (err) {
      code = reportError(err);
    }
  });
  assert.equal(code, 1);
  assert.equal(out.stdout.length, 1);
  assert.ok(out.stdout[0].startsWith('Error: Options -l and -ll cannot be combined'));
  assert.deepEqual(out.stderr, []);
});

test('a failed benchmark run prints the captured stderr and exits 1', () => {
  let code = 0;
  const out = captureOutput(() => {
    code = reportError(new InvocationFailure('./bin/kv_test -tc=*thread performance', 2, 'assertion failed\n'));
  });
  assert.equal(code, 1);
  assert.deepEqual(out.stdout, []);
  assert.deepEqual(out.stderr, [
    '*** Error while executing the benchmarks\n' +
      '  Command: ./bin/kv_test -tc=*thread performance\n' +
      '  Status: 2\n' +
      '\n' +
      'assertion failed',
  ]);
});

test('a failed benchmark run in JSON mode prints an error object', () => {
  let code = 0;
  const out = captureOutput(() => {
    code = reportError(new InvocationFailure('./bin/kv_test', null, 'spawn ./bin/kv_test ENOENT'), { json: true });
  });
  assert.equal(code, 1);
  assert.deepEqual(out.stderr.map(line => JSON.parse(line)), [
    { error: true, type: 'invocation_failure', status: null, message: 'spawn ./bin/kv_test ENOENT' },
  ]);
});

test('a malformed row names file and line and exits 1', () => {
  let code = 0;
  const out = captureOutput(() => {
    code = reportError(new MalformedRowError('benchmark_a.csv', 3, 'Expected 9 fields, found 0'));
  });
  assert.equal(code, 1);
  assert.deepEqual(out.stdout, []);
  assert.deepEqual(out.stderr, [
    'Error: Expected 9 fields, found 0\n  At: benchmark_a.csv:3\n  No chart was written.',
  ]);
});

test('a malformed row in JSON mode prints an error object, plus the stack with debug', () => {
  const err = new MalformedRowError('benchmark_a.csv', 7, 'Field "keySize" is not numeric: "0x10"');
  const out = captureOutput(() => {
    reportError(err, { json: true, debug: true });
  });
  assert.deepEqual(JSON.parse(out.stderr[0]), {
    error: true,
    type: 'malformed_row',
    file: 'benchmark_a.csv',
    line: 7,
    message: 'Field "keySize" is not numeric: "0x10"',
  });
  assert.equal(out.stderr.length, 2);
  assert.equal(out.stderr[1], err.stack);
});

test('other errors exit 1 and only show a stack with debug', () => {
  const err = new Error('disk full');
  const quiet = captureOutput(() => {
    assert.equal(reportError(err), 1);
  });
  assert.deepEqual(quiet.stderr, ['Error: disk full']);

  const verbose = captureOutput(() => {
    assert.equal(reportError(err, { debug: true }), 1);
  });
  assert.deepEqual(verbose.stderr, ['Error: disk full', err.stack]);

  const unknown = captureOutput(() => {
    assert.equal(reportError('not an error'), 1);
  });
  assert.deepEqual(unknown.stderr, ['An unexpected error occurred']);
});

test('debug environment values 0 and false count as off', () => {
  assert.equal(isTruthy(undefined), false);
  assert.equal(isTruthy(''), false);
  assert.equal(isTruthy('0'), false);
  assert.equal(isTruthy('false'), false);
  assert.equal(isTruthy('FALSE'), false);
  assert.equal(isTruthy('1'), true);
  assert.equal(isTruthy('yes'), true);
});
