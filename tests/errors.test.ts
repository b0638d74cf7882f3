import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  AbortRequestedError,
  InjectionFailureError,
  MissingReferenceError,
  NoMatchFoundError,
  TriggerTimeoutError,
  formatError,
  getSuggestion,
  isAutomationError,
} from '../src/lib/core/errors';

test('error messages carry their context', () => {
  const timeout = new TriggerTimeoutError('pixel', 20, 'pixel appear #ff0000 at (1, 2)');
  assert.equal(timeout.kind, 'TriggerTimeout');
  assert.equal(timeout.name, 'TriggerTimeoutError');
  assert.equal(timeout.message, 'pixel trigger timed out after 20ms: pixel appear #ff0000 at (1, 2)');

  assert.equal(new NoMatchFoundError('loot').message, "scan 'loot' found no item");
  assert.equal(
    new MissingReferenceError('point', 7, 'main START #1').message,
    "main START #1: unknown point '7'"
  );
  assert.equal(
    new InjectionFailureError('click at (1, 2)', new Error('denied')).message,
    'click at (1, 2) failed: denied'
  );
});

test('fail-safe aborts have their own kind', () => {
  const failsafe = new AbortRequestedError('failsafe');
  assert.equal(failsafe.kind, 'FailSafeTriggered');
  assert.equal(failsafe.reason, 'failsafe');

  const stop = new AbortRequestedError('stop');
  assert.equal(stop.kind, 'AbortRequested');
  assert.equal(stop.message, 'abort requested (stop)');
});

test('the first location attached wins', () => {
  const error = new NoMatchFoundError('loot')
    .at({ phase: 'LOOP farm', stepIndex: 2 })
    .at({ phase: 'START', stepIndex: 0 });
  assert.deepEqual(error.location, { phase: 'LOOP farm', stepIndex: 2 });
});

test('formatError and getSuggestion', () => {
  const error = new NoMatchFoundError('loot').at({ phase: 'LOOP farm', stepIndex: 2 });
  assert.equal(
    formatError(error.detail),
    "❌ NoMatchFound\n  message: scan 'loot' found no item\n  step:    LOOP farm #3"
  );
  assert.match(getSuggestion(error.detail), /^💡 Hint: no slot matched/);
});

test('isAutomationError tells the hierarchy from plain errors', () => {
  assert.equal(isAutomationError(new InjectionFailureError('key', 'x')), true);
  assert.equal(isAutomationError(new AbortRequestedError('quit')), true);
  assert.equal(isAutomationError(new Error('plain')), false);
});
