import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ControlToken } from '../src/lib/core/control';
import { AbortRequestedError } from '../src/lib/core/errors';
import { delay } from './helpers';

function abortedWith(reason: string) {
  return (error: unknown) => error instanceof AbortRequestedError && error.reason === reason;
}

test('sleep runs its full duration', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  const started = Date.now();
  assert.equal(await control.sleep(30), 'elapsed');
  assert.ok(Date.now() - started >= 25);
});

test('skip ends a sleep early', async () => {
  const control = new ControlToken({ sliceMs: 50 });
  const started = Date.now();
  const sleeping = control.sleep(2000);
  await delay(20);
  control.signal('skip');
  assert.equal(await sleeping, 'skipped');
  assert.ok(Date.now() - started < 1000);
});

test('a skip is consumed once', () => {
  const control = new ControlToken({ sliceMs: 5 });
  control.signal('skip');
  assert.equal(control.consumeSkip(), true);
  assert.equal(control.consumeSkip(), false);
});

test('stop rejects a sleep', async () => {
  const control = new ControlToken({ sliceMs: 50 });
  const sleeping = control.sleep(2000);
  await delay(10);
  control.signal('stop');
  await assert.rejects(sleeping, abortedWith('stop'));
});

test('a paused sleep resumes with its remainder', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  const started = Date.now();
  const sleeping = control.sleep(100);
  await delay(30);
  control.signal('pause');
  assert.equal(control.isPaused(), true);
  await delay(150);
  control.signal('resume');
  assert.equal(await sleeping, 'elapsed');

  assert.ok(control.pausedMs() >= 140);
  assert.ok(Date.now() - started >= 220);
});

test('stop while paused ends the pause', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  control.signal('pause');
  const blocked = control.checkpoint();
  await delay(20);
  control.signal('stop');
  await assert.rejects(blocked, abortedWith('stop'));
});

test('quit survives reset', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  control.signal('quit');
  control.signal('stop');
  control.reset();
  assert.equal(control.isQuit(), true);
  assert.equal(control.isAborted(), true);
  await assert.rejects(control.checkpoint(), abortedWith('quit'));
});

test('reset clears stop', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  control.signal('stop');
  control.reset();
  assert.equal(control.isAborted(), false);
  await control.checkpoint();
});

test('the fail-safe probe aborts at a checkpoint', async () => {
  let inCorner = false;
  const control = new ControlToken({ sliceMs: 5, failSafe: async () => inCorner });
  await control.checkpoint();

  inCorner = true;
  await assert.rejects(control.checkpoint(), (error: unknown) =>
    error instanceof AbortRequestedError && error.kind === 'FailSafeTriggered');
  assert.equal(control.isAborted(), true);
});

test('hold ignores skip and leaves it pending', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  control.signal('skip');
  const started = Date.now();
  await control.hold(30);
  assert.ok(Date.now() - started >= 25);
  assert.equal(control.consumeSkip(), true);
});

test('hold stops on stop', async () => {
  const control = new ControlToken({ sliceMs: 5 });
  const holding = control.hold(1000);
  await delay(10);
  control.signal('stop');
  await assert.rejects(holding, abortedWith('stop'));
});

test('guard neither blocks on pause nor consumes skip', async () => {
  const control = new ControlToken({ sliceMs: 5, failSafe: async () => false });
  control.signal('pause');
  control.signal('skip');
  await control.guard();
  assert.equal(control.consumeSkip(), true);

  control.signal('stop');
  await assert.rejects(control.guard(), abortedWith('stop'));
});

test('hold samples the fail-safe on every slice', async () => {
  let inCorner = false;
  const control = new ControlToken({ sliceMs: 5, failSafe: async () => inCorner });
  const holding = control.hold(1000);
  await delay(10);
  inCorner = true;
  await assert.rejects(holding, abortedWith('failsafe'));
});
