import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { MatchContext, ProfileMatch, ProfileMatcher } from '../src/lib/auto/image-matcher';
import { ItemScanResolver } from '../src/lib/auto/item-scan';
import type { NumberRecognizer } from '../src/lib/auto/number-reader';
import { createBuffer, type PixelBuffer } from '../src/lib/auto/screen';
import type { EngineConfig } from '../src/lib/core/config';
import { ControlToken } from '../src/lib/core/control';
import { AbortRequestedError } from '../src/lib/core/errors';
import { TriggerEvaluator } from '../src/lib/core/trigger-evaluator';
import type { Color, ItemProfile, ItemScanConfig, PixelTrigger } from '../src/lib/core/types';
import { BLACK, RED, ScriptedScreen, delay, fastConfig } from './helpers';

function setup(screen: ScriptedScreen, config: EngineConfig = fastConfig(), extra: {
  numberReader?: NumberRecognizer;
  resolver?: ItemScanResolver;
  random?: () => number;
  now?: () => Date;
} = {}) {
  const control = new ControlToken({ sliceMs: config.timing.sliceMs });
  const evaluator = new TriggerEvaluator({ screen, control, config, ...extra });
  return { control, evaluator };
}

function redAt(color: Color = RED, polarity: PixelTrigger['polarity'] = 'appear'): PixelTrigger {
  return { x: 5, y: 5, color, polarity };
}

test('pixel: never matching times out after ceil(timeout / interval) polls', async () => {
  const screen = new ScriptedScreen();
  const { evaluator } = setup(screen);

  const outcome = await evaluator.waitPixel(redAt());
  assert.equal(outcome.status, 'timed_out');
  if (outcome.status === 'timed_out') assert.equal(outcome.polls, 2);
  assert.equal(screen.pixelReads, 2);
});

test('pixel: satisfied on the poll that sees the color', async () => {
  const screen = new ScriptedScreen((_x, _y, read) => (read >= 3 ? RED : BLACK));
  const { evaluator } = setup(screen, fastConfig({ pixel: { timeoutSeconds: 1 } }));

  assert.deepEqual(await evaluator.wait({ type: 'pixel', ...redAt() }), { status: 'satisfied', skipped: false });
  assert.equal(screen.pixelReads, 3);
});

test('pixel: gone waits for the color to leave', async () => {
  const screen = new ScriptedScreen((_x, _y, read) => (read >= 2 ? BLACK : RED));
  const { evaluator } = setup(screen, fastConfig({ pixel: { timeoutSeconds: 1 } }));

  assert.deepEqual(await evaluator.waitPixel(redAt(RED, 'gone')), { status: 'satisfied', skipped: false });
  assert.equal(screen.pixelReads, 2);
});

test('pixel: tolerance is inclusive', async () => {
  const screen = new ScriptedScreen(() => ({ r: 110, g: 95, b: 100 }));
  const target = redAt({ r: 100, g: 100, b: 100 });

  const within = setup(screen, fastConfig({ pixel: { tolerance: 10 } }));
  assert.equal((await within.evaluator.waitPixel(target)).status, 'satisfied');

  const outside = setup(screen, fastConfig({ pixel: { tolerance: 9 } }));
  assert.equal((await outside.evaluator.waitPixel(target)).status, 'timed_out');
});

test('pixel: skip resolves the wait as satisfied', async () => {
  const screen = new ScriptedScreen();
  const { evaluator, control } = setup(screen, fastConfig({ pixel: { timeoutSeconds: 5 } }));
  const started = Date.now();

  const waiting = evaluator.waitPixel(redAt());
  await delay(30);
  control.signal('skip');

  assert.deepEqual(await waiting, { status: 'satisfied', skipped: true });
  assert.ok(Date.now() - started < 1000);
});

test('pixel: stop rejects the wait', async () => {
  const { evaluator, control } = setup(new ScriptedScreen(), fastConfig({ pixel: { timeoutSeconds: 5 } }));
  const waiting = evaluator.waitPixel(redAt());
  await delay(20);
  control.signal('stop');
  await assert.rejects(waiting, (error: unknown) => error instanceof AbortRequestedError && error.reason === 'stop');
});

test('pause freezes the timeout budget', async () => {
  const screen = new ScriptedScreen();
  const { evaluator, control } = setup(screen, fastConfig({ pixel: { timeoutSeconds: 0.1 } }));
  const started = Date.now();

  const waiting = evaluator.waitPixel(redAt());
  await delay(20);
  control.signal('pause');
  await delay(200);
  control.signal('resume');

  const outcome = await waiting;
  assert.equal(outcome.status, 'timed_out');
  if (outcome.status === 'timed_out') assert.ok(outcome.elapsedMs < 180);
  assert.ok(Date.now() - started >= 250);
  assert.ok(screen.pixelReads <= 10);
});

test('poll makes at least one check', async () => {
  const { evaluator } = setup(new ScriptedScreen());
  let checks = 0;
  const outcome = await evaluator.poll('once', { timeoutMs: 50, intervalMs: 100 }, async () => {
    checks++;
    return false;
  });
  assert.equal(outcome.status, 'timed_out');
  assert.equal(checks, 1);
});

test('timed waits', async () => {
  const { evaluator } = setup(new ScriptedScreen(), fastConfig(), { random: () => 0.5 });

  assert.deepEqual(await evaluator.wait({ type: 'none' }), { status: 'satisfied', skipped: false });

  let started = Date.now();
  assert.deepEqual(await evaluator.wait({ type: 'fixed', seconds: 0.03 }), { status: 'satisfied', skipped: false });
  assert.ok(Date.now() - started >= 25);

  started = Date.now();
  await evaluator.wait({ type: 'range', min: 0.02, max: 0.06 });
  const elapsed = Date.now() - started;
  assert.ok(elapsed >= 35 && elapsed < 1000);
});

test('clock waits sleep until the target time', async () => {
  const { evaluator } = setup(new ScriptedScreen(), fastConfig(), {
    now: () => new Date(2026, 0, 10, 14, 29, 59, 950),
  });
  const started = Date.now();
  await evaluator.wait({ type: 'clock', target: { kind: 'time', hour: 14, minute: 30 } });
  const elapsed = Date.now() - started;
  assert.ok(elapsed >= 45 && elapsed < 1000);
});

test('a skipped delay resolves delay-then-pixel without polling', async () => {
  const screen = new ScriptedScreen();
  const { evaluator, control } = setup(screen);

  const waiting = evaluator.wait({ type: 'delayThenPixel', seconds: 5, pixel: redAt() });
  await delay(20);
  control.signal('skip');

  assert.deepEqual(await waiting, { status: 'satisfied', skipped: true });
  assert.equal(screen.pixelReads, 0);
});

test('delay-then-pixel polls once the delay has run', async () => {
  const screen = new ScriptedScreen(() => RED);
  const { evaluator } = setup(screen);
  assert.deepEqual(
    await evaluator.wait({ type: 'delayThenPixel', seconds: 0.01, pixel: redAt() }),
    { status: 'satisfied', skipped: false }
  );
  assert.equal(screen.pixelReads, 1);
});

// ── number ──

class FixedReader implements NumberRecognizer {
  reads = 0;
  constructor(private value: number | null) {}
  read(): number | null {
    this.reads++;
    return this.value;
  }
}

const numberStep = { region: { x: 0, y: 0, width: 20, height: 10 }, comparator: '>' as const, threshold: 100 };

test('number: a reading of 150 satisfies > 100 on the first poll', async () => {
  const screen = new ScriptedScreen();
  const reader = new FixedReader(150);
  const { evaluator } = setup(screen, fastConfig(), { numberReader: reader });

  assert.deepEqual(await evaluator.waitNumber(numberStep), { status: 'satisfied', skipped: false });
  assert.equal(reader.reads, 1);
  assert.deepEqual(screen.captures, [numberStep.region]);
});

test('number: no reading counts as not satisfied', async () => {
  const reader = new FixedReader(null);
  const { evaluator } = setup(new ScriptedScreen(), fastConfig(), { numberReader: reader });

  const outcome = await evaluator.waitNumber(numberStep);
  assert.equal(outcome.status, 'timed_out');
  assert.equal(reader.reads, 2);
});

test('number: a wait needs a reader', () => {
  const { evaluator } = setup(new ScriptedScreen());
  assert.throws(() => evaluator.waitNumber(numberStep), /requires a number reader/);
});

// ── scan ──

/** Matches `A` when the slot region is red. */
class RedMatcher implements ProfileMatcher {
  async matchProfile(region: PixelBuffer, profile: ItemProfile, _context: MatchContext): Promise<ProfileMatch> {
    const red = region.data[0] === 255;
    return { matched: red && profile.name === 'A', confidence: red ? 1 : 0 };
  }
}

const lootScan: ItemScanConfig = {
  name: 'loot',
  slots: [{ name: 's1', order: 1, region: { x: 0, y: 0, width: 4, height: 4 } }],
  items: [
    { name: 'A', priority: 1, markers: [], markerPolicy: 'require-all', minConfidence: 0.8 },
    { name: 'B', priority: 2, markers: [], markerPolicy: 'require-all', minConfidence: 0.8 },
  ],
  defaultMode: 'all',
};

function scanSetup(redFrom: number, redUntil = Infinity, timeoutSeconds = 1) {
  let captures = 0;
  const screen = new ScriptedScreen(undefined, rect => {
    captures++;
    const red = captures >= redFrom && captures < redUntil;
    return createBuffer(rect.width, rect.height, red ? RED : BLACK);
  });
  const config = fastConfig({ scan: { timeoutSeconds } });
  const resolver = new ItemScanResolver(screen, new RedMatcher(), config);
  return { screen, ...setup(screen, config, { resolver }) };
}

test('scan: appear resolves once an item shows', async () => {
  const { evaluator, screen } = scanSetup(2);
  assert.deepEqual(await evaluator.waitScan(lootScan, 'appear'), { status: 'satisfied', skipped: false });
  assert.equal(screen.captures.length, 2);
});

test('scan: gone resolves once the item leaves', async () => {
  const { evaluator, screen } = scanSetup(1, 3);
  assert.deepEqual(await evaluator.waitScan(lootScan, 'gone'), { status: 'satisfied', skipped: false });
  assert.equal(screen.captures.length, 3);
});

test('scan: an item filter ignores other items', async () => {
  assert.equal((await scanSetup(1).evaluator.waitScan(lootScan, 'appear', 'A')).status, 'satisfied');

  const outcome = await scanSetup(1, Infinity, 0.02).evaluator.waitScan(lootScan, 'appear', 'B');
  assert.equal(outcome.status, 'timed_out');
});

test('scan: a wait needs a resolver', () => {
  const { evaluator } = setup(new ScriptedScreen());
  assert.throws(() => evaluator.waitScan(lootScan, 'appear'), /requires an item-scan resolver/);
});
