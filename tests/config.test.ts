import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { test } from 'node:test';
import { ZodError } from 'zod';
import { DEFAULT_CONFIG, createConfig, loadConfig } from '../src/lib/core/config';

function tempFile(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vseq-config-'));
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

test('defaults', () => {
  assert.equal(DEFAULT_CONFIG.pixel.tolerance, 10);
  assert.equal(DEFAULT_CONFIG.pixel.timeoutSeconds, 300);
  assert.equal(DEFAULT_CONFIG.pixel.pollIntervalMs, 1000);
  assert.equal(DEFAULT_CONFIG.scan.colorTolerance, 40);
  assert.equal(DEFAULT_CONFIG.clicks.clicksPerPoint, 1);
  assert.equal(DEFAULT_CONFIG.clicks.maxTotalClicks, null);
  assert.deepEqual(
    { enabled: DEFAULT_CONFIG.failsafe.enabled, x: DEFAULT_CONFIG.failsafe.x, y: DEFAULT_CONFIG.failsafe.y },
    { enabled: true, x: 5, y: 5 }
  );
});

test('configs are frozen', () => {
  const config = createConfig({ pixel: { tolerance: 20 } });
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.pixel));
  assert.ok(Object.isFrozen(DEFAULT_CONFIG.scan));
});

test('overrides merge per group', () => {
  const config = createConfig({ pixel: { tolerance: 20 }, clicks: { clicksPerPoint: 3 } });
  assert.equal(config.pixel.tolerance, 20);
  assert.equal(config.pixel.timeoutSeconds, 300);
  assert.equal(config.clicks.clicksPerPoint, 3);
  assert.equal(config.clicks.postClickDelayMs, 50);
});

test('out-of-range values are rejected', () => {
  assert.throws(() => createConfig({ pixel: { tolerance: 300 } }), ZodError);
  assert.throws(() => createConfig({ clicks: { clicksPerPoint: 0 } }), ZodError);
});

test('a missing file yields the defaults', () => {
  assert.equal(loadConfig(path.join(os.tmpdir(), 'vseq-does-not-exist.json')), DEFAULT_CONFIG);
});

test('a config file overrides the defaults', () => {
  const file = tempFile('config.json', JSON.stringify({ clicks: { clicksPerPoint: 2 }, log: { level: 'debug' } }));
  const config = loadConfig(file);
  assert.equal(config.clicks.clicksPerPoint, 2);
  assert.equal(config.log.level, 'debug');
  assert.equal(config.pixel.tolerance, 10);
});

test('a file that is not JSON is an error', () => {
  const file = tempFile('broken.json', '{ clicks: ');
  assert.throws(() => loadConfig(file), /^Error: Could not parse /);
});

test('unknown value types are rejected', () => {
  const file = tempFile('typed.json', JSON.stringify({ pixel: { tolerance: 'high' } }));
  assert.throws(() => loadConfig(file), ZodError);
});
