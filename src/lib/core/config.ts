/**
 * Visual Sequencer - エンジン設定
 *
 * Immutable configuration handed to the runner, the trigger evaluator and the
 * resolver at construction. Values come from DEFAULT_CONFIG merged with an
 * optional JSON file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILE = './visual-sequencer.json';

// ─── 設定スキーマ ────────────────────────────────────

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ClicksSchema = z.object({
  clicksPerPoint: z.number().int().min(1),
  maxTotalClicks: z.number().int().min(1).nullable(),
  postClickDelayMs: z.number().min(0),
});

const FailSafeSchema = z.object({
  enabled: z.boolean(),
  /** Pointer with x <= this and y <= this trips the fail-safe. */
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  checkIntervalMs: z.number().min(0),
});

const PixelSchema = z.object({
  tolerance: z.number().min(0).max(255),
  timeoutSeconds: z.number().positive(),
  pollIntervalMs: z.number().positive(),
});

const ScanSchema = z.object({
  colorTolerance: z.number().min(0).max(255),
  reverse: z.boolean(),
  slotDelayMs: z.number().min(0),
  itemClickDelayMs: z.number().min(0),
  timeoutSeconds: z.number().positive(),
  pollIntervalMs: z.number().positive(),
  defaultMinConfidence: z.number().min(0).max(1),
});

const NumberSchema = z.object({
  timeoutSeconds: z.number().positive(),
  pollIntervalMs: z.number().positive(),
  minConfidence: z.number().min(0).max(1),
  colorTolerance: z.number().min(0).max(255),
});

const TimingSchema = z.object({
  sliceMs: z.number().positive(),
});

const LogSchema = z.object({
  level: LogLevelSchema,
  dir: z.string().nullable(),
});

export const EngineConfigSchema = z.object({
  clicks: ClicksSchema,
  failsafe: FailSafeSchema,
  pixel: PixelSchema,
  scan: ScanSchema,
  number: NumberSchema,
  timing: TimingSchema,
  log: LogSchema,
});

const PartialConfigSchema = z.object({
  clicks: ClicksSchema.partial().optional(),
  failsafe: FailSafeSchema.partial().optional(),
  pixel: PixelSchema.partial().optional(),
  scan: ScanSchema.partial().optional(),
  number: NumberSchema.partial().optional(),
  timing: TimingSchema.partial().optional(),
  log: LogSchema.partial().optional(),
});

export type EngineConfig = Readonly<{
  [K in keyof z.infer<typeof EngineConfigSchema>]: Readonly<z.infer<typeof EngineConfigSchema>[K]>;
}>;

export type EngineConfigOverrides = z.infer<typeof PartialConfigSchema>;

// ─── デフォルト ──────────────────────────────────────

export const DEFAULT_CONFIG: EngineConfig = deepFreeze<EngineConfig>({
  clicks: {
    clicksPerPoint: 1,
    maxTotalClicks: null,
    postClickDelayMs: 50,
  },
  failsafe: {
    enabled: true,
    x: 5,
    y: 5,
    checkIntervalMs: 250,
  },
  pixel: {
    tolerance: 10,
    timeoutSeconds: 300,
    pollIntervalMs: 1000,
  },
  scan: {
    colorTolerance: 40,
    reverse: false,
    slotDelayMs: 100,
    itemClickDelayMs: 1000,
    timeoutSeconds: 300,
    pollIntervalMs: 1000,
    defaultMinConfidence: 0.8,
  },
  number: {
    timeoutSeconds: 300,
    pollIntervalMs: 1000,
    minConfidence: 0.8,
    colorTolerance: 50,
  },
  timing: {
    sliceMs: 50,
  },
  log: {
    level: 'info',
    dir: null,
  },
});

// ─── 構築 ────────────────────────────────────────────

/**
 * Merges overrides group by group onto a base config and freezes the result.
 * Throws a ZodError when the merged value is out of range.
 */
export function createConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_CONFIG
): EngineConfig {
  const merged = {
    clicks: { ...base.clicks, ...overrides.clicks },
    failsafe: { ...base.failsafe, ...overrides.failsafe },
    pixel: { ...base.pixel, ...overrides.pixel },
    scan: { ...base.scan, ...overrides.scan },
    number: { ...base.number, ...overrides.number },
    timing: { ...base.timing, ...overrides.timing },
    log: { ...base.log, ...overrides.log },
  };
  return deepFreeze(EngineConfigSchema.parse(merged));
}

/**
 * Reads a JSON config file. A missing file yields the defaults; a file that
 * does not parse or validate is an error.
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_FILE): EngineConfig {
  const configPath = path.resolve(filePath);
  if (!fs.existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Could not parse ${configPath}: ${reason}`);
  }

  const overrides = PartialConfigSchema.parse(json);
  return createConfig(overrides);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
