import { createConfig, type EngineConfig, type EngineConfigOverrides } from '../src/lib/core/config';
import type { Color, Rect } from '../src/lib/core/types';
import { createBuffer, type PixelBuffer, type ScreenSource } from '../src/lib/auto/screen';

export const BLACK: Color = { r: 0, g: 0, b: 0 };
export const WHITE: Color = { r: 255, g: 255, b: 255 };
export const RED: Color = { r: 255, g: 0, b: 0 };
export const GREEN: Color = { r: 0, g: 255, b: 0 };
export const BLUE: Color = { r: 0, g: 0, b: 255 };

/**
 * Millisecond-scale config: 20 ms trigger budgets at 10 ms polls (two polls),
 * no click delays, fail-safe off.
 */
export function fastConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return createConfig({
    clicks: { postClickDelayMs: 0, ...overrides.clicks },
    failsafe: { enabled: false, ...overrides.failsafe },
    pixel: { timeoutSeconds: 0.02, pollIntervalMs: 10, ...overrides.pixel },
    scan: { slotDelayMs: 0, itemClickDelayMs: 0, timeoutSeconds: 0.02, pollIntervalMs: 10, ...overrides.scan },
    number: { timeoutSeconds: 0.02, pollIntervalMs: 10, ...overrides.number },
    timing: { sliceMs: 5, ...overrides.timing },
    log: overrides.log,
  });
}

/**
 * Screen whose pixel colors are a function of the read count, so tests can
 * script "appears on the third poll".
 */
export class ScriptedScreen implements ScreenSource {
  pixelReads = 0;
  readonly captures: Rect[] = [];

  constructor(
    private pixel: (x: number, y: number, read: number) => Color = () => BLACK,
    private region: (rect: Rect) => PixelBuffer = (rect) => createBuffer(rect.width, rect.height)
  ) {}

  async readPixel(x: number, y: number): Promise<Color> {
    this.pixelReads++;
    return this.pixel(x, y, this.pixelReads);
  }

  async captureRegion(rect: Rect): Promise<PixelBuffer> {
    this.captures.push(rect);
    return this.region(rect);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Renders rows of `#` / `.` into a buffer, `#` in `fg`. */
export function bitmap(rows: string[], fg: Color = WHITE, bg: Color = BLACK): PixelBuffer {
  const width = Math.max(...rows.map(r => r.length));
  const buffer = createBuffer(width, rows.length, bg);
  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      if (row[x] !== '#') continue;
      const i = (y * width + x) * 4;
      buffer.data[i] = fg.r;
      buffer.data[i + 1] = fg.g;
      buffer.data[i + 2] = fg.b;
    }
  });
  return buffer;
}
