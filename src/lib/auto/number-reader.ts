/**
 * number-reader.ts - 数値認識
 *
 * Reads a decimal value out of a captured region using learned glyph images:
 * binarize, split into column runs, match each run against every glyph,
 * assemble the surviving symbols left to right.
 *
 * Never throws; "no number" is `null`.
 */

import Jimp from 'jimp';
import * as fs from 'fs';
import * as path from 'path';
import type { Color, Comparator } from '../core/types';
import { luminance, withinTolerance } from './color';
import { pixelAt, type PixelBuffer } from './screen';

// ── 型定義 ────────────────────────────────────────────

/** Foreground bitmap, row-major, 1 = text pixel. */
export interface BinaryMask {
  width: number;
  height: number;
  bits: Uint8Array;
}

export interface Glyph {
  /** `0`-`9`, `.`, `,`, or a suffix `K` / `M` / `B` in either case. */
  symbol: string;
  image: PixelBuffer;
}

export interface RecognizedChar {
  symbol: string;
  x: number;
  confidence: number;
}

export interface ReadOptions {
  minConfidence: number;
  /** When set, only pixels within `colorTolerance` of it count as text. */
  textColor?: Color;
  colorTolerance: number;
}

const LUMINANCE_THRESHOLD = 127;

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

const FILE_SYMBOLS: Record<string, string> = {
  dot: '.',
  comma: ',',
};

const VALID_SYMBOL = /^[0-9.,KMBkmb]$/;

// ── グリフセット ──────────────────────────────────────

export class GlyphSet {
  readonly glyphs: readonly Glyph[];

  constructor(glyphs: Glyph[]) {
    for (const glyph of glyphs) {
      if (!VALID_SYMBOL.test(glyph.symbol)) {
        throw new Error(`Unsupported glyph symbol: '${glyph.symbol}'`);
      }
    }
    this.glyphs = glyphs;
  }

  get size(): number {
    return this.glyphs.length;
  }

  /**
   * Loads every `<name>.png` in a directory. `name` is the symbol, or `dot` /
   * `comma`; anything after an underscore marks a variant (`7_bold.png`).
   */
  static async fromDirectory(dir: string): Promise<GlyphSet> {
    if (!fs.existsSync(dir)) {
      return new GlyphSet([]);
    }

    const glyphs: Glyph[] = [];
    const files = fs.readdirSync(dir).filter(f => f.toLowerCase().endsWith('.png')).sort();
    for (const file of files) {
      const symbol = symbolForFile(file);
      if (!symbol) continue;
      const image = await Jimp.read(path.join(dir, file));
      glyphs.push({ symbol, image: image.bitmap });
    }
    return new GlyphSet(glyphs);
  }
}

export function symbolForFile(file: string): string | null {
  const base = path.basename(file, path.extname(file)).split('_')[0];
  const symbol = FILE_SYMBOLS[base.toLowerCase()] ?? base;
  return VALID_SYMBOL.test(symbol) ? symbol : null;
}

// ── 認識 ──────────────────────────────────────────────

export function readNumber(region: PixelBuffer, glyphSet: GlyphSet, options: ReadOptions): number | null {
  if (glyphSet.size === 0 || region.width === 0 || region.height === 0) {
    return null;
  }
  const chars = recognizeChars(region, glyphSet, options);
  return charsToNumber(chars.map(c => c.symbol));
}

/**
 * Segments the region and keeps, per segment, the best glyph at or above
 * `minConfidence`. Result is ordered left to right.
 */
export function recognizeChars(region: PixelBuffer, glyphSet: GlyphSet, options: ReadOptions): RecognizedChar[] {
  const mask = binarize(region, options.textColor, options.colorTolerance);
  const templates = glyphSet.glyphs.map(g => ({
    symbol: g.symbol,
    mask: cropToContent(binarize(g.image, options.textColor, options.colorTolerance)),
  }));

  const found: RecognizedChar[] = [];
  for (const segment of segmentColumns(mask)) {
    let best: RecognizedChar | null = null;
    for (const template of templates) {
      if (!template.mask) continue;
      const confidence = jaccard(segment.mask, template.mask);
      if (confidence >= options.minConfidence && (!best || confidence > best.confidence)) {
        best = { symbol: template.symbol, x: segment.x, confidence };
      }
    }
    if (best) found.push(best);
  }

  return found.sort((a, b) => a.x - b.x);
}

/**
 * Text color within tolerance counts as foreground; without a text color,
 * pixels brighter than mid-grey do.
 */
export function binarize(image: PixelBuffer, textColor: Color | undefined, tolerance: number): BinaryMask {
  const bits = new Uint8Array(image.width * image.height);
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const color = pixelAt(image, x, y);
      if (!color) continue;
      const on = textColor
        ? withinTolerance(color, textColor, tolerance)
        : luminance(color) > LUMINANCE_THRESHOLD;
      bits[y * image.width + x] = on ? 1 : 0;
    }
  }
  return { width: image.width, height: image.height, bits };
}

/**
 * Splits a mask into runs of columns that contain foreground, each cropped to
 * its bounding box. `x` is the run's left column in the source mask.
 */
export function segmentColumns(mask: BinaryMask): Array<{ x: number; mask: BinaryMask }> {
  const segments: Array<{ x: number; mask: BinaryMask }> = [];
  let start = -1;

  for (let x = 0; x <= mask.width; x++) {
    const filled = x < mask.width && columnHasInk(mask, x);
    if (filled && start < 0) {
      start = x;
    } else if (!filled && start >= 0) {
      const cropped = cropToContent(sliceColumns(mask, start, x));
      if (cropped) segments.push({ x: start, mask: cropped });
      start = -1;
    }
  }

  return segments;
}

/**
 * Foreground intersection over union, best over ±1 px of alignment.
 */
export function jaccard(a: BinaryMask, b: BinaryMask): number {
  let best = 0;
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      best = Math.max(best, jaccardAt(a, b, dx, dy));
    }
  }
  return best;
}

function jaccardAt(a: BinaryMask, b: BinaryMask, dx: number, dy: number): number {
  // b is placed at (dx, dy) in a's coordinates
  const left = Math.min(0, dx);
  const top = Math.min(0, dy);
  const right = Math.max(a.width, b.width + dx);
  const bottom = Math.max(a.height, b.height + dy);

  let intersection = 0;
  let union = 0;
  for (let y = top; y < bottom; y++) {
    for (let x = left; x < right; x++) {
      const inA = bit(a, x, y);
      const inB = bit(b, x - dx, y - dy);
      if (inA && inB) intersection++;
      if (inA || inB) union++;
    }
  }
  return union === 0 ? 0 : intersection / union;
}

function bit(mask: BinaryMask, x: number, y: number): boolean {
  if (x < 0 || y < 0 || x >= mask.width || y >= mask.height) return false;
  return mask.bits[y * mask.width + x] === 1;
}

function columnHasInk(mask: BinaryMask, x: number): boolean {
  for (let y = 0; y < mask.height; y++) {
    if (mask.bits[y * mask.width + x] === 1) return true;
  }
  return false;
}

function sliceColumns(mask: BinaryMask, from: number, to: number): BinaryMask {
  const width = to - from;
  const bits = new Uint8Array(width * mask.height);
  for (let y = 0; y < mask.height; y++) {
    for (let x = 0; x < width; x++) {
      bits[y * width + x] = mask.bits[y * mask.width + from + x];
    }
  }
  return { width, height: mask.height, bits };
}

/** Bounding box of the foreground, or null for an empty mask. */
export function cropToContent(mask: BinaryMask): BinaryMask | null {
  let minX = mask.width;
  let minY = mask.height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < mask.height; y++) {
    for (let x = 0; x < mask.width; x++) {
      if (mask.bits[y * mask.width + x] !== 1) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) return null;

  const width = maxX - minX + 1;
  const height = maxY - minY + 1;
  const bits = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      bits[y * width + x] = mask.bits[(y + minY) * mask.width + x + minX];
    }
  }
  return { width, height, bits };
}

// ── 数値化 ────────────────────────────────────────────

/**
 * Assembles recognized symbols into a value.
 *   - trailing K / M / B (either case) multiplies by 1e3 / 1e6 / 1e9
 *   - `,` reads as `.`
 *   - with several dots, all but the last are thousands separators
 * Null when no digit is present or the rest does not form a number.
 */
export function charsToNumber(symbols: string[]): number | null {
  let text = symbols.join('');
  if (!/[0-9]/.test(text)) return null;

  let multiplier = 1;
  const last = text.slice(-1).toUpperCase();
  if (last in SUFFIX_MULTIPLIERS) {
    multiplier = SUFFIX_MULTIPLIERS[last];
    text = text.slice(0, -1);
  }

  text = text.replace(/,/g, '.');

  const parts = text.split('.');
  if (parts.length > 2) {
    text = `${parts.slice(0, -1).join('')}.${parts[parts.length - 1]}`;
  }

  if (!/^(\d+\.?\d*|\.\d+)$/.test(text)) return null;
  return parseFloat(text) * multiplier;
}

const EQUALITY_EPSILON = 0.001;

export function compare(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case '>': return value > threshold;
    case '<': return value < threshold;
    case '>=': return value >= threshold;
    case '<=': return value <= threshold;
    case '==': return Math.abs(value - threshold) < EQUALITY_EPSILON;
    case '!=': return Math.abs(value - threshold) >= EQUALITY_EPSILON;
  }
}

// ── 読み取り器 ────────────────────────────────────────

/** Number source polled by number waits. */
export interface NumberRecognizer {
  read(region: PixelBuffer, textColor?: Color): number | null;
}

/**
 * Binds a glyph set to the reader options so callers only pass the region.
 */
export class NumberReader implements NumberRecognizer {
  constructor(
    private readonly glyphSet: GlyphSet,
    private readonly defaults: ReadOptions
  ) {}

  read(region: PixelBuffer, textColor?: Color): number | null {
    return readNumber(region, this.glyphSet, {
      ...this.defaults,
      textColor: textColor ?? this.defaults.textColor,
    });
  }
}
