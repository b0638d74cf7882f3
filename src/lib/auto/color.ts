/**
 * Visual Sequencer - 色比較
 *
 * Distance is the largest absolute difference over the R, G and B channels.
 * A tolerance of 10 therefore accepts (100, 100, 100) for (110, 95, 100).
 */

import type { Color } from '../core/types';

export function colorDistance(a: Color, b: Color): number {
  return Math.max(
    Math.abs(a.r - b.r),
    Math.abs(a.g - b.g),
    Math.abs(a.b - b.b)
  );
}

export function withinTolerance(actual: Color, expected: Color, tolerance: number): boolean {
  return colorDistance(actual, expected) <= tolerance;
}

/** ITU-R BT.601 luma, 0..255. */
export function luminance(c: Color): number {
  return 0.299 * c.r + 0.587 * c.g + 0.114 * c.b;
}

export function toHex(c: Color): string {
  const hex = (v: number) => v.toString(16).padStart(2, '0');
  return `#${hex(c.r)}${hex(c.g)}${hex(c.b)}`;
}

/** Accepts `#rrggbb` or `rrggbb`; null otherwise. */
export function parseHex(text: string): Color | null {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(text.trim());
  if (!match) return null;
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}
