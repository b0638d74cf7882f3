/**
 * Visual Sequencer - 画面ソース
 *
 * PixelBuffer is the RGBA, row-major layout Jimp keeps in `image.bitmap`, so a
 * Jimp image hands its bitmap straight to the matcher and the number reader.
 */

import Jimp from 'jimp';
import type { Color, Rect, ScreenPosition } from '../core/types';

export interface PixelBuffer {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel. */
  data: Buffer;
}

/**
 * Screen capture collaborator. Coordinates are virtual-desktop coordinates
 * and may be negative on multi-monitor setups.
 */
export interface ScreenSource {
  captureRegion(rect: Rect): Promise<PixelBuffer>;
  readPixel(x: number, y: number): Promise<Color>;
}

// ── バッファ操作 ──────────────────────────────────────

export function createBuffer(width: number, height: number, fill: Color = { r: 0, g: 0, b: 0 }): PixelBuffer {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data[i * 4] = fill.r;
    data[i * 4 + 1] = fill.g;
    data[i * 4 + 2] = fill.b;
    data[i * 4 + 3] = 255;
  }
  return { width, height, data };
}

export function fillRect(buffer: PixelBuffer, rect: Rect, color: Color): void {
  for (let y = Math.max(0, rect.y); y < Math.min(buffer.height, rect.y + rect.height); y++) {
    for (let x = Math.max(0, rect.x); x < Math.min(buffer.width, rect.x + rect.width); x++) {
      setPixel(buffer, x, y, color);
    }
  }
}

export function setPixel(buffer: PixelBuffer, x: number, y: number, color: Color): void {
  const i = (y * buffer.width + x) * 4;
  buffer.data[i] = color.r;
  buffer.data[i + 1] = color.g;
  buffer.data[i + 2] = color.b;
  buffer.data[i + 3] = 255;
}

/** Color at (x, y), or null outside the buffer. */
export function pixelAt(buffer: PixelBuffer, x: number, y: number): Color | null {
  if (x < 0 || y < 0 || x >= buffer.width || y >= buffer.height) return null;
  const i = (y * buffer.width + x) * 4;
  return { r: buffer.data[i], g: buffer.data[i + 1], b: buffer.data[i + 2] };
}

/**
 * Copies `rect` out of `buffer`; pixels outside the source come back black.
 */
export function cropBuffer(buffer: PixelBuffer, rect: Rect): PixelBuffer {
  const out = createBuffer(rect.width, rect.height);
  for (let y = 0; y < rect.height; y++) {
    const sy = rect.y + y;
    if (sy < 0 || sy >= buffer.height) continue;
    for (let x = 0; x < rect.width; x++) {
      const sx = rect.x + x;
      if (sx < 0 || sx >= buffer.width) continue;
      const si = (sy * buffer.width + sx) * 4;
      buffer.data.copy(out.data, (y * rect.width + x) * 4, si, si + 4);
    }
  }
  return out;
}

export function rectCenter(rect: Rect): ScreenPosition {
  return {
    x: rect.x + Math.floor(rect.width / 2),
    y: rect.y + Math.floor(rect.height / 2),
  };
}

// ── 画像ベースのソース ─────────────────────────────────

/**
 * Serves captures from an in-memory frame, e.g. a screenshot PNG. `origin` is
 * the virtual-desktop position of the frame's top-left pixel.
 */
export class ImageScreenSource implements ScreenSource {
  private frame: PixelBuffer;
  private origin: ScreenPosition;

  constructor(frame: PixelBuffer, origin: ScreenPosition = { x: 0, y: 0 }) {
    this.frame = frame;
    this.origin = origin;
  }

  static async fromFile(imagePath: string, origin?: ScreenPosition): Promise<ImageScreenSource> {
    const image = await Jimp.read(imagePath);
    return new ImageScreenSource(image.bitmap, origin);
  }

  /** Replaces the frame; later captures see the new screen. */
  setFrame(frame: PixelBuffer): void {
    this.frame = frame;
  }

  async captureRegion(rect: Rect): Promise<PixelBuffer> {
    return cropBuffer(this.frame, {
      ...rect,
      x: rect.x - this.origin.x,
      y: rect.y - this.origin.y,
    });
  }

  async readPixel(x: number, y: number): Promise<Color> {
    return pixelAt(this.frame, x - this.origin.x, y - this.origin.y) ?? { r: 0, g: 0, b: 0 };
  }
}
