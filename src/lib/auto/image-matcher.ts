/**
 * image-matcher.ts - アイテムプロファイル照合
 *
 * A profile matches a captured slot region when
 *   1. its marker colors satisfy the marker policy, and
 *   2. when a template is set, the template's best SAD position inside the
 *      region reaches the profile's minimum confidence.
 *
 * アルゴリズム: SAD（Sum of Absolute Differences）
 *   - 同一PC上のスクリーンショット同士なので明るさ変化は問題にならない
 *   - confidence = 1 - SAD / maxSAD（1.0 = 完全一致）
 */

import Jimp from 'jimp';
import * as fs from 'fs';
import * as path from 'path';
import type { ItemProfile, Marker, MarkerPolicy } from '../core/types';
import { withinTolerance } from './color';
import { pixelAt, type PixelBuffer } from './screen';

// ── 型定義 ────────────────────────────────────────────

export interface ProfileMatch {
  matched: boolean;
  /** 0.0〜1.0 */
  confidence: number;
}

export interface MatchContext {
  /** Marker color tolerance (max per-channel difference). */
  tolerance: number;
}

/**
 * Visual matcher capability consumed by the item-scan resolver.
 */
export interface ProfileMatcher {
  matchProfile(region: PixelBuffer, profile: ItemProfile, context: MatchContext): Promise<ProfileMatch>;
}

export interface TemplateSource {
  getTemplate(name: string): Promise<PixelBuffer | null>;
}

export interface TemplateMatch {
  x: number;
  y: number;
  confidence: number;
}

export interface MarkerResult {
  hits: number;
  required: number;
  satisfied: boolean;
}

// ── テンプレートストア ──────────────────────────────────

/**
 * PNG templates in a directory, loaded with Jimp and cached by file name.
 * Buffers registered in memory take precedence over files.
 */
export class TemplateStore implements TemplateSource {
  private templatesDir: string | null;
  private templateCache: Map<string, PixelBuffer> = new Map();

  constructor(templatesDir: string | null = null) {
    this.templatesDir = templatesDir;
  }

  register(name: string, template: PixelBuffer): void {
    this.templateCache.set(safeName(name), template);
  }

  async getTemplate(name: string): Promise<PixelBuffer | null> {
    const file = safeName(name);
    const cached = this.templateCache.get(file);
    if (cached) return cached;

    if (!this.templatesDir) return null;
    const filePath = path.join(this.templatesDir, file);
    if (!fs.existsSync(filePath)) return null;

    const image = await Jimp.read(filePath);
    this.templateCache.set(file, image.bitmap);
    return image.bitmap;
  }
}

function safeName(name: string): string {
  return name.endsWith('.png') ? name : `${name}.png`;
}

// ── 照合 ──────────────────────────────────────────────

export class ImageMatcher implements ProfileMatcher {
  private templates: TemplateSource;
  private grayscale: boolean;

  constructor(templates: TemplateSource, options: { grayscale?: boolean } = {}) {
    this.templates = templates;
    this.grayscale = options.grayscale ?? true;
  }

  async matchProfile(region: PixelBuffer, profile: ItemProfile, context: MatchContext): Promise<ProfileMatch> {
    if (profile.markers.length === 0 && !profile.template) {
      return { matched: false, confidence: 0 };
    }

    const markers = evaluateMarkers(region, profile.markers, profile.markerPolicy, context.tolerance);
    if (!markers.satisfied) {
      return { matched: false, confidence: markerConfidence(markers, profile.markers.length) };
    }

    if (!profile.template) {
      return { matched: true, confidence: markerConfidence(markers, profile.markers.length) };
    }

    const template = await this.templates.getTemplate(profile.template);
    if (!template) {
      return { matched: false, confidence: 0 };
    }

    const best = matchSAD(region, template, this.grayscale);
    const confidence = best?.confidence ?? 0;
    return { matched: confidence >= profile.minConfidence, confidence };
  }
}

function markerConfidence(result: MarkerResult, total: number): number {
  return total === 0 ? 1 : result.hits / total;
}

/**
 * Samples each marker offset in the region and counts those within tolerance.
 * Offsets outside the region never hit.
 */
export function evaluateMarkers(
  region: PixelBuffer,
  markers: Marker[],
  policy: MarkerPolicy,
  tolerance: number
): MarkerResult {
  let hits = 0;
  for (const marker of markers) {
    const actual = pixelAt(region, marker.dx, marker.dy);
    if (actual && withinTolerance(actual, marker.color, tolerance)) {
      hits++;
    }
  }

  const required = policy === 'require-all'
    ? markers.length
    : Math.min(policy.minimum, markers.length);

  return { hits, required, satisfied: hits >= required };
}

/**
 * SAD（Sum of Absolute Differences）テンプレートマッチング
 *
 * Slides the template over the region and returns the position with the
 * lowest pixel difference, or null when the template is larger than the region.
 */
export function matchSAD(region: PixelBuffer, template: PixelBuffer, grayscale = true): TemplateMatch | null {
  const sw = region.width;
  const sh = region.height;
  const tw = template.width;
  const th = template.height;

  if (tw > sw || th > sh || tw === 0 || th === 0) {
    return null;
  }

  const src = region.data;
  const tpl = template.data;
  const channels = grayscale ? 1 : 3;
  const maxPossibleSAD = tw * th * 255 * channels;

  let minSAD = Infinity;
  let bestX = 0;
  let bestY = 0;

  for (let y = 0; y <= sh - th; y++) {
    for (let x = 0; x <= sw - tw; x++) {
      let sad = 0;

      for (let ty = 0; ty < th; ty++) {
        const srcRowOffset = ((y + ty) * sw + x) * 4;
        const tplRowOffset = (ty * tw) * 4;

        for (let tx = 0; tx < tw; tx++) {
          const si = srcRowOffset + tx * 4;
          const ti = tplRowOffset + tx * 4;

          if (grayscale) {
            sad += Math.abs(gray(src, si) - gray(tpl, ti));
          } else {
            sad += Math.abs(src[si] - tpl[ti]);
            sad += Math.abs(src[si + 1] - tpl[ti + 1]);
            sad += Math.abs(src[si + 2] - tpl[ti + 2]);
          }
        }

        // 早期打ち切り：既にminSADを超えたらこの位置はスキップ
        if (sad >= minSAD) break;
      }

      if (sad < minSAD) {
        minSAD = sad;
        bestX = x;
        bestY = y;
      }
    }
  }

  return {
    x: bestX,
    y: bestY,
    confidence: 1.0 - (minSAD / maxPossibleSAD),
  };
}

function gray(data: Buffer, i: number): number {
  return Math.round(0.299 * data[i] + 0.587 * data[i + 1] + 0.114 * data[i + 2]);
}
