/**
 * item-scan.ts - アイテムスキャン
 *
 * Captures each slot of a scan once, matches it against every bound item
 * profile and reduces the per-slot hits to a click list:
 *
 *   all   - one hit per category, lowest priority wins (default)
 *   best  - the single lowest-priority hit
 *   every - every slot hit, duplicates included
 *
 * Within a slot the lowest-priority profile wins and confidence breaks ties.
 * Across slots, ties on priority go to the hit seen first in scan order.
 */

import type { EngineConfig } from '../core/config';
import type { ControlToken } from '../core/control';
import { Logger, silentLogger } from '../core/logger';
import type { ItemProfile, ItemScanConfig, ItemSlot, ScanMode, ScreenPosition } from '../core/types';
import type { ProfileMatcher } from './image-matcher';
import { rectCenter, type ScreenSource } from './screen';

// ── 型定義 ────────────────────────────────────────────

export interface ConfirmClick {
  x: number;
  y: number;
  delayMs: number;
}

export interface ScanHit {
  slot: ItemSlot;
  item: ItemProfile;
  target: ScreenPosition;
  confidence: number;
  /** Position of the slot in this scan's visiting order. */
  scanIndex: number;
  confirm?: ConfirmClick;
}

export interface ResolveOptions {
  /** Polling use: no confirmation clicks are planned. */
  readOnly?: boolean;
}

// ── リゾルバ ──────────────────────────────────────────

export class ItemScanResolver {
  private readonly log: Logger;

  constructor(
    private readonly screen: ScreenSource,
    private readonly matcher: ProfileMatcher,
    private readonly config: EngineConfig,
    logger: Logger = silentLogger(),
    private readonly control?: ControlToken
  ) {
    this.log = logger.child('scan');
  }

  async resolve(scan: ItemScanConfig, mode: ScanMode = scan.defaultMode, options: ResolveOptions = {}): Promise<ScanHit[]> {
    const hits = await this.collectHits(scan, options);
    const result = reduceHits(hits, mode);

    const level = options.readOnly ? 'debug' : 'info';
    this.log.log(level, `${scan.name} (${mode}): ${hits.length} slot hit(s), ${result.length} selected`);
    for (const hit of result) {
      this.log.debug(`  ${hit.slot.name} → ${hit.item.name} (${hit.confidence.toFixed(2)})`);
    }
    return result;
  }

  /**
   * Best profile per slot, in visiting order. Slots without a match are left out.
   */
  async collectHits(scan: ItemScanConfig, options: ResolveOptions = {}): Promise<ScanHit[]> {
    const slots = orderSlots(scan.slots, scan.reverse ?? this.config.scan.reverse);
    const tolerance = scan.colorTolerance ?? this.config.scan.colorTolerance;
    const hits: ScanHit[] = [];

    for (let i = 0; i < slots.length; i++) {
      if (i > 0 && this.config.scan.slotDelayMs > 0) {
        await this.pause(this.config.scan.slotDelayMs);
      }

      const slot = slots[i];
      const region = await this.screen.captureRegion(slot.region);

      let best: { item: ItemProfile; confidence: number } | null = null;
      for (const item of scan.items) {
        const match = await this.matcher.matchProfile(region, item, { tolerance });
        if (!match.matched) continue;
        if (!best || isBetter(match.confidence, item, best.confidence, best.item)) {
          best = { item, confidence: match.confidence };
        }
      }

      if (!best) continue;

      const target = slot.click ?? rectCenter(slot.region);
      hits.push({
        slot,
        item: best.item,
        target,
        confidence: best.confidence,
        scanIndex: i,
        confirm: options.readOnly ? undefined : confirmFor(best.item, target),
      });
    }

    return hits;
  }

  private async pause(ms: number): Promise<void> {
    if (this.control) {
      await this.control.hold(ms);
    } else {
      await new Promise<void>(resolve => setTimeout(resolve, ms));
    }
  }
}

// ── 集約 ──────────────────────────────────────────────

export function reduceHits(hits: ScanHit[], mode: ScanMode): ScanHit[] {
  switch (mode) {
    case 'every':
      return [...hits];

    case 'best': {
      let winner: ScanHit | null = null;
      for (const hit of hits) {
        if (!winner || hit.item.priority < winner.item.priority) winner = hit;
      }
      return winner ? [winner] : [];
    }

    case 'all': {
      const winners = new Map<string, ScanHit>();
      for (const hit of hits) {
        const key = categoryKey(hit.item);
        const current = winners.get(key);
        if (!current || hit.item.priority < current.item.priority) {
          winners.set(key, hit);
        }
      }
      return [...winners.values()].sort((a, b) => a.scanIndex - b.scanIndex);
    }
  }
}

/** An item without a category competes with nothing but itself. */
export function categoryKey(item: ItemProfile): string {
  return item.category !== undefined ? `category:${item.category}` : `item:${item.name}`;
}

export function orderSlots(slots: ItemSlot[], reverse: boolean): ItemSlot[] {
  const ordered = [...slots].sort((a, b) => a.order - b.order);
  return reverse ? ordered.reverse() : ordered;
}

function isBetter(confidence: number, item: ItemProfile, bestConfidence: number, bestItem: ItemProfile): boolean {
  if (item.priority !== bestItem.priority) return item.priority < bestItem.priority;
  return confidence > bestConfidence;
}

function confirmFor(item: ItemProfile, target: ScreenPosition): ConfirmClick | undefined {
  if (!item.confirm) return undefined;
  const { target: at, delaySeconds } = item.confirm;
  const delayMs = delaySeconds * 1000;
  return at.type === 'offset'
    ? { x: target.x + at.dx, y: target.y + at.dy, delayMs }
    : { x: at.x, y: at.y, delayMs };
}
