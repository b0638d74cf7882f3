/**
 * Visual Sequencer - トリガー評価
 *
 * Resolves a step's wait. Timed waits sleep through the control token;
 * pixel / number / scan conditions are polled at their configured interval.
 *
 * A poll times out once it has polled ceil(timeout / interval) times or its
 * active (un-paused) elapsed time reaches the timeout. Paused time is not
 * charged to the budget.
 */

import type { ItemScanResolver } from '../auto/item-scan';
import { compare, type NumberRecognizer } from '../auto/number-reader';
import type { ScreenSource } from '../auto/screen';
import { colorDistance, toHex } from '../auto/color';
import type { EngineConfig } from './config';
import type { ControlToken } from './control';
import { Logger, silentLogger } from './logger';
import { describeWait, msUntil } from './time-parser';
import type { ItemScanConfig, PixelTrigger, Polarity, WaitNumberStep, WaitSpec } from './types';

// ── 型定義 ────────────────────────────────────────────

export type WaitOutcome =
  | { status: 'satisfied'; skipped: boolean }
  | { status: 'timed_out'; polls: number; elapsedMs: number };

export interface PollBudget {
  timeoutMs: number;
  intervalMs: number;
}

export interface TriggerEvaluatorOptions {
  screen: ScreenSource;
  control: ControlToken;
  config: EngineConfig;
  resolver?: ItemScanResolver;
  numberReader?: NumberRecognizer;
  logger?: Logger;
  /** [0, 1); drives random-range waits. */
  random?: () => number;
  now?: () => Date;
}

const SATISFIED: WaitOutcome = { status: 'satisfied', skipped: false };
const SKIPPED: WaitOutcome = { status: 'satisfied', skipped: true };

// ── 評価器 ────────────────────────────────────────────

export class TriggerEvaluator {
  private readonly screen: ScreenSource;
  private readonly control: ControlToken;
  private readonly config: EngineConfig;
  private readonly resolver?: ItemScanResolver;
  private readonly numberReader?: NumberRecognizer;
  private readonly log: Logger;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: TriggerEvaluatorOptions) {
    this.screen = options.screen;
    this.control = options.control;
    this.config = options.config;
    this.resolver = options.resolver;
    this.numberReader = options.numberReader;
    this.log = (options.logger ?? silentLogger()).child('trigger');
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async wait(spec: WaitSpec): Promise<WaitOutcome> {
    this.log.debug(`wait ${describeWait(spec)}`);

    switch (spec.type) {
      case 'none':
        await this.control.checkpoint();
        return SATISFIED;

      case 'fixed':
        return this.sleepFor(spec.seconds * 1000);

      case 'range':
        return this.sleepFor((spec.min + this.random() * (spec.max - spec.min)) * 1000);

      case 'pixel':
        return this.waitPixel(spec);

      case 'clock':
        // target fixed at step entry
        return this.sleepFor(msUntil(spec.target, this.now()));

      case 'delayThenPixel': {
        const delay = await this.sleepFor(spec.seconds * 1000);
        if (delay.status === 'satisfied' && delay.skipped) return delay;
        return this.waitPixel(spec.pixel);
      }
    }
  }

  waitPixel(trigger: PixelTrigger): Promise<WaitOutcome> {
    const { tolerance, timeoutSeconds, pollIntervalMs } = this.config.pixel;
    const label = `pixel ${trigger.polarity} ${toHex(trigger.color)} at (${trigger.x}, ${trigger.y})`;

    return this.poll(label, { timeoutMs: timeoutSeconds * 1000, intervalMs: pollIntervalMs }, async () => {
      const actual = await this.screen.readPixel(trigger.x, trigger.y);
      const present = colorDistance(actual, trigger.color) <= tolerance;
      return trigger.polarity === 'appear' ? present : !present;
    });
  }

  waitNumber(step: Pick<WaitNumberStep, 'region' | 'comparator' | 'threshold' | 'textColor'>): Promise<WaitOutcome> {
    const reader = this.numberReader;
    if (!reader) {
      throw new Error('waitNumber requires a number reader');
    }
    const { timeoutSeconds, pollIntervalMs } = this.config.number;
    const label = `number ${step.comparator} ${step.threshold}`;

    return this.poll(label, { timeoutMs: timeoutSeconds * 1000, intervalMs: pollIntervalMs }, async () => {
      const region = await this.screen.captureRegion(step.region);
      const value = reader.read(region, step.textColor);
      this.log.debug(`number read: ${value ?? 'none'}`);
      return value !== null && compare(value, step.comparator, step.threshold);
    });
  }

  waitScan(scan: ItemScanConfig, polarity: Polarity, item?: string): Promise<WaitOutcome> {
    const resolver = this.resolver;
    if (!resolver) {
      throw new Error('waitScan requires an item-scan resolver');
    }
    const { timeoutSeconds, pollIntervalMs } = this.config.scan;
    const label = `scan ${scan.name} ${polarity}${item ? ` (${item})` : ''}`;

    return this.poll(label, { timeoutMs: timeoutSeconds * 1000, intervalMs: pollIntervalMs }, async () => {
      const hits = await resolver.resolve(scan, 'every', { readOnly: true });
      const present = hits.some(hit => !item || hit.item.name === item);
      return polarity === 'appear' ? present : !present;
    });
  }

  /**
   * Polls `check` until it holds, a skip arrives or the budget runs out.
   */
  async poll(label: string, budget: PollBudget, check: () => Promise<boolean>): Promise<WaitOutcome> {
    const maxPolls = Math.max(1, Math.ceil(budget.timeoutMs / budget.intervalMs));
    const started = Date.now();
    const pausedBefore = this.control.pausedMs();
    let polls = 0;

    for (;;) {
      await this.control.checkpoint();
      if (this.control.consumeSkip()) {
        this.log.info(`${label}: skipped`);
        return SKIPPED;
      }

      if (await check()) {
        this.log.debug(`${label}: satisfied after ${polls + 1} poll(s)`);
        return SATISFIED;
      }
      polls++;

      const activeMs = (Date.now() - started) - (this.control.pausedMs() - pausedBefore);
      if (polls >= maxPolls || activeMs >= budget.timeoutMs) {
        this.log.warn(`${label}: timed out after ${polls} poll(s)`);
        return { status: 'timed_out', polls, elapsedMs: activeMs };
      }

      if (await this.control.sleep(budget.intervalMs) === 'skipped') {
        this.log.info(`${label}: skipped`);
        return SKIPPED;
      }
    }
  }

  private async sleepFor(ms: number): Promise<WaitOutcome> {
    const result = await this.control.sleep(ms);
    return result === 'skipped' ? SKIPPED : SATISFIED;
  }
}
