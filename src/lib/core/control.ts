/**
 * Visual Sequencer - 制御トークン
 *
 * Carries stop / pause / skip / quit between the control layer and the worker.
 * The control layer only calls `signal()`; the worker observes the token at
 * its suspension points (`checkpoint()` and every slice of `sleep()`).
 */

import { EventEmitter } from 'events';
import { AbortRequestedError } from './errors';

export type ControlSignal = 'stop' | 'pause' | 'resume' | 'skip' | 'quit';

export type SleepResult = 'elapsed' | 'skipped';

/** Returns true while the pointer sits in the fail-safe zone. */
export type FailSafeProbe = () => Promise<boolean>;

export interface ControlTokenOptions {
  /** Longest uninterrupted sleep; bounds how late a signal is seen. */
  sliceMs: number;
  failSafe?: FailSafeProbe;
}

export class ControlToken {
  private stopRequested = false;
  private quitRequested = false;
  private paused = false;
  private skipRequested = false;
  private failSafeTripped = false;
  private pausedSince: number | null = null;
  private pausedTotalMs = 0;
  private readonly events = new EventEmitter();
  private readonly sliceMs: number;
  private readonly failSafe?: FailSafeProbe;

  constructor(options: ControlTokenOptions) {
    this.sliceMs = options.sliceMs;
    this.failSafe = options.failSafe;
  }

  // ── 制御レイヤー側 ─────────────────────────────────

  signal(signal: ControlSignal): void {
    switch (signal) {
      case 'stop':
        this.stopRequested = true;
        break;
      case 'quit':
        this.quitRequested = true;
        break;
      case 'pause':
        if (!this.paused) {
          this.paused = true;
          this.pausedSince = Date.now();
        }
        break;
      case 'resume':
        this.endPause();
        break;
      case 'skip':
        this.skipRequested = true;
        break;
    }
    this.events.emit('signal', signal);
  }

  isPaused(): boolean {
    return this.paused;
  }

  isQuit(): boolean {
    return this.quitRequested;
  }

  isAborted(): boolean {
    return this.stopRequested || this.quitRequested || this.failSafeTripped;
  }

  /** Total time spent paused since the last reset, including a pause in progress. */
  pausedMs(): number {
    const current = this.pausedSince !== null ? Date.now() - this.pausedSince : 0;
    return this.pausedTotalMs + current;
  }

  // ── ワーカー側 ─────────────────────────────────────

  /**
   * Clears everything but quit, which is terminal. Called by the worker when a
   * run begins and ends.
   */
  reset(): void {
    this.stopRequested = false;
    this.paused = false;
    this.pausedSince = null;
    this.pausedTotalMs = 0;
    this.skipRequested = false;
    this.failSafeTripped = false;
  }

  /** One-shot: true once per `skip` signal. */
  consumeSkip(): boolean {
    if (!this.skipRequested) return false;
    this.skipRequested = false;
    return true;
  }

  throwIfAborted(): void {
    if (this.quitRequested) throw new AbortRequestedError('quit');
    if (this.stopRequested) throw new AbortRequestedError('stop');
    if (this.failSafeTripped) throw new AbortRequestedError('failsafe');
  }

  /**
   * Sampled right before input is injected: throws on stop / quit / fail-safe
   * without consuming skip or blocking on pause.
   */
  async guard(): Promise<void> {
    this.throwIfAborted();
    await this.checkFailSafe();
  }

  /**
   * Suspension point: throws on stop / quit / fail-safe and blocks while paused.
   */
  async checkpoint(): Promise<void> {
    await this.guard();
    if (this.paused) {
      await this.waitWhilePaused();
      this.throwIfAborted();
    }
  }

  /**
   * 中断可能スリープ
   *
   * Sleeps in slices. Paused time does not count against `ms`, so a resumed
   * wait continues with the remainder it had. A pending skip ends the sleep.
   */
  async sleep(ms: number): Promise<SleepResult> {
    let remaining = ms;
    await this.checkpoint();

    while (remaining > 0) {
      if (this.consumeSkip()) return 'skipped';

      const slice = Math.min(this.sliceMs, remaining);
      const started = Date.now();
      const pausedBefore = this.pausedMs();
      await this.delay(slice);
      await this.checkpoint();
      remaining -= (Date.now() - started) - (this.pausedMs() - pausedBefore);
    }

    return 'elapsed';
  }

  /**
   * Plain delay that only stop / quit / fail-safe cut short. Used inside an
   * action (between a click and its confirmation) where skip must not apply.
   */
  async hold(ms: number): Promise<void> {
    const deadline = Date.now() + ms;
    while (Date.now() < deadline) {
      await this.guard();
      await this.delay(Math.min(this.sliceMs, deadline - Date.now()));
    }
    await this.guard();
  }

  // ── 内部 ──────────────────────────────────────────

  private endPause(): void {
    if (!this.paused) return;
    this.paused = false;
    if (this.pausedSince !== null) {
      this.pausedTotalMs += Date.now() - this.pausedSince;
      this.pausedSince = null;
    }
  }

  private async waitWhilePaused(): Promise<void> {
    while (this.paused && !this.stopRequested && !this.quitRequested) {
      await this.delay(this.sliceMs);
    }
  }

  private async checkFailSafe(): Promise<void> {
    if (!this.failSafe) return;
    if (await this.failSafe()) {
      this.failSafeTripped = true;
      throw new AbortRequestedError('failsafe');
    }
  }

  /** setTimeout that any incoming signal wakes early. */
  private delay(ms: number): Promise<void> {
    return new Promise(resolve => {
      const done = () => {
        clearTimeout(timer);
        this.events.off('signal', done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, ms));
      this.events.once('signal', done);
    });
  }
}
