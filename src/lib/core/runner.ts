/**
 * Visual Sequencer - シーケンス実行エンジン
 *
 *   for cycle in 1..cycles:
 *     START
 *     for loop in loops: repeat loop.repeat times: loop.steps
 *   END (once)
 *
 * One run at a time. The control layer talks to a running sequence only
 * through `signal()`; everything else here belongs to the worker.
 */

import type { AutoController } from '../auto/controller';
import type { ProfileMatcher } from '../auto/image-matcher';
import { ItemScanResolver, type ScanHit } from '../auto/item-scan';
import type { NumberRecognizer } from '../auto/number-reader';
import type { ScreenSource } from '../auto/screen';
import type { EngineConfig } from './config';
import { ControlToken, type ControlSignal } from './control';
import {
  AbortRequestedError,
  AutomationError,
  MissingReferenceError,
  NoMatchFoundError,
  TriggerTimeoutError,
  formatError,
  getSuggestion,
  type TriggerKind,
} from './errors';
import { Logger, silentLogger, type LogLevel } from './logger';
import { TriggerEvaluator, type WaitOutcome } from './trigger-evaluator';
import type {
  ExecutionStatus,
  ItemScanConfig,
  PhaseKind,
  Point,
  RunOutcome,
  RunPosition,
  RunReport,
  RunStats,
  RuntimeSnapshot,
  Sequence,
  Step,
  WaitSpec,
} from './types';
import { validateSequence } from './workspace';

export interface RunnerCallbacks {
  onLog?: (message: string, level: LogLevel) => void;
  onStatusChange?: (status: ExecutionStatus) => void;
  onStep?: (position: RunPosition, step: Step) => void;
}

export interface SequenceRunnerOptions {
  controller: AutoController;
  screen: ScreenSource;
  matcher: ProfileMatcher;
  config: EngineConfig;
  points: Point[];
  scans: ItemScanConfig[];
  numberReader?: NumberRecognizer;
  logger?: Logger;
  random?: () => number;
  now?: () => Date;
}

/** ELSE restart unwinds to the top of the walk through this. */
class RestartRequest extends Error {
  constructor() {
    super('restart requested');
    this.name = 'RestartRequest';
  }
}

function emptyStats(): RunStats {
  return { elapsedMs: 0, cyclesCompleted: 0, clicks: 0, itemsClicked: 0, keysPressed: 0 };
}

function initialPosition(): RunPosition {
  return { cycle: 0, phase: null, loopIndex: -1, loopRepetition: 0, stepIndex: -1 };
}

/**
 * シーケンス実行エンジン
 */
export class SequenceRunner {
  private readonly controller: AutoController;
  private readonly config: EngineConfig;
  private readonly control: ControlToken;
  private readonly resolver: ItemScanResolver;
  private readonly evaluator: TriggerEvaluator;
  private readonly points: Map<number, Point>;
  private readonly scans: Map<string, ItemScanConfig>;
  private readonly log: Logger;
  private readonly hasNumberReader: boolean;

  private status: ExecutionStatus = 'idle';
  private running = false;
  private sequenceName: string | null = null;
  private stats: RunStats = emptyStats();
  private position: RunPosition = initialPosition();
  private startedAt = 0;
  private callbacks: RunnerCallbacks = {};

  constructor(options: SequenceRunnerOptions) {
    const logger = options.logger ?? silentLogger();
    this.controller = options.controller;
    this.config = options.config;
    this.log = logger.child('runner');
    this.points = new Map(options.points.map(p => [p.id, p]));
    this.scans = new Map(options.scans.map(s => [s.name, s]));
    this.hasNumberReader = options.numberReader !== undefined;

    this.control = new ControlToken({
      sliceMs: options.config.timing.sliceMs,
      failSafe: options.config.failsafe.enabled ? options.controller.failSafeProbe() : undefined,
    });
    this.resolver = new ItemScanResolver(options.screen, options.matcher, options.config, logger, this.control);
    this.evaluator = new TriggerEvaluator({
      screen: options.screen,
      control: this.control,
      config: options.config,
      resolver: this.resolver,
      numberReader: options.numberReader,
      logger,
      random: options.random,
      now: options.now,
    });
  }

  // ─── 公開API ─────────────────────────────────────

  /**
   * コールバックを設定
   */
  setCallbacks(callbacks: RunnerCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  /**
   * Starts a run on the worker. Throws right away when a run is in progress,
   * after quit, when the sequence names an unknown point or scan, or when it
   * reads a number without a number reader; the returned promise itself
   * always resolves with a report.
   */
  start(sequence: Sequence): Promise<RunReport> {
    if (this.running) {
      throw new Error(`A sequence is already running: ${this.sequenceName ?? ''}`);
    }
    if (this.control.isQuit()) {
      throw new Error('Runner has quit');
    }
    validateSequence(sequence, { points: [...this.points.values()], scans: [...this.scans.values()] });
    this.requireNumberReader(sequence);

    this.running = true;
    return this.execute(sequence);
  }

  run(sequence: Sequence): Promise<RunReport> {
    return this.start(sequence);
  }

  signal(signal: ControlSignal): void {
    this.control.signal(signal);
    if (!this.running) return;

    if (signal === 'pause' && this.status === 'running') {
      this.emit('info', '一時停止');
      this.setStatus('paused');
    } else if (signal === 'resume' && this.status === 'paused') {
      this.emit('info', '再開');
      this.setStatus('running');
    }
  }

  togglePause(): void {
    this.signal(this.control.isPaused() ? 'resume' : 'pause');
  }

  isRunning(): boolean {
    return this.running;
  }

  currentStats(): RunStats {
    return {
      ...this.stats,
      elapsedMs: this.running ? Date.now() - this.startedAt : this.stats.elapsedMs,
    };
  }

  snapshot(): RuntimeSnapshot {
    return {
      status: this.status,
      sequence: this.sequenceName,
      position: { ...this.position },
      stats: this.currentStats(),
    };
  }

  // ─── 実行 ────────────────────────────────────────

  private async execute(sequence: Sequence): Promise<RunReport> {
    this.control.reset();
    this.sequenceName = sequence.name;
    this.stats = emptyStats();
    this.position = initialPosition();
    this.startedAt = Date.now();
    this.setStatus('running');
    this.emit('info', `実行開始: ${sequence.name} (${sequence.cycles} cycle(s), ${sequence.loops.length} loop phase(s))`);

    let report: RunReport;
    try {
      await this.walk(sequence);
      report = this.finish('completed');
      this.emit('info', `実行完了: ${this.describeStats(report.stats)}`);
      this.setStatus('completed');
    } catch (error) {
      report = this.handleFailure(error);
    } finally {
      this.running = false;
      this.control.reset();
    }
    return report;
  }

  private handleFailure(error: unknown): RunReport {
    if (error instanceof AbortRequestedError) {
      const outcome: RunOutcome =
        error.reason === 'quit' ? 'quit' : error.reason === 'failsafe' ? 'failsafe' : 'stopped';
      const report = this.finish(outcome);
      this.emit(error.reason === 'failsafe' ? 'warn' : 'info', `実行停止 (${error.reason}): ${this.describeStats(report.stats)}`);
      this.setStatus('stopped');
      return report;
    }

    if (error instanceof AutomationError) {
      this.emit('error', `${formatError(error.detail)}\n${getSuggestion(error.detail)}`);
      this.setStatus('error');
      return { ...this.finish('failed'), error: { kind: error.kind, message: error.message } };
    }

    const message = error instanceof Error ? error.message : String(error);
    this.emit('error', `実行エラー: ${message}`);
    this.setStatus('error');
    return { ...this.finish('failed'), error: { kind: 'Error', message } };
  }

  private finish(outcome: RunOutcome): RunReport {
    this.stats.elapsedMs = Date.now() - this.startedAt;
    return { outcome, stats: { ...this.stats } };
  }

  private async walk(sequence: Sequence): Promise<void> {
    for (;;) {
      try {
        await this.walkOnce(sequence);
        return;
      } catch (error) {
        if (!(error instanceof RestartRequest)) throw error;
        this.emit('info', 'ELSE restart: cycle 1, statistics cleared');
        this.stats = emptyStats();
        this.position = initialPosition();
        this.startedAt = Date.now();
      }
    }
  }

  private async walkOnce(sequence: Sequence): Promise<void> {
    for (let cycle = 1; cycle <= sequence.cycles; cycle++) {
      this.position = { ...initialPosition(), cycle };
      this.emit('debug', `cycle ${cycle}/${sequence.cycles}`);

      await this.executePhase('START', sequence.start);

      for (let li = 0; li < sequence.loops.length; li++) {
        const loop = sequence.loops[li];
        for (let rep = 1; rep <= loop.repeat; rep++) {
          this.position.loopIndex = li;
          this.position.loopRepetition = rep;
          await this.executePhase('LOOP', loop.steps, loop.name);
        }
      }

      this.stats.cyclesCompleted++;
    }

    this.position.loopIndex = -1;
    this.position.loopRepetition = 0;
    await this.executePhase('END', sequence.end);
  }

  private async executePhase(phase: PhaseKind, steps: Step[], loopName?: string): Promise<void> {
    this.position.phase = phase;
    const label = loopName ? `LOOP ${loopName}` : phase;

    for (let i = 0; i < steps.length; i++) {
      this.position.stepIndex = i;
      const step = steps[i];

      await this.control.checkpoint();
      this.checkClickLimit();
      this.callbacks.onStep?.({ ...this.position }, step);

      try {
        await this.executeStep(step);
      } catch (error) {
        if (error instanceof AutomationError) {
          error.at({ phase: label, stepIndex: i });
        }
        throw error;
      }
    }
  }

  // ─── ステップ実行 ─────────────────────────────────

  private async executeStep(step: Step): Promise<void> {
    switch (step.type) {
      case 'click': {
        const point = this.point(step.pointId);
        const outcome = await this.evaluator.wait(step.wait);
        if (outcome.status === 'timed_out') {
          return this.fallback(step, this.timeout(step.wait, outcome));
        }
        await this.click(point.x, point.y, point.name);
        return;
      }

      case 'wait': {
        const outcome = await this.evaluator.wait(step.wait);
        if (outcome.status === 'timed_out') {
          return this.fallback(step, this.timeout(step.wait, outcome));
        }
        return;
      }

      case 'key': {
        const outcome = await this.evaluator.wait(step.wait);
        if (outcome.status === 'timed_out') {
          return this.fallback(step, this.timeout(step.wait, outcome));
        }
        await this.key(step.key);
        return;
      }

      case 'scan': {
        const scan = this.scan(step.scanId);
        const hits = await this.resolver.resolve(scan, step.mode ?? scan.defaultMode);
        if (hits.length === 0) {
          return this.fallback(step, new NoMatchFoundError(scan.name));
        }
        await this.clickHits(hits);
        return;
      }

      case 'waitScan': {
        const scan = this.scan(step.scanId);
        const outcome = await this.evaluator.waitScan(scan, step.polarity, step.item);
        if (outcome.status === 'timed_out') {
          return this.fallback(step, this.timeoutError('scan', outcome, `${scan.name} ${step.polarity}`));
        }
        return;
      }

      case 'waitNumber': {
        const outcome = await this.evaluator.waitNumber(step);
        if (outcome.status === 'timed_out') {
          return this.fallback(step, this.timeoutError('number', outcome, `${step.comparator} ${step.threshold}`));
        }
        if (step.clickPointId !== undefined) {
          const point = this.point(step.clickPointId);
          await this.click(point.x, point.y, point.name);
        }
        return;
      }
    }
  }

  /**
   * ELSE: replaces the step's primary action, or rethrows the failure when
   * the step has none.
   */
  private async fallback(step: Step, failure: TriggerTimeoutError | NoMatchFoundError): Promise<void> {
    const action = step.else;
    if (!action) throw failure;

    this.emit('warn', `${failure.message} → ELSE ${action.type}`);
    switch (action.type) {
      case 'skip':
        return;

      case 'restart':
        throw new RestartRequest();

      case 'click': {
        const point = this.point(action.pointId);
        if (action.delaySeconds && action.delaySeconds > 0) {
          await this.control.sleep(action.delaySeconds * 1000);
        }
        await this.click(point.x, point.y, point.name);
        return;
      }

      case 'key':
        await this.key(action.key);
        return;
    }
  }

  private async clickHits(hits: ScanHit[]): Promise<void> {
    for (let i = 0; i < hits.length; i++) {
      const hit = hits[i];
      if (i > 0) {
        await this.control.checkpoint();
      }

      await this.click(hit.target.x, hit.target.y, `${hit.item.name} @ ${hit.slot.name}`);
      this.stats.itemsClicked++;

      if (hit.confirm) {
        await this.control.hold(hit.confirm.delayMs);
        await this.click(hit.confirm.x, hit.confirm.y, `confirm ${hit.item.name}`);
      }

      if (this.config.scan.itemClickDelayMs > 0 && i < hits.length - 1) {
        await this.control.hold(this.config.scan.itemClickDelayMs);
      }
    }
  }

  private async click(x: number, y: number, label: string): Promise<void> {
    this.checkClickLimit();
    await this.control.guard();
    await this.controller.click(x, y);
    this.stats.clicks++;
    this.emit('info', `click ${label} (${x}, ${y}) [${this.stats.clicks}]`);
  }

  private async key(key: string): Promise<void> {
    await this.control.guard();
    await this.controller.key(key);
    this.stats.keysPressed++;
    this.emit('info', `key ${key}`);
  }

  private checkClickLimit(): void {
    const max = this.config.clicks.maxTotalClicks;
    if (max !== null && this.stats.clicks >= max) {
      this.emit('info', `click limit reached (${max})`);
      throw new AbortRequestedError('click-limit');
    }
  }

  // ─── 補助 ────────────────────────────────────────

  private requireNumberReader(sequence: Sequence): void {
    if (this.hasNumberReader) return;
    const steps = [...sequence.start, ...sequence.loops.flatMap(l => l.steps), ...sequence.end];
    if (steps.some(step => step.type === 'waitNumber')) {
      throw new Error(`Sequence '${sequence.name}' reads numbers but no number reader is configured`);
    }
  }

  private point(id: number): Point {
    const point = this.points.get(id);
    if (!point) throw new MissingReferenceError('point', id, this.sequenceName ?? 'runner');
    return point;
  }

  private scan(name: string): ItemScanConfig {
    const scan = this.scans.get(name);
    if (!scan) throw new MissingReferenceError('scan', name, this.sequenceName ?? 'runner');
    return scan;
  }

  private timeout(wait: WaitSpec, outcome: Extract<WaitOutcome, { status: 'timed_out' }>): TriggerTimeoutError {
    const pixel = wait.type === 'delayThenPixel' ? wait.pixel : wait.type === 'pixel' ? wait : null;
    const description = pixel ? `pixel ${pixel.polarity} at (${pixel.x}, ${pixel.y})` : wait.type;
    return this.timeoutError('pixel', outcome, description);
  }

  private timeoutError(
    trigger: TriggerKind,
    outcome: Extract<WaitOutcome, { status: 'timed_out' }>,
    description: string
  ): TriggerTimeoutError {
    return new TriggerTimeoutError(trigger, outcome.elapsedMs, description);
  }

  private setStatus(status: ExecutionStatus): void {
    if (this.status === status) return;
    this.status = status;
    this.callbacks.onStatusChange?.(status);
  }

  private emit(level: LogLevel, message: string): void {
    this.log.log(level, message);
    this.callbacks.onLog?.(message, level);
  }

  private describeStats(stats: RunStats): string {
    return `${stats.cyclesCompleted} cycle(s), ${stats.clicks} click(s), ${stats.itemsClicked} item(s), ${stats.keysPressed} key(s), ${(stats.elapsedMs / 1000).toFixed(1)}s`;
  }
}
