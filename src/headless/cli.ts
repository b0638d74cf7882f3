#!/usr/bin/env node
/**
 * Visual Sequencer - Headless CLI Entry Point
 *
 * Usage:
 *   vseq run <workspace.json> <sequence> [options]   - シーケンス実行
 *   vseq check <workspace.json>                      - ワークスペース検証
 *
 * Keys during a run: p pause/resume, s skip, x stop, q quit.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { AutoController, type InputBackend } from '../lib/auto/controller';
import { ImageMatcher, TemplateStore } from '../lib/auto/image-matcher';
import { GlyphSet, NumberReader } from '../lib/auto/number-reader';
import { ImageScreenSource, createBuffer, type ScreenSource } from '../lib/auto/screen';
import { StubBackend } from '../lib/auto/stub-backend';
import { WindowsBackend } from '../lib/auto/windows-backend';
import { DEFAULT_CONFIG_FILE, loadConfig, type EngineConfig } from '../lib/core/config';
import type { ControlSignal } from '../lib/core/control';
import { formatError, getSuggestion, isAutomationError } from '../lib/core/errors';
import { Logger } from '../lib/core/logger';
import { SequenceRunner } from '../lib/core/runner';
import { describeWait, formatDuration } from '../lib/core/time-parser';
import type { RunReport, Step } from '../lib/core/types';
import { DEFAULT_WORKSPACE_DEFAULTS, findSequence, loadWorkspace, type Workspace } from '../lib/core/workspace';

// ─── 定数 ────────────────────────────────────────────
const VERSION = '0.1.0';
const DEFAULT_TEMPLATES_DIR = './templates';
const DEFAULT_GLYPHS_DIR = './digits';

// ─── 引数 ────────────────────────────────────────────

export type BackendKind = 'stub' | 'windows';

export interface RunOptions {
  workspace: string;
  sequence: string;
  backend: BackendKind;
  screen?: string;
  config: string;
  templates: string;
  glyphs: string;
}

export function parseRunArgs(args: string[]): RunOptions {
  const positional: string[] = [];
  const options: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      options[arg.slice(2)] = value;
      i++;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length < 2) {
    throw new Error('Usage: vseq run <workspace.json> <sequence> [options]');
  }

  const backend = options.backend ?? 'stub';
  if (backend !== 'stub' && backend !== 'windows') {
    throw new Error(`Unknown backend: ${backend} (stub | windows)`);
  }

  return {
    workspace: positional[0],
    sequence: positional[1],
    backend,
    screen: options.screen,
    config: options.config ?? DEFAULT_CONFIG_FILE,
    templates: options.templates ?? DEFAULT_TEMPLATES_DIR,
    glyphs: options.glyphs ?? DEFAULT_GLYPHS_DIR,
  };
}

/** Single-key controls; anything else is ignored. */
export function keyToSignal(key: string, paused: boolean): ControlSignal | null {
  switch (key.toLowerCase()) {
    case 'p': return paused ? 'resume' : 'pause';
    case 's': return 'skip';
    case 'x': return 'stop';
    case 'q':
    case '\u0003': return 'quit';
    default: return null;
  }
}

export function exitCodeFor(report: RunReport): number {
  return report.outcome === 'failed' ? 1 : 0;
}

// ─── メイン ──────────────────────────────────────────
async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`Visual Sequencer v${VERSION}`);
    return 0;
  }

  const command = args[0];
  try {
    switch (command) {
      case 'run':
        return await handleRun(parseRunArgs(args.slice(1)));

      case 'check':
        return handleCheck(args.slice(1));

      default:
        console.error(`Unknown command: ${command}`);
        printUsage();
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}

// ─── コマンドハンドラ ────────────────────────────────

/**
 * run - シーケンス実行
 */
async function handleRun(options: RunOptions): Promise<number> {
  const config = loadConfig(options.config);
  const logger = new Logger({ level: config.log.level, dir: config.log.dir });
  const workspace = loadWorkspace(options.workspace, {
    ...DEFAULT_WORKSPACE_DEFAULTS,
    minConfidence: config.scan.defaultMinConfidence,
  });
  const sequence = findSequence(workspace, options.sequence);

  const { backend, screen } = await createCollaborators(options, logger);
  const controller = new AutoController(backend, config, logger);
  const glyphs = await GlyphSet.fromDirectory(path.resolve(options.glyphs));

  const runner = new SequenceRunner({
    controller,
    screen,
    matcher: new ImageMatcher(new TemplateStore(path.resolve(options.templates))),
    config,
    points: workspace.points,
    scans: workspace.scans,
    numberReader: new NumberReader(glyphs, {
      minConfidence: config.number.minConfidence,
      colorTolerance: config.number.colorTolerance,
    }),
    logger,
  });

  printRunHeader(options, workspace, config);
  const detach = attachKeys(runner, logger);
  const onSigint = () => runner.signal('quit');
  process.on('SIGINT', onSigint);

  let report: RunReport;
  try {
    report = await runner.start(sequence);
  } finally {
    process.off('SIGINT', onSigint);
    detach();
  }

  printReport(report);
  logger.close();
  return exitCodeFor(report);
}

/**
 * check - ワークスペース検証
 */
function handleCheck(args: string[]): number {
  if (args.length === 0) {
    console.error('Usage: vseq check <workspace.json>');
    return 1;
  }

  const workspace = loadWorkspace(args[0]);
  console.log(`✅ ${path.resolve(args[0])}`);
  console.log(`   Points:    ${workspace.points.length}`);
  console.log(`   Slots:     ${workspace.slots.length}`);
  console.log(`   Items:     ${workspace.items.length}`);
  console.log(`   Scans:     ${workspace.scans.length}`);
  console.log(`   Sequences: ${workspace.sequences.length}`);
  for (const sequence of workspace.sequences) {
    const steps = sequence.start.length + sequence.end.length
      + sequence.loops.reduce((n, l) => n + l.steps.length, 0);
    console.log(`     - ${sequence.name}: ${sequence.cycles} cycle(s), ${sequence.loops.length} loop(s), ${steps} step(s)`);
  }
  return 0;
}

// ─── ユーティリティ ──────────────────────────────────

async function createCollaborators(
  options: RunOptions,
  logger: Logger
): Promise<{ backend: InputBackend; screen: ScreenSource }> {
  let screen: ScreenSource | null = null;
  if (options.screen) {
    const screenPath = path.resolve(options.screen);
    if (!fs.existsSync(screenPath)) {
      throw new Error(`Screenshot not found: ${screenPath}`);
    }
    screen = await ImageScreenSource.fromFile(screenPath);
  }

  if (options.backend === 'windows') {
    const windows = new WindowsBackend(logger);
    return { backend: windows, screen: screen ?? windows };
  }

  if (!screen) {
    logger.warn('no --screen given: pixel and scan triggers see a black screen');
  }
  return {
    backend: new StubBackend(logger),
    screen: screen ?? new ImageScreenSource(createBuffer(1, 1)),
  };
}

/**
 * Maps single keystrokes on a TTY stdin to control signals. Returns the
 * function that restores stdin.
 */
function attachKeys(runner: SequenceRunner, logger: Logger): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => undefined;

  const onData = (data: Buffer) => {
    const signal = keyToSignal(data.toString('utf-8'), runner.snapshot().status === 'paused');
    if (!signal) return;
    logger.info(`key → ${signal}`);
    runner.signal(signal);
  };

  stdin.setRawMode(true);
  stdin.resume();
  stdin.on('data', onData);

  return () => {
    stdin.off('data', onData);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

function printRunHeader(options: RunOptions, workspace: Workspace, config: EngineConfig): void {
  const sequence = findSequence(workspace, options.sequence);
  console.log(`🚀 Visual Sequencer v${VERSION}`);
  console.log(`   Sequence:  ${sequence.name} (${sequence.cycles} cycle(s))`);
  console.log(`   Backend:   ${options.backend}`);
  console.log(`   Fail-safe: ${config.failsafe.enabled ? `pointer at x<=${config.failsafe.x}, y<=${config.failsafe.y}` : 'off'}`);
  const first = sequence.start[0] ?? sequence.loops[0]?.steps[0];
  if (first) {
    console.log(`   First:     ${describeStep(first)}`);
  }
  console.log('   Keys:      p pause/resume · s skip · x stop · q quit');
  console.log('');
}

function describeStep(step: Step): string {
  switch (step.type) {
    case 'click': return `click point ${step.pointId} after ${describeWait(step.wait)}`;
    case 'wait': return `wait ${describeWait(step.wait)}`;
    case 'key': return `key ${step.key} after ${describeWait(step.wait)}`;
    case 'scan': return `scan ${step.scanId}${step.mode ? ` (${step.mode})` : ''}`;
    case 'waitScan': return `wait for scan ${step.scanId} ${step.polarity}`;
    case 'waitNumber': return `wait for number ${step.comparator} ${step.threshold}`;
  }
}

function printReport(report: RunReport): void {
  const icon = report.outcome === 'completed' ? '✅' : report.outcome === 'failed' ? '❌' : '🛑';
  const { stats } = report;
  console.log('');
  console.log(`${icon} ${report.outcome} in ${formatDuration(stats.elapsedMs / 1000)}`);
  console.log(`   Cycles: ${stats.cyclesCompleted}  Clicks: ${stats.clicks}  Items: ${stats.itemsClicked}  Keys: ${stats.keysPressed}`);
  if (report.error) {
    console.log(`   ${report.error.kind}: ${report.error.message}`);
  }
}

function describeError(err: unknown): string {
  if (isAutomationError(err)) {
    return `${formatError(err.detail)}\n${getSuggestion(err.detail)}`;
  }
  if (err instanceof ZodError) {
    return err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

function printUsage(): void {
  console.log(`
Visual Sequencer v${VERSION}

Usage:
  vseq run <workspace.json> <sequence> [options]   Run a sequence
  vseq check <workspace.json>                      Validate a workspace

Run options:
  --backend <stub|windows>   Input backend (default: stub)
  --screen <file.png>        Serve captures from a screenshot
  --config <file>            Engine config (default: ${DEFAULT_CONFIG_FILE})
  --templates <dir>          Item template images (default: ${DEFAULT_TEMPLATES_DIR})
  --glyphs <dir>             Learned number glyphs (default: ${DEFAULT_GLYPHS_DIR})

Keys during a run:
  p   pause / resume
  s   skip the current wait
  x   stop
  q   quit
`);
}

// ─── エントリ ────────────────────────────────────────
if (require.main === module) {
  main().then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      console.error(`Fatal: ${describeError(err)}`);
      process.exitCode = 1;
    }
  );
}
