/**
 * Visual Sequencer - ワークスペース読み込み
 *
 * One JSON document holds points, slots, item profiles, scan configs and
 * sequences. Documents are validated with zod; waits may be written as
 * strings and go through the time parser. Every reference is resolved here,
 * so a sequence that reaches the runner names only things that exist.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseHex } from '../auto/color';
import { MissingReferenceError } from './errors';
import { parseClockInput, parseWaitInput } from './time-parser';
import type {
  Color,
  ElseAction,
  ItemProfile,
  ItemScanConfig,
  ItemSlot,
  PixelTrigger,
  Point,
  Sequence,
  Step,
  WaitSpec,
} from './types';

export interface Workspace {
  points: Point[];
  slots: ItemSlot[];
  items: ItemProfile[];
  scans: ItemScanConfig[];
  sequences: Sequence[];
}

export interface WorkspaceDefaults {
  minConfidence: number;
  confirmDelaySeconds: number;
}

export const DEFAULT_WORKSPACE_DEFAULTS: WorkspaceDefaults = {
  minConfidence: 0.8,
  confirmDelaySeconds: 0.5,
};

// ─── スキーマ ────────────────────────────────────────

const channel = z.number().int().min(0).max(255);

const ColorSchema = z.union([
  z.string().transform((text, ctx): Color => {
    const color = parseHex(text);
    if (!color) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid color '${text}'` });
      return z.NEVER;
    }
    return color;
  }),
  z.tuple([channel, channel, channel]).transform(([r, g, b]): Color => ({ r, g, b })),
  z.object({ r: channel, g: channel, b: channel }),
]);

const RectSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const PositionSchema = z.object({ x: z.number().int(), y: z.number().int() });

const PolaritySchema = z.enum(['appear', 'gone']);

const PixelTriggerSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  color: ColorSchema,
  polarity: PolaritySchema.default('appear'),
});

const WaitTextSchema = z.union([z.string(), z.number().min(0)]).transform((input, ctx): WaitSpec => {
  const parsed = parseWaitInput(String(input));
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

const PixelWaitSchema = PixelTriggerSchema.extend({
  type: z.literal('pixel'),
  /** Seconds to wait before the pixel check starts. */
  delay: z.number().min(0).optional(),
}).transform((w): WaitSpec => {
  const pixel: PixelTrigger = { x: w.x, y: w.y, color: w.color, polarity: w.polarity };
  return w.delay ? { type: 'delayThenPixel', seconds: w.delay, pixel } : { type: 'pixel', ...pixel };
});

const ClockWaitSchema = z.object({
  type: z.literal('clock'),
  at: z.string(),
}).transform((w, ctx): WaitSpec => {
  const parsed = parseClockInput(w.at);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return { type: 'clock', target: parsed.value };
});

const WaitSchema = z.union([WaitTextSchema, PixelWaitSchema, ClockWaitSchema]).optional()
  .transform((w): WaitSpec => w ?? { type: 'none' });

const ElseSchema = z.union([
  z.literal('skip').transform((): ElseAction => ({ type: 'skip' })),
  z.literal('restart').transform((): ElseAction => ({ type: 'restart' })),
  z.object({ type: z.literal('skip') }),
  z.object({ type: z.literal('restart') }),
  z.object({
    type: z.literal('click'),
    point: z.number().int(),
    delay: z.number().min(0).optional(),
  }).transform((e): ElseAction => ({ type: 'click', pointId: e.point, delaySeconds: e.delay })),
  z.object({ type: z.literal('key'), key: z.string().min(1) }),
]).optional();

const ComparatorSchema = z.enum(['>', '<', '>=', '<=', '==', '!=']).or(z.literal('=').transform(() => '==' as const));

const StepSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('click'), point: z.number().int(), wait: WaitSchema, else: ElseSchema }),
  z.object({ type: z.literal('wait'), wait: WaitSchema, else: ElseSchema }),
  z.object({ type: z.literal('key'), key: z.string().min(1), wait: WaitSchema, else: ElseSchema }),
  z.object({ type: z.literal('scan'), scan: z.string(), mode: z.enum(['all', 'best', 'every']).optional(), else: ElseSchema }),
  z.object({
    type: z.literal('waitScan'),
    scan: z.string(),
    item: z.string().optional(),
    polarity: PolaritySchema.default('appear'),
    else: ElseSchema,
  }),
  z.object({
    type: z.literal('waitNumber'),
    region: RectSchema,
    comparator: ComparatorSchema,
    threshold: z.number(),
    point: z.number().int().optional(),
    textColor: ColorSchema.optional(),
    else: ElseSchema,
  }),
]).transform((s): Step => {
  switch (s.type) {
    case 'click':
      return { type: 'click', pointId: s.point, wait: s.wait, else: s.else };
    case 'wait':
      return { type: 'wait', wait: s.wait, else: s.else };
    case 'key':
      return { type: 'key', key: s.key, wait: s.wait, else: s.else };
    case 'scan':
      return { type: 'scan', scanId: s.scan, mode: s.mode, else: s.else };
    case 'waitScan':
      return { type: 'waitScan', scanId: s.scan, item: s.item, polarity: s.polarity, else: s.else };
    case 'waitNumber':
      return {
        type: 'waitNumber',
        region: s.region,
        comparator: s.comparator,
        threshold: s.threshold,
        clickPointId: s.point,
        textColor: s.textColor,
        else: s.else,
      };
  }
});

const SequenceSchema = z.object({
  name: z.string().min(1),
  cycles: z.number().int().min(1).default(1),
  start: z.array(StepSchema).default([]),
  loops: z.array(z.object({
    name: z.string().min(1),
    repeat: z.number().int().min(1).default(1),
    steps: z.array(StepSchema),
  })).default([]),
  end: z.array(StepSchema).default([]),
});

const ConfirmSchema = z.union([
  z.object({ dx: z.number().int(), dy: z.number().int(), delay: z.number().min(0).optional() }),
  z.object({ x: z.number().int(), y: z.number().int(), delay: z.number().min(0).optional() }),
]);

const ItemSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1).optional(),
  priority: z.number().int().min(1),
  markers: z.array(z.object({ dx: z.number().int(), dy: z.number().int(), color: ColorSchema })).default([]),
  /** Absent: every marker must match. */
  minMarkers: z.number().int().min(1).optional(),
  template: z.string().min(1).optional(),
  minConfidence: z.number().min(0).max(1).optional(),
  confirm: ConfirmSchema.optional(),
});

export const WorkspaceSchema = z.object({
  points: z.array(z.object({
    id: z.number().int(),
    name: z.string().min(1),
    x: z.number().int(),
    y: z.number().int(),
  })).default([]),
  slots: z.array(z.object({
    name: z.string().min(1),
    region: RectSchema,
    order: z.number().int().optional(),
    click: PositionSchema.optional(),
  })).default([]),
  items: z.array(ItemSchema).default([]),
  scans: z.array(z.object({
    name: z.string().min(1),
    slots: z.array(z.string()).min(1),
    items: z.array(z.string()).min(1),
    mode: z.enum(['all', 'best', 'every']).default('all'),
    colorTolerance: z.number().min(0).max(255).optional(),
    reverse: z.boolean().optional(),
  })).default([]),
  sequences: z.array(SequenceSchema).default([]),
});

type WorkspaceDocument = z.infer<typeof WorkspaceSchema>;

// ─── 読み込み ────────────────────────────────────────

/**
 * Validates a parsed JSON value and resolves every name and id in it.
 * Throws a ZodError for malformed documents and MissingReferenceError for
 * dangling references.
 */
export function parseWorkspace(json: unknown, defaults: WorkspaceDefaults = DEFAULT_WORKSPACE_DEFAULTS): Workspace {
  const doc = WorkspaceSchema.parse(json);

  const points: Point[] = doc.points.map(p => ({ id: p.id, name: p.name, x: p.x, y: p.y }));
  assertUnique(points.map(p => p.id), 'point id');

  const slots: ItemSlot[] = doc.slots.map((s, i) => ({
    name: s.name,
    region: s.region,
    order: s.order ?? i + 1,
    click: s.click,
  }));
  assertUnique(slots.map(s => s.name), 'slot name');

  const items = doc.items.map(item => toProfile(item, defaults));
  assertUnique(items.map(i => i.name), 'item name');

  const scans = resolveScans(doc, slots, items);
  assertUnique(scans.map(s => s.name), 'scan name');

  const sequences: Sequence[] = doc.sequences.map(s => ({
    name: s.name,
    cycles: s.cycles,
    start: s.start,
    loops: s.loops,
    end: s.end,
  }));
  assertUnique(sequences.map(s => s.name), 'sequence name');

  for (const sequence of sequences) {
    validateSequence(sequence, { points, scans });
  }

  return { points, slots, items, scans, sequences };
}

export function loadWorkspace(filePath: string, defaults?: WorkspaceDefaults): Workspace {
  const resolved = path.resolve(filePath);
  const raw = fs.readFileSync(resolved, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Could not parse ${resolved}: ${reason}`);
  }
  return parseWorkspace(json, defaults);
}

export function findSequence(workspace: Workspace, name: string): Sequence {
  const sequence = workspace.sequences.find(s => s.name === name);
  if (!sequence) {
    throw new MissingReferenceError('sequence', name, 'workspace');
  }
  return sequence;
}

/**
 * Rejects steps that name a point, scan or scan item that does not exist.
 */
export function validateSequence(
  sequence: Sequence,
  context: { points: Point[]; scans: ItemScanConfig[] }
): void {
  const pointIds = new Set(context.points.map(p => p.id));
  const scans = new Map(context.scans.map(s => [s.name, s]));

  const phases: Array<[string, Step[]]> = [
    ['START', sequence.start],
    ...sequence.loops.map((l): [string, Step[]] => [`LOOP ${l.name}`, l.steps]),
    ['END', sequence.end],
  ];

  for (const [phase, steps] of phases) {
    steps.forEach((step, index) => {
      const owner = `${sequence.name} ${phase} #${index + 1}`;
      const requirePoint = (id: number) => {
        if (!pointIds.has(id)) throw new MissingReferenceError('point', id, owner);
      };

      switch (step.type) {
        case 'click':
          requirePoint(step.pointId);
          break;
        case 'waitNumber':
          if (step.clickPointId !== undefined) requirePoint(step.clickPointId);
          break;
        case 'scan':
        case 'waitScan': {
          const scan = scans.get(step.scanId);
          if (!scan) throw new MissingReferenceError('scan', step.scanId, owner);
          if (step.type === 'waitScan' && step.item && !scan.items.some(i => i.name === step.item)) {
            throw new MissingReferenceError('item', step.item, owner);
          }
          break;
        }
        case 'wait':
        case 'key':
          break;
      }

      if (step.else?.type === 'click') requirePoint(step.else.pointId);
    });
  }
}

// ─── 内部 ────────────────────────────────────────────

function toProfile(item: WorkspaceDocument['items'][number], defaults: WorkspaceDefaults): ItemProfile {
  const profile: ItemProfile = {
    name: item.name,
    category: item.category,
    priority: item.priority,
    markers: item.markers,
    markerPolicy: item.minMarkers !== undefined ? { minimum: item.minMarkers } : 'require-all',
    template: item.template,
    minConfidence: item.minConfidence ?? defaults.minConfidence,
  };

  if (item.confirm) {
    const delaySeconds = item.confirm.delay ?? defaults.confirmDelaySeconds;
    profile.confirm = 'dx' in item.confirm
      ? { target: { type: 'offset', dx: item.confirm.dx, dy: item.confirm.dy }, delaySeconds }
      : { target: { type: 'point', x: item.confirm.x, y: item.confirm.y }, delaySeconds };
  }
  return profile;
}

function resolveScans(doc: WorkspaceDocument, slots: ItemSlot[], items: ItemProfile[]): ItemScanConfig[] {
  const slotsByName = new Map(slots.map(s => [s.name, s]));
  const itemsByName = new Map(items.map(i => [i.name, i]));

  return doc.scans.map(scan => {
    const owner = `scan '${scan.name}'`;
    return {
      name: scan.name,
      slots: scan.slots.map(name => {
        const slot = slotsByName.get(name);
        if (!slot) throw new MissingReferenceError('slot', name, owner);
        return slot;
      }),
      items: scan.items.map(name => {
        const item = itemsByName.get(name);
        if (!item) throw new MissingReferenceError('item', name, owner);
        return item;
      }),
      defaultMode: scan.mode,
      colorTolerance: scan.colorTolerance,
      reverse: scan.reverse,
    };
  });
}

function assertUnique<T>(values: T[], what: string): void {
  const seen = new Set<T>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new Error(`Duplicate ${what}: ${String(value)}`);
    }
    seen.add(value);
  }
}
