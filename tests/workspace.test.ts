import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { test } from 'node:test';
import { ZodError } from 'zod';
import { MissingReferenceError } from '../src/lib/core/errors';
import { findSequence, loadWorkspace, parseWorkspace, validateSequence } from '../src/lib/core/workspace';

const EXAMPLE = path.join(__dirname, '..', 'examples', 'workspace.json');

function doc(extra: Record<string, unknown>) {
  return {
    points: [{ id: 1, name: 'P1', x: 10, y: 20 }],
    slots: [{ name: 's1', region: { x: 0, y: 0, width: 8, height: 8 } }],
    items: [{ name: 'A', priority: 1, markers: [{ dx: 1, dy: 1, color: '#ff0000' }] }],
    scans: [{ name: 'loot', slots: ['s1'], items: ['A'] }],
    ...extra,
  };
}

function seq(start: unknown[]) {
  return { sequences: [{ name: 's', start }] };
}

test('the example workspace loads', () => {
  const workspace = loadWorkspace(EXAMPLE);
  assert.equal(workspace.points.length, 3);
  assert.deepEqual(workspace.slots.map(s => s.order), [1, 2, 3]);
  assert.deepEqual(workspace.slots[2].click, { x: 292, y: 340 });
  assert.deepEqual(workspace.sequences.map(s => s.name), ['farm', 'daily']);
});

test('item profiles take defaults for confidence and confirm delay', () => {
  const { items } = loadWorkspace(EXAMPLE);
  const [gold, wood, potion] = items;

  assert.deepEqual(gold.markers.map(m => m.color), [{ r: 255, g: 215, b: 0 }, { r: 255, g: 215, b: 0 }]);
  assert.equal(gold.markerPolicy, 'require-all');
  assert.equal(gold.minConfidence, 0.8);
  assert.deepEqual(gold.confirm, { target: { type: 'offset', dx: 0, dy: 120 }, delaySeconds: 0.5 });
  assert.deepEqual(wood.markers[0].color, { r: 139, g: 90, b: 43 });
  assert.equal(potion.category, undefined);
  assert.equal(potion.template, 'potion');
  assert.equal(potion.minConfidence, 0.9);
});

test('steps are normalized into their tagged forms', () => {
  const farm = findSequence(loadWorkspace(EXAMPLE), 'farm');
  assert.equal(farm.cycles, 3);

  assert.deepEqual(farm.start[0], { type: 'click', pointId: 1, wait: { type: 'fixed', seconds: 2 }, else: undefined });

  const [confirm, scan, waitScan] = farm.loops[0].steps;
  assert.deepEqual(confirm, {
    type: 'click',
    pointId: 2,
    wait: {
      type: 'delayThenPixel',
      seconds: 1,
      pixel: { x: 700, y: 520, color: { r: 0, g: 192, b: 0 }, polarity: 'appear' },
    },
    else: { type: 'restart' },
  });
  assert.deepEqual(scan, { type: 'scan', scanId: 'loot', mode: undefined, else: { type: 'skip' } });
  assert.deepEqual(waitScan, {
    type: 'waitScan',
    scanId: 'loot',
    item: 'potion',
    polarity: 'gone',
    else: { type: 'key', key: 'esc' },
  });

  assert.deepEqual(farm.end[0], {
    type: 'waitNumber',
    region: { x: 900, y: 40, width: 120, height: 24 },
    comparator: '>=',
    threshold: 1000,
    clickPointId: 3,
    textColor: undefined,
    else: undefined,
  });
  assert.deepEqual(farm.end[1], { type: 'key', key: 'ctrl+s', wait: { type: 'range', min: 1, max: 3 }, else: undefined });
});

test('clock waits, defaults and ELSE clicks', () => {
  const daily = findSequence(loadWorkspace(EXAMPLE), 'daily');
  assert.equal(daily.cycles, 1);
  assert.deepEqual(daily.loops, []);
  assert.deepEqual(daily.start[0].type === 'wait' ? daily.start[0].wait : null, {
    type: 'clock',
    target: { kind: 'time', hour: 6, minute: 0 },
  });
  assert.deepEqual(daily.start[1], {
    type: 'click',
    pointId: 1,
    wait: { type: 'none' },
    else: { type: 'click', pointId: 3, delaySeconds: 0.5 },
  });
});

test('scans resolve their slots and items', () => {
  const { scans } = parseWorkspace(doc({}));
  assert.equal(scans[0].defaultMode, 'all');
  assert.deepEqual(scans[0].slots.map(s => s.name), ['s1']);
  assert.deepEqual(scans[0].items[0].markers, [{ dx: 1, dy: 1, color: { r: 255, g: 0, b: 0 } }]);
});

test('minMarkers, point confirms and caller defaults', () => {
  const { items } = parseWorkspace(doc({
    items: [{ name: 'A', priority: 2, markers: [], minMarkers: 1, confirm: { x: 5, y: 6 } }],
  }), { minConfidence: 0.6, confirmDelaySeconds: 1 });

  assert.deepEqual(items[0].markerPolicy, { minimum: 1 });
  assert.equal(items[0].minConfidence, 0.6);
  assert.deepEqual(items[0].confirm, { target: { type: 'point', x: 5, y: 6 }, delaySeconds: 1 });
});

test('= reads as ==', () => {
  const { sequences } = parseWorkspace(doc(seq([
    { type: 'waitNumber', region: { x: 0, y: 0, width: 4, height: 4 }, comparator: '=', threshold: 5 },
  ])));
  const step = sequences[0].start[0];
  assert.equal(step.type === 'waitNumber' ? step.comparator : null, '==');
});

test('dangling references are rejected', () => {
  assert.throws(
    () => parseWorkspace(doc(seq([{ type: 'click', point: 9 }]))),
    (error: unknown) => error instanceof MissingReferenceError && error.message === "s START #1: unknown point '9'"
  );
  assert.throws(
    () => parseWorkspace(doc({ scans: [{ name: 'x', slots: ['nope'], items: ['A'] }] })),
    (error: unknown) => error instanceof MissingReferenceError && error.message === "scan 'x': unknown slot 'nope'"
  );
  assert.throws(
    () => parseWorkspace(doc(seq([{ type: 'waitScan', scan: 'loot', item: 'B' }]))),
    (error: unknown) => error instanceof MissingReferenceError && error.referenceType === 'item'
  );
  assert.throws(
    () => parseWorkspace(doc(seq([{ type: 'wait', wait: 1, else: { type: 'click', point: 4 } }]))),
    MissingReferenceError
  );
});

test('duplicate ids are rejected', () => {
  assert.throws(
    () => parseWorkspace(doc({ points: [{ id: 1, name: 'a', x: 0, y: 0 }, { id: 1, name: 'b', x: 1, y: 1 }] })),
    /Duplicate point id: 1/
  );
});

test('malformed documents are ZodErrors', () => {
  assert.throws(() => parseWorkspace(doc(seq([{ type: 'click', point: 1, wait: '10-5' }]))), ZodError);
  assert.throws(() => parseWorkspace(doc(seq([{ type: 'teleport' }]))), ZodError);
  assert.throws(() => parseWorkspace(doc({ sequences: [{ name: 's', cycles: 0 }] })), ZodError);
  assert.throws(() => parseWorkspace(doc(seq([{ type: 'click', point: 1, wait: { type: 'pixel', x: 0, y: 0, color: 'red' } }]))), ZodError);
});

test('unknown sequences and unreadable files', () => {
  const workspace = parseWorkspace(doc({}));
  assert.throws(() => findSequence(workspace, 'missing'), /workspace: unknown sequence 'missing'/);

  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'vseq-ws-')), 'broken.json');
  fs.writeFileSync(file, '{ "points": [');
  assert.throws(() => loadWorkspace(file), /Could not parse /);
});

test('validateSequence checks a sequence built in code', () => {
  const points = [{ id: 1, name: 'P1', x: 0, y: 0 }];
  const sequence = {
    name: 'inline',
    cycles: 1,
    start: [],
    loops: [{ name: 'l', repeat: 1, steps: [{ type: 'scan' as const, scanId: 'none' }] }],
    end: [],
  };
  assert.throws(
    () => validateSequence(sequence, { points, scans: [] }),
    (error: unknown) => error instanceof MissingReferenceError && error.message === "inline LOOP l #1: unknown scan 'none'"
  );
});
