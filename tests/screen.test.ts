import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  ImageScreenSource,
  createBuffer,
  cropBuffer,
  fillRect,
  pixelAt,
  rectCenter,
} from '../src/lib/auto/screen';
import { BLACK, BLUE, RED } from './helpers';

test('createBuffer fills every pixel', () => {
  const buffer = createBuffer(3, 2, BLUE);
  assert.equal(buffer.data.length, 24);
  assert.deepEqual(pixelAt(buffer, 2, 1), BLUE);
  assert.equal(buffer.data[3], 255);
});

test('pixelAt returns null outside the buffer', () => {
  const buffer = createBuffer(2, 2);
  assert.equal(pixelAt(buffer, 2, 0), null);
  assert.equal(pixelAt(buffer, -1, 0), null);
  assert.equal(pixelAt(buffer, 0, 2), null);
});

test('fillRect clips to the buffer', () => {
  const buffer = createBuffer(4, 4);
  fillRect(buffer, { x: 2, y: 2, width: 10, height: 10 }, RED);
  assert.deepEqual(pixelAt(buffer, 3, 3), RED);
  assert.deepEqual(pixelAt(buffer, 1, 1), BLACK);
});

test('cropBuffer copies the rect and pads outside with black', () => {
  const buffer = createBuffer(4, 4);
  fillRect(buffer, { x: 1, y: 1, width: 1, height: 1 }, RED);
  const crop = cropBuffer(buffer, { x: 1, y: 1, width: 4, height: 4 });
  assert.equal(crop.width, 4);
  assert.deepEqual(pixelAt(crop, 0, 0), RED);
  assert.deepEqual(pixelAt(crop, 3, 3), BLACK);
});

test('rectCenter rounds down', () => {
  assert.deepEqual(rectCenter({ x: 10, y: 20, width: 5, height: 4 }), { x: 12, y: 22 });
});

test('ImageScreenSource maps virtual-desktop coordinates through its origin', async () => {
  const frame = createBuffer(4, 4);
  fillRect(frame, { x: 1, y: 1, width: 1, height: 1 }, RED);
  const screen = new ImageScreenSource(frame, { x: -100, y: 50 });

  assert.deepEqual(await screen.readPixel(-99, 51), RED);
  assert.deepEqual(await screen.readPixel(1000, 1000), BLACK);

  const region = await screen.captureRegion({ x: -100, y: 50, width: 2, height: 2 });
  assert.deepEqual(pixelAt(region, 1, 1), RED);
  assert.deepEqual(pixelAt(region, 0, 0), BLACK);
});

test('ImageScreenSource.setFrame swaps the visible screen', async () => {
  const screen = new ImageScreenSource(createBuffer(2, 2));
  screen.setFrame(createBuffer(2, 2, BLUE));
  assert.deepEqual(await screen.readPixel(0, 0), BLUE);
});
