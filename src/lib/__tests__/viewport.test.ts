import assert from 'node:assert/strict';
import test from 'node:test';
import { Viewport, toCssColor } from '../viewport';
import { assertVecClose } from './helpers';

const viewport = new Viewport(1000, 800);

test('world origin maps to the canvas centre', () => {
  assertVecClose(viewport.toScreen({ x: 0, y: 0 }), { x: 500, y: 400 });
});

test('world +y points up on the canvas', () => {
  assertVecClose(viewport.toScreen({ x: -500, y: 400 }), { x: 0, y: 0 });
  assertVecClose(viewport.toScreen({ x: 250, y: -100 }), { x: 750, y: 500 });
});

test('toWorld inverts toScreen inside the surface', () => {
  const world = viewport.toWorld(750, 500);
  assert.ok(world);
  assertVecClose(world, { x: 250, y: -100 });
  const corner = viewport.toWorld(0, 800);
  assert.ok(corner);
  assertVecClose(corner, { x: -500, y: -400 });
});

test('toWorld reports pixels outside the surface as unavailable', () => {
  assert.equal(viewport.toWorld(1001, 10), null);
  assert.equal(viewport.toWorld(10, -1), null);
  assert.equal(viewport.toWorld(NaN, 10), null);
});

test('toWorld keeps the surface edges', () => {
  const edge = viewport.toWorld(1000, 0);
  assert.ok(edge);
  assertVecClose(edge, { x: 500, y: 400 });
});

test('contains checks the centred bounds', () => {
  assert.equal(viewport.contains({ x: 500, y: -400 }), true);
  assert.equal(viewport.contains({ x: 500.1, y: 0 }), false);
});

test('toCssColor formats 0xRRGGBB as a hex string', () => {
  assert.equal(toCssColor(0x66ff66), '#66ff66');
  assert.equal(toCssColor(0x000000), '#000000');
  assert.equal(toCssColor(0x0a0b0c), '#0a0b0c');
});
