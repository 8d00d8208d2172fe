import test from 'node:test';
import assert from 'node:assert/strict';
import { deepFreeze } from './freeze.js';

test('deepFreeze: freezes nested plain objects and arrays', () => {
  const value = { a: { b: [1, { c: 2 }] } };
  deepFreeze(value);

  assert.ok(Object.isFrozen(value));
  assert.ok(Object.isFrozen(value.a));
  assert.ok(Object.isFrozen(value.a.b));
  assert.ok(Object.isFrozen(value.a.b[1]));
  assert.throws(() => {
    value.a.b.push(3);
  }, TypeError);
});

test('deepFreeze: leaves class instances and Maps alone', () => {
  class Box {
    n = 1;
  }
  const box = new Box();
  const map = new Map([['k', 1]]);
  const value = { box, map };
  deepFreeze(value);

  assert.ok(Object.isFrozen(value));
  assert.equal(Object.isFrozen(box), false);
  assert.equal(Object.isFrozen(map), false);
});

test('deepFreeze: handles cycles and primitives', () => {
  const a: { self?: unknown; n: number } = { n: 1 };
  a.self = a;

  assert.equal(deepFreeze(a), a);
  assert.ok(Object.isFrozen(a));
  assert.equal(deepFreeze(5), 5);
  assert.equal(deepFreeze(null), null);
});
