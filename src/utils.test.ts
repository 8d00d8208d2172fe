import test from 'node:test';
import assert from 'node:assert/strict';
import { isFalsyFlag, isTruthyFlag, mulberry32 } from './utils.js';

test('isTruthyFlag: accepts common spellings', () => {
  for (const v of ['1', 'true', 'YES', ' on ']) {
    assert.equal(isTruthyFlag(v), true, v);
  }
  for (const v of [undefined, '', '0', 'nope']) {
    assert.equal(isTruthyFlag(v), false, String(v));
  }
});

test('isFalsyFlag: accepts common spellings', () => {
  for (const v of ['0', 'false', 'No', 'OFF']) {
    assert.equal(isFalsyFlag(v), true, v);
  }
  assert.equal(isFalsyFlag(undefined), false);
  assert.equal(isFalsyFlag('1'), false);
});

test('mulberry32: deterministic for a seed and within [0, 1)', () => {
  const a = mulberry32(42);
  const b = mulberry32(42);
  const seqA = Array.from({ length: 5 }, () => a());
  const seqB = Array.from({ length: 5 }, () => b());

  assert.deepEqual(seqA, seqB);
  for (const x of seqA) assert.ok(x >= 0 && x < 1);
  assert.notDeepEqual(seqA, Array.from({ length: 5 }, mulberry32(43)));
});
