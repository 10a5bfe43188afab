import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createKeyPicker, generateWriteKey, randomString } from '../src/keys';
import { generatePayload } from '../src/payload';
import { WorkerRng } from '../src/random';

const keys = ['a', 'b', 'c'];

test('sequential picker starts at worker id modulo key count and steps by one', () => {
  const rng = new WorkerRng(1);
  const worker1 = createKeyPicker(keys, 1, false, rng);
  assert.deepEqual([worker1.next(), worker1.next(), worker1.next(), worker1.next()], ['b', 'c', 'a', 'b']);

  const worker4 = createKeyPicker(keys, 4, false, rng);
  assert.equal(worker4.next(), 'b');
});

test('random picker only returns listed keys and reaches all of them', () => {
  const picker = createKeyPicker(keys, 0, true, new WorkerRng(99));
  const seen = new Set<string>();
  for (let i = 0; i < 200; i += 1) {
    const key = picker.next();
    assert.ok(keys.includes(key));
    seen.add(key);
  }
  assert.equal(seen.size, 3);
});

test('createKeyPicker rejects an empty key list', () => {
  assert.throws(() => createKeyPicker([], 0, false, new WorkerRng(1)), {
    message: 'cannot pick keys from an empty key list',
  });
});

test('write keys carry the owner, a clock component and a random suffix', () => {
  const rng = new WorkerRng(7);
  const first = generateWriteKey('worker3', rng);
  const second = generateWriteKey('worker3', rng);
  assert.match(first, /^stresser\/worker3\/\d+-[A-Za-z0-9]{8}\.dat$/);
  assert.notEqual(first, second);
  assert.match(generateWriteKey('job12', rng), /^stresser\/job12\//);
  assert.equal(randomString(5, rng).length, 5);
});

test('identically seeded generators produce the same stream', () => {
  const left = new WorkerRng(2024);
  const right = new WorkerRng(2024);
  const drawn = Array.from({ length: 5 }, () => left.nextUint32());
  assert.deepEqual(
    Array.from({ length: 5 }, () => right.nextUint32()),
    drawn,
  );
  for (let i = 0; i < 1000; i += 1) {
    const value = left.nextFloat();
    assert.ok(value >= 0 && value < 1);
  }
});

test('a zero seed still yields a working stream', () => {
  const rng = new WorkerRng(0);
  assert.notEqual(rng.nextUint32(), 0);
});

test('payloads have the requested size and differ between writes', () => {
  const rng = WorkerRng.forWorker(0);
  const first = generatePayload(1027, rng);
  const second = generatePayload(1027, rng);
  assert.equal(first.length, 1027);
  assert.equal(second.length, 1027);
  assert.equal(first.equals(second), false);
});
