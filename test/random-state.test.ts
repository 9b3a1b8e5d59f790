import test from "node:test";
import assert from "node:assert/strict";
import { RandomState } from "../src/common/random.js";

function draw(random: RandomState, count: number): number[] {
  return Array.from({ length: count }, () => random.next());
}

test("RandomState replays the same sequence for the same seed", () => {
  assert.deepEqual(draw(new RandomState(7), 5), draw(new RandomState(7), 5));
});

test("RandomState sequences differ across seeds", () => {
  assert.notDeepEqual(draw(new RandomState(1), 5), draw(new RandomState(2), 5));
});

test("RandomState.next stays in [0, 1)", () => {
  for (const value of draw(new RandomState(-42), 200)) {
    assert.ok(value >= 0 && value < 1, `out of range: ${value}`);
  }
});

test("RandomState.nextInt stays inside the half-open range", () => {
  const random = new RandomState(11);
  for (let i = 0; i < 200; i += 1) {
    const value = random.nextInt(3, 6);
    assert.ok(Number.isInteger(value));
    assert.ok(value >= 3 && value < 6, `out of range: ${value}`);
  }
  assert.throws(() => random.nextInt(5, 5), RangeError);
});

test("RandomState keeps its seed and rejects non-integer seeds", () => {
  assert.equal(new RandomState(7).seed, 7);
  assert.throws(() => new RandomState(1.5), RangeError);
});
