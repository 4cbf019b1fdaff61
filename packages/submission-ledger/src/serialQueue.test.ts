import { test } from "node:test";
import assert from "node:assert/strict";
import { createSerialQueue } from "./serialQueue.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("tasks run one at a time in submission order", async () => {
  const queue = createSerialQueue();
  const events: string[] = [];
  const task = (name: string, ms: number) => async () => {
    events.push(`start:${name}`);
    await delay(ms);
    events.push(`end:${name}`);
    return name;
  };

  const results = await Promise.all([
    queue.run(task("a", 20)),
    queue.run(task("b", 1)),
    queue.run(task("c", 5))
  ]);

  assert.deepEqual(results, ["a", "b", "c"]);
  assert.deepEqual(events, ["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  assert.equal(queue.pending, 0);
});

test("a rejected task does not stall the tasks behind it", async () => {
  const queue = createSerialQueue();
  const failing = queue.run(async () => {
    throw new Error("boom");
  });
  const following = queue.run(async () => "ok");

  await assert.rejects(failing, /boom/);
  assert.equal(await following, "ok");
  assert.equal(queue.pending, 0);
});

test("pending counts queued and running tasks", async () => {
  const queue = createSerialQueue();
  const first = queue.run(() => delay(5));
  const second = queue.run(() => delay(1));
  assert.equal(queue.pending, 2);
  await first;
  await second;
  assert.equal(queue.pending, 0);
});
