import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { IntervalListStore } from "../src/state/sequenceStore.js";
import { SequenceFileStorage } from "../src/state/sequenceStorage.js";

async function createStore() {
  const dir = await mkdtemp(join(tmpdir(), "sequencer-store-"));
  const filePath = join(dir, "nested", "sequence.json");
  const storage = new SequenceFileStorage(filePath);
  const store = new IntervalListStore({
    initial: await storage.load(),
    onChange: sequence => storage.save(sequence)
  });

  async function cleanup() {
    await rm(dir, { recursive: true, force: true });
  }

  return { store, storage, filePath, dir, cleanup };
}

test("add persists the interval list", async t => {
  const { store, filePath, cleanup } = await createStore();
  t.after(cleanup);

  const result = store.add({ durationMs: 60_000, name: "Warmup" });
  await store.waitForPersistence();

  assert.equal(result.message, "Added Warmup (1m 0s).");
  const persisted = JSON.parse(await readFile(filePath, "utf-8"));
  assert.equal(persisted.circular, false);
  assert.equal(persisted.intervals.length, 1);
  assert.equal(persisted.intervals[0].name, "Warmup");
  assert.equal(persisted.intervals[0].durationMs, 60_000);
  assert.equal(persisted.intervals[0].id, result.interval?.id);
});

test("duplicate inserts a copy right after the original", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  const first = store.add({ durationMs: 30_000, name: "Run" }).interval;
  store.add({ durationMs: 10_000 });
  assert.ok(first);

  const result = store.duplicate(first.id);
  const names = result.sequence.intervals.map(interval => interval.name);

  assert.deepEqual(names, ["Run", "Run (Copy)", undefined]);
  assert.notEqual(result.sequence.intervals[1].id, first.id);
  assert.equal(result.sequence.intervals[1].durationMs, 30_000);
});

test("duplicating an unnamed interval keeps it unnamed", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  const interval = store.add({ durationMs: 5000 }).interval;
  assert.ok(interval);

  const copy = store.duplicate(interval.id).interval;
  assert.equal(copy?.name, undefined);
  assert.equal(copy?.durationMs, 5000);
});

test("move reorders and clamps the target position", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  store.add({ durationMs: 1000, name: "A" });
  const b = store.add({ durationMs: 1000, name: "B" }).interval;
  const c = store.add({ durationMs: 1000, name: "C" }).interval;
  assert.ok(b && c);

  const moved = store.move(c.id, 0);
  assert.equal(moved.message, "Moved C (0m 1s) to position 1.");
  assert.deepEqual(
    moved.sequence.intervals.map(interval => interval.name),
    ["C", "A", "B"]
  );

  const clamped = store.move(b.id, 99);
  assert.equal(clamped.message, "Moved B (0m 1s) to position 3.");
  assert.deepEqual(
    clamped.sequence.intervals.map(interval => interval.name),
    ["C", "A", "B"]
  );
});

test("update changes fields and can clear the name", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  const interval = store.add({ durationMs: 1000, name: "Rest" }).interval;
  assert.ok(interval);

  const renamed = store.update(interval.id, { durationMs: 2000 });
  assert.equal(renamed.interval?.name, "Rest");
  assert.equal(renamed.interval?.durationMs, 2000);

  const cleared = store.update(interval.id, { name: null });
  assert.equal(cleared.interval?.name, undefined);
  assert.equal(cleared.interval?.id, interval.id);
});

test("unknown ids and invalid durations are rejected", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  assert.throws(() => store.remove("missing"), /Interval not found/);
  assert.throws(() => store.add({ durationMs: 0 }), /at least one millisecond/);
});

test("circular flag and intervals survive a reload", async t => {
  const { store, filePath, cleanup } = await createStore();
  t.after(cleanup);

  store.add({ durationMs: 45_000, name: "Work" });
  store.add({ durationMs: 15_000 });
  store.setCircular(true);
  await store.waitForPersistence();

  const reloaded = new IntervalListStore({ initial: await new SequenceFileStorage(filePath).load() });
  assert.deepEqual(reloaded.toIntervalSequence(), {
    intervals: [{ durationMs: 45_000, name: "Work" }, { durationMs: 15_000 }],
    circular: true
  });
});

test("a missing file loads as an empty sequence", async t => {
  const { storage, cleanup } = await createStore();
  t.after(cleanup);

  assert.deepEqual(await storage.load(), { intervals: [], circular: false });
});

test("corrupt or invalid files load as an empty sequence", async t => {
  const errorLog = t.mock.method(console, "error", () => undefined);
  const { dir, cleanup } = await createStore();
  t.after(cleanup);

  const garbled = join(dir, "garbled.json");
  await writeFile(garbled, "{not json", "utf-8");
  assert.deepEqual(await new SequenceFileStorage(garbled).load(), { intervals: [], circular: false });

  const invalid = join(dir, "invalid.json");
  await writeFile(invalid, JSON.stringify({ intervals: [{ id: "x", durationMs: -1 }] }), "utf-8");
  assert.deepEqual(await new SequenceFileStorage(invalid).load(), { intervals: [], circular: false });

  assert.equal(errorLog.mock.callCount(), 2);
});

test("persistence failures surface through waitForPersistence", async t => {
  t.mock.method(console, "error", () => undefined);
  const store = new IntervalListStore({
    onChange: () => Promise.reject(new Error("disk full"))
  });

  store.add({ durationMs: 1000 });

  await assert.rejects(store.waitForPersistence(), /disk full/);
  await store.waitForPersistence();
});
