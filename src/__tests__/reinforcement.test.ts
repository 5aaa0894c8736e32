import { describe, test } from "node:test";
import assert from "node:assert/strict";
import {
  ReinforcementEngine,
  computeDecayFactor,
  computeReinforcement,
} from "../reinforcement.js";
import type { RecordStore, StoredRecord } from "../store.js";
import { addRecord, near, sandbox, NOW } from "./helpers.js";
import { daysAgo, MS_PER_DAY } from "../time.js";

/** Put a record into a given weight state */
function setState(store: RecordStore, r: StoredRecord, accessCount: number, weight: number, level = 0) {
  const ok = store.compareAndSetWeights({
    id: r.id,
    owner_id: r.owner_id,
    expected_access_count: r.access_count,
    access_count: accessCount,
    memory_weight: weight,
    reinforcement_level: level,
    last_accessed: NOW.toISOString(),
  });
  assert.equal(ok, true);
}

describe("computeReinforcement", () => {
  test("plain access adds 0.05", () => {
    const next = computeReinforcement({ access_count: 0, memory_weight: 1.0, reinforcement_level: 0 });
    assert.equal(next.access_count, 1);
    near(next.memory_weight, 1.05);
    assert.equal(next.reinforcement_level, 0);
    assert.equal(next.leveled_up, false);
  });

  test("every third access adds 0.20 and levels up", () => {
    const next = computeReinforcement({ access_count: 2, memory_weight: 1.1, reinforcement_level: 0 });
    assert.equal(next.access_count, 3);
    near(next.memory_weight, 1.3);
    near(next.increment, 0.2);
    assert.equal(next.reinforcement_level, 1);
    assert.equal(next.leveled_up, true);
  });
});

describe("computeDecayFactor", () => {
  test("records up to a year old do not decay", () => {
    assert.equal(computeDecayFactor(0, 0), null);
    assert.equal(computeDecayFactor(365, 0), null);
  });

  test("decays linearly past a year down to 0.3", () => {
    near(computeDecayFactor(366, 0)?.factor ?? NaN, 0.999);
    near(computeDecayFactor(730, 0)?.factor ?? NaN, 0.635);
    assert.equal(computeDecayFactor(2000, 0)?.factor, 0.3);
  });

  test("frequently accessed records keep at least 70%", () => {
    assert.deepEqual(computeDecayFactor(730, 5), { factor: 0.7, protected: true });
    // the floor only counts as protection when it raised the factor
    const mild = computeDecayFactor(400, 9);
    assert.ok(mild);
    near(mild.factor, 0.965);
    assert.equal(mild.protected, false);
  });
});

describe("ReinforcementEngine.reinforce", () => {
  test("level-up case: 2 accesses at 1.10 becomes 3 at 1.30", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "note", [1, 0, 0], 10);
    setState(store, r, 2, 1.1);

    const outcome = await engine.reinforce("p1", r.id, NOW);
    assert.ok(outcome);
    assert.equal(outcome.access_count, 3);
    near(outcome.memory_weight, 1.3);
    assert.equal(outcome.reinforcement_level, 1);
    assert.equal(outcome.leveled_up, true);
    near(outcome.previous_weight, 1.1);

    const stored = store.get(r.id, "p1");
    assert.ok(stored);
    near(stored.memory_weight, 1.3);
    assert.equal(stored.last_accessed, NOW.toISOString());
    close();
  });

  test("non-level-up case: fresh record becomes 1 access at 1.05", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "note", [1, 0, 0], 10);
    const outcome = await engine.reinforce("p1", r.id, NOW);
    assert.ok(outcome);
    assert.equal(outcome.access_count, 1);
    near(outcome.memory_weight, 1.05);
    assert.equal(outcome.reinforcement_level, 0);
    close();
  });

  test("returns null for another owner's record and leaves it untouched", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "note", [1, 0, 0], 10);
    assert.equal(await engine.reinforce("p2", r.id, NOW), null);
    assert.equal(store.get(r.id, "p1")?.access_count, 0);
    close();
  });

  test("50 concurrent reinforcements are all applied", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "note", [1, 0, 0], 10);

    await Promise.all(Array.from({ length: 50 }, () => engine.reinforce("p1", r.id, NOW)));

    const stored = store.get(r.id, "p1");
    assert.ok(stored);
    assert.equal(stored.access_count, 50);
    assert.equal(stored.reinforcement_level, 16);
    // 50 × 0.05 + 16 × 0.15
    near(stored.memory_weight, 5.9, 1e-9);
    close();
  });

  test("reinforceMany skips missing records and applies the rest", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const a = addRecord(store, "p1", "a", [1, 0, 0], 10);
    const b = addRecord(store, "p1", "b", [1, 0, 0], 20);

    const result = await engine.reinforceMany("p1", [a.id, "missing-id", b.id], NOW);
    assert.deepEqual(result.applied.map((o) => o.id), [a.id, b.id]);
    assert.deepEqual(result.failed, ["missing-id"]);
    assert.equal(store.get(a.id, "p1")?.access_count, 1);
    assert.equal(store.get(b.id, "p1")?.access_count, 1);
    close();
  });
});

describe("ReinforcementEngine.applyDecay", () => {
  test("unprotected 730-day record decays to 0.635", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "old note", [1, 0, 0], 730);

    const result = await engine.applyDecay("p1", NOW);
    assert.equal(result.decayed_count, 1);
    assert.equal(result.protected_count, 0);
    assert.equal(result.skipped, false);
    near(store.get(r.id, "p1")?.memory_weight ?? NaN, 0.635);
    close();
  });

  test("protected 730-day record keeps at least 70%", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "old note", [1, 0, 0], 730);
    setState(store, r, 7, 1.5, 2);

    const result = await engine.applyDecay("p1", NOW);
    assert.equal(result.protected_count, 1);
    const stored = store.get(r.id, "p1");
    assert.ok(stored);
    near(stored.memory_weight, 1.05);
    assert.ok(stored.memory_weight >= 1.05 - 1e-9);
    // decay never touches counters
    assert.equal(stored.access_count, 7);
    assert.equal(stored.reinforcement_level, 2);
    close();
  });

  test("young records are left alone", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "recent", [1, 0, 0], 365);
    const result = await engine.applyDecay("p1", NOW);
    assert.equal(result.decayed_count, 0);
    assert.equal(store.get(r.id, "p1")?.memory_weight, 1.0);
    close();
  });

  test("a pass at the same or an earlier time is skipped", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "old note", [1, 0, 0], 730);

    await engine.applyDecay("p1", NOW);
    const again = await engine.applyDecay("p1", NOW);
    const earlier = await engine.applyDecay("p1", daysAgo(1, NOW));
    assert.equal(again.skipped, true);
    assert.equal(again.decayed_count, 0);
    assert.equal(earlier.skipped, true);
    near(store.get(r.id, "p1")?.memory_weight ?? NaN, 0.635);

    const later = await engine.applyDecay("p1", new Date(NOW.getTime() + MS_PER_DAY));
    assert.equal(later.skipped, false);
    assert.equal(later.decayed_count, 1);
    close();
  });

  test("a second pass later on the same day is skipped", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "old note", [1, 0, 0], 730);

    const first = await engine.applyDecay("p1", NOW);
    const retry = await engine.applyDecay("p1", new Date(NOW.getTime() + 2));
    const evening = await engine.applyDecay("p1", new Date(NOW.getTime() + MS_PER_DAY - 1));
    assert.equal(first.decayed_count, 1);
    assert.equal(retry.skipped, true);
    assert.equal(evening.skipped, true);
    near(store.get(r.id, "p1")?.memory_weight ?? NaN, 0.635);
    close();
  });

  test("weight stays positive through any number of passes", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "ancient", [1, 0, 0], 3000);

    for (let i = 1; i <= 60; i++) {
      await engine.applyDecay("p1", new Date(NOW.getTime() + i * MS_PER_DAY));
      if (i % 7 === 0) await engine.reinforce("p1", r.id, NOW);
    }
    const stored = store.get(r.id, "p1");
    assert.ok(stored);
    assert.ok(stored.memory_weight > 0, `weight ${stored.memory_weight}`);
    close();
  });

  test("only the given owner is decayed", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    addRecord(store, "p1", "old", [1, 0, 0], 730);
    const other = addRecord(store, "p2", "old too", [1, 0, 0], 730);
    await engine.applyDecay("p1", NOW);
    assert.equal(store.get(other.id, "p2")?.memory_weight, 1.0);
    close();
  });

  test("decay and reinforcement of one owner never interleave", async () => {
    const { store, close } = sandbox();
    const engine = new ReinforcementEngine(store);
    const r = addRecord(store, "p1", "old", [1, 0, 0], 730);

    await Promise.all([
      engine.reinforce("p1", r.id, NOW),
      engine.applyDecay("p1", NOW),
      engine.reinforce("p1", r.id, NOW),
    ]);
    // arrival order: +0.05, ×0.635, +0.05
    near(store.get(r.id, "p1")?.memory_weight ?? NaN, 1.05 * 0.635 + 0.05);
    close();
  });
});
