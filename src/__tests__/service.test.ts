import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { ChartRecall } from "../service.js";
import { openDb } from "../db.js";
import { assessHealth } from "../health.js";
import { CollaboratorTimeoutError, ValidationError } from "../errors.js";
import { CONSENT_NOTICE, DATA_POLICY } from "../safety.js";
import { silentLogger } from "../logger.js";
import type { EmbeddingProvider } from "../embeddings.js";
import { daysAgo } from "../time.js";
import { HangingEmbedder, MapEmbedder, NOW, near, sleep, testConfig } from "./helpers.js";

const VECTORS: Record<string, number[]> = {
  "Knee pain after running. Recommended physical therapy.": [1, 0, 0],
  "Knee pain when climbing stairs": [0.9, 0.1, 0],
  "Seasonal allergies, antihistamine started": [0, 1, 0],
  "knee pain": [1, 0, 0],
};

function app(embedder: EmbeddingProvider = new MapEmbedder(VECTORS)) {
  return new ChartRecall({ db: openDb(":memory:"), embedder, config: testConfig(), logger: silentLogger });
}

async function seed(recall: ChartRecall, ownerId = "p1") {
  const old = await recall.ingest({
    owner_id: ownerId,
    content: "Knee pain after running. Recommended physical therapy.",
    category: "doctor_note",
    created_at: daysAgo(400, NOW),
  });
  const recent = await recall.ingest({
    owner_id: ownerId,
    content: "Knee pain when climbing stairs",
    category: "symptom",
    tags: ["knee"],
    created_at: daysAgo(5, NOW),
  });
  await recall.ingest({
    owner_id: ownerId,
    content: "Seasonal allergies, antihistamine started",
    category: "symptom",
    created_at: daysAgo(60, NOW),
  });
  return { old, recent };
}

describe("ChartRecall.ingest", () => {
  test("stores the trimmed content with its embedding", async () => {
    const embedder = new MapEmbedder(VECTORS);
    const recall = app(embedder);
    const result = await recall.ingest({ owner_id: "p1", content: "  knee pain  ", created_at: NOW });
    assert.equal(result.created_at, NOW.toISOString());
    assert.deepEqual(embedder.calls, ["knee pain"]);

    const stored = recall.store.get(result.record_id, "p1");
    assert.ok(stored);
    assert.equal(stored.content, "knee pain");
    assert.deepEqual(Array.from(stored.embedding), [1, 0, 0]);
    recall.close();
  });

  test("rejects bad input before embedding", async () => {
    const embedder = new MapEmbedder(VECTORS);
    const recall = app(embedder);
    await assert.rejects(recall.ingest({ owner_id: "bad owner", content: "x" }), ValidationError);
    await assert.rejects(recall.ingest({ owner_id: "p1", content: "   " }), ValidationError);
    await assert.rejects(
      recall.ingest({ owner_id: "p1", content: "x", created_at: new Date("not a date") }),
      ValidationError,
    );
    assert.deepEqual(embedder.calls, []);
    recall.close();
  });

  test("stores nothing when the embedding times out", async () => {
    const recall = app(new HangingEmbedder());
    await assert.rejects(recall.ingest({ owner_id: "p1", content: "knee pain" }), CollaboratorTimeoutError);
    assert.equal(recall.store.countByOwner("p1"), 0);
    recall.close();
  });
});

describe("ChartRecall.query", () => {
  test("ranks, reinforces and surfaces the forgotten recommendation", async () => {
    const recall = app();
    const { old, recent } = await seed(recall);

    const result = await recall.query({ owner_id: "p1", query_text: "knee pain", as_of: NOW });
    assert.equal(result.status, "accepted");
    const ids = result.output.ranked_candidates?.map((c) => c.record_id);
    assert.deepEqual(ids, [recent.record_id, old.record_id]);
    assert.deepEqual(result.output.insights, ["Unfollowed recommendation from 13 months ago: physical therapy."]);
    assert.equal(recall.store.get(old.record_id, "p1")?.access_count, 1);
    recall.close();
  });
});

describe("ChartRecall.maintain", () => {
  test("decays old records once per as_of", async () => {
    const recall = app();
    const { old } = await seed(recall);

    const first = await recall.maintain("p1", NOW);
    assert.equal(first.decayed_count, 1);
    assert.equal(first.protected_count, 0);
    const second = await recall.maintain("p1", NOW);
    assert.equal(second.skipped, true);

    // 400 days: 1 - 35/1000
    const weight = recall.store.get(old.record_id, "p1")?.memory_weight ?? NaN;
    assert.ok(Math.abs(weight - 0.965) < 1e-9);
    recall.close();
  });

  test("a retried maintain without as_of decays once", async () => {
    const recall = app();
    const { record_id } = await recall.ingest({ owner_id: "p1", content: "knee pain", created_at: daysAgo(730) });

    const first = await recall.maintain("p1");
    await sleep(2);
    const second = await recall.maintain("p1");
    assert.equal(first.decayed_count, 1);
    assert.equal(second.skipped, true);
    near(recall.store.get(record_id, "p1")?.memory_weight ?? NaN, 0.635);
    recall.close();
  });

  test("maintainAll visits every owner", async () => {
    const recall = app();
    await seed(recall, "p1");
    await seed(recall, "p2");
    const { results, failed } = await recall.maintainAll(NOW);
    assert.deepEqual(results.map((r) => [r.owner_id, r.decayed_count]), [["p1", 1], ["p2", 1]]);
    assert.deepEqual(failed, []);
    recall.close();
  });

  test("rejects a malformed owner id", async () => {
    const recall = app();
    await assert.rejects(recall.maintain("../p1", NOW), ValidationError);
    recall.close();
  });
});

describe("ChartRecall.purge", () => {
  test("is a hard delete and safe to repeat", async () => {
    const recall = app();
    await seed(recall, "p1");
    await seed(recall, "p2");

    assert.equal(await recall.purge("p1"), 3);
    assert.equal(await recall.purge("p1"), 0);
    assert.deepEqual(recall.timeline("p1"), []);
    assert.equal(recall.timeline("p2").length, 3);
    recall.close();
  });
});

describe("ChartRecall.timeline", () => {
  test("lists records oldest first without embeddings", async () => {
    const recall = app();
    await seed(recall);
    const timeline = recall.timeline("p1");
    assert.deepEqual(timeline.map((r) => r.category), ["doctor_note", "symptom", "symptom"]);
    assert.equal("embedding" in timeline[0], false);
    assert.deepEqual(timeline[2].tags, ["knee"]);

    const lastMonths = recall.timeline("p1", { start: daysAgo(90, NOW) });
    assert.equal(lastMonths.length, 2);
    recall.close();
  });
});

describe("memory health", () => {
  test("summarizes counts, range and score", async () => {
    const recall = app();
    await recall.ingest({ owner_id: "p1", content: "knee pain", category: "symptom", created_at: daysAgo(10, NOW) });
    await recall.ingest({ owner_id: "p1", content: "knee pain", category: "doctor_note", created_at: daysAgo(40, NOW) });
    await recall.ingest({ owner_id: "p1", content: "knee pain", category: "prescription", created_at: daysAgo(100, NOW) });

    const h = recall.memoryHealth("p1", NOW);
    assert.equal(h.total_records, 3);
    assert.deepEqual(h.categories, { prescription: 1, doctor_note: 1, symptom: 1 });
    assert.equal(h.date_range.earliest, daysAgo(100, NOW).toISOString());
    assert.equal(h.date_range.span_days, 90);
    assert.equal(h.health.recency_score, 1);
    assert.equal(h.health.diversity_score, 0.6);
    // gaps of 60 and 30 days
    assert.equal(h.health.continuity_score, 0.75);
    assert.equal(h.health.status, "excellent");
    assert.deepEqual(h.health.suggestions, []);
    recall.close();
  });

  test("a single stale record needs improvement", () => {
    const h = assessHealth(
      [
        {
          id: "r1",
          owner_id: "p1",
          content: "old note",
          category: null,
          tags: [],
          created_at: daysAgo(400, NOW).toISOString(),
          access_count: 0,
          memory_weight: 1,
          reinforcement_level: 0,
          last_accessed: null,
        },
      ],
      NOW,
    );
    assert.equal(h.recency_score, 0);
    assert.equal(h.diversity_score, 0.2);
    assert.equal(h.continuity_score, 0.5);
    assert.equal(h.status, "needs_improvement");
    assert.equal(h.suggestions.length, 2);
  });

  test("an owner without records is empty", () => {
    assert.equal(assessHealth([], NOW).status, "empty");
  });
});

describe("ChartRecall.symptomProgression", () => {
  test("counts mentions within the window", async () => {
    const recall = app();
    for (const [content, age] of [
      ["Headache, first time", 400],
      ["Headache after screen time", 300],
      ["Knee pain", 100],
      ["Headache again", 20],
    ] as const) {
      await recall.ingest({ owner_id: "p1", content, created_at: daysAgo(age, NOW) });
    }

    const year = recall.symptomProgression("p1", " headache ", { asOf: NOW });
    assert.equal(year.symptom, "headache");
    assert.equal(year.window_days, 365);
    assert.equal(year.occurrences, 2);
    assert.equal(year.trend, "isolated");

    const longer = recall.symptomProgression("p1", "headache", { asOf: NOW, windowDays: 500 });
    assert.equal(longer.occurrences, 3);
    assert.equal(longer.trend, "recurring");
    recall.close();
  });

  test("rejects an empty symptom and a bad window", async () => {
    const recall = app();
    assert.throws(() => recall.symptomProgression("p1", "  "), ValidationError);
    assert.throws(() => recall.symptomProgression("p1", "headache", { windowDays: 0 }), ValidationError);
    assert.throws(() => recall.symptomProgression("bad owner", "headache"), ValidationError);
    recall.close();
  });
});

describe("ChartRecall.consolidate", () => {
  test("finds categories recurring in the last 30 days", async () => {
    const recall = app();
    for (const [category, age] of [
      ["symptom", 40],
      ["symptom", 25],
      ["doctor_note", 12],
      ["symptom", 10],
      ["symptom", 2],
    ] as const) {
      await recall.ingest({ owner_id: "p1", content: "knee pain", category, created_at: daysAgo(age, NOW) });
    }

    const c = recall.consolidate("p1", { asOf: NOW });
    assert.equal(c.window_days, 30);
    assert.equal(c.total_records, 4);
    assert.deepEqual(c.patterns, [
      { category: "symptom", count: 3, description: "Recurring symptom records (3 occurrences in 30 days)" },
    ]);
    recall.close();
  });
});

describe("ChartRecall.notices", () => {
  test("returns consent, data policy and privacy notices", () => {
    const recall = app();
    const n = recall.notices();
    assert.equal(n.consent_notice, CONSENT_NOTICE);
    assert.equal(n.data_policy, DATA_POLICY);
    assert.ok(n.consent_notice.startsWith("INFORMED CONSENT\n"));
    assert.ok(n.data_policy.startsWith("DATA USAGE POLICY\n"));
    recall.close();
  });
});
