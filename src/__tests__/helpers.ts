/**
 * Test sandbox: :memory: SQLite, a fixed clock, and in-process fakes for
 * the external collaborators. Nothing here touches disk or network.
 */
import assert from "node:assert/strict";
import type Database from "better-sqlite3";
import { openDb } from "../db.js";
import { RecordStore, type StoredRecord } from "../store.js";
import { DEFAULT_CONFIG, type ChartRecallConfig } from "../config.js";
import type { EmbeddingProvider } from "../embeddings.js";
import { daysAgo } from "../time.js";

/** Reference time for every test */
export const NOW = new Date("2026-06-01T00:00:00.000Z");

export interface Sandbox {
  db: Database.Database;
  store: RecordStore;
  close: () => void;
}

/** Fresh in-memory DB + store. Fully isolated. */
export function sandbox(): Sandbox {
  const db = openDb(":memory:");
  const store = new RecordStore(db);
  return { db, store, close: () => db.close() };
}

export function addRecord(
  store: RecordStore,
  ownerId: string,
  content: string,
  embedding: number[],
  ageDays: number,
  category: string | null = null,
): StoredRecord {
  return store.insert({
    owner_id: ownerId,
    content,
    category,
    embedding: new Float32Array(embedding),
    created_at: daysAgo(ageDays, NOW),
  });
}

export function near(actual: number, expected: number, tolerance = 1e-6) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${expected}, got ${actual} (diff ${Math.abs(actual - expected)})`,
  );
}

export function testConfig(overrides: Partial<ChartRecallConfig> = {}): ChartRecallConfig {
  return {
    ...DEFAULT_CONFIG,
    collaborator_timeout_ms: 200,
    lock_timeout_ms: 1000,
    lock_retries: 1,
    ...overrides,
  };
}

/** Text → vector lookup; unknown text maps to `fallback` */
export class MapEmbedder implements EmbeddingProvider {
  readonly model = "test-map";
  calls: string[] = [];

  constructor(
    private vectors: Record<string, number[]>,
    private fallback: number[] = [0, 0, 1],
  ) {}

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    return new Float32Array(this.vectors[text] ?? this.fallback);
  }
}

/** Never resolves until aborted; for timeout paths */
export class HangingEmbedder implements EmbeddingProvider {
  readonly model = "test-hang";
  aborted = false;

  embed(_text: string, signal?: AbortSignal): Promise<Float32Array> {
    return new Promise((_, reject) => {
      if (!signal) return;
      const s = signal;
      s.addEventListener("abort", () => {
        this.aborted = true;
        reject(s.reason);
      });
    });
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
