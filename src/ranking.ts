import type { RecordStore, StoredRecord } from "./store.js";
import { cosineSimilarity } from "./embeddings.js";
import { KeyedMutex, runWithRetry } from "./locks.js";
import { ValidationError } from "./errors.js";
import { ageInDays } from "./time.js";

// --- Types ---

export type Partition = "recent" | "old";

export interface RankedCandidate {
  record_id: string;
  /** Raw cosine similarity in [-1, 1] */
  similarity_score: number;
  recency_score: number;
  time_weighted_score: number;
  /** time_weighted_score × memory_weight; the sort key */
  final_score: number;
  memory_weight: number;
  age_days: number;
  partition: Partition;
  created_at: string;
  content: string;
  category: string | null;
  tags: string[];
}

export interface RankQuery {
  owner_id: string;
  query_embedding: Float32Array;
  result_limit?: number;
  similarity_floor?: number;
  time_weight?: number;
  as_of?: Date;
}

export interface RankSettings {
  result_limit: number;
  similarity_floor: number;
  time_weight: number;
  recent_window_days: number;
  as_of: Date;
}

export interface RankingEngineOptions {
  timeWeight?: number;
  resultLimit?: number;
  similarityFloor?: number;
  recentWindowDays?: number;
  locks?: KeyedMutex;
  lockTimeoutMs?: number;
  lockRetries?: number;
}

export interface PartitionedCandidates {
  recent: RankedCandidate[];
  old: RankedCandidate[];
}

// --- Scoring ---

/** Strictly decreasing in age, bounded in (0, 1] */
export function recencyScore(ageDays: number): number {
  return 1 / (1 + Math.max(0, ageDays));
}

export function timeWeightedScore(similarity: number, recency: number, timeWeight: number): number {
  return (1 - timeWeight) * similarity + timeWeight * recency;
}

/**
 * Rank one owner's records against a query vector. Pure: same records,
 * vector and settings always give the same order.
 */
export function rankRecords(
  records: StoredRecord[],
  queryEmbedding: Float32Array,
  settings: RankSettings,
): RankedCandidate[] {
  const candidates: RankedCandidate[] = [];
  for (const record of records) {
    const similarity_score = cosineSimilarity(queryEmbedding, record.embedding);
    if (similarity_score < settings.similarity_floor) continue;

    const age_days = ageInDays(record.created_at, settings.as_of);
    const recency_score = recencyScore(age_days);
    const time_weighted_score = timeWeightedScore(similarity_score, recency_score, settings.time_weight);

    candidates.push({
      record_id: record.id,
      similarity_score,
      recency_score,
      time_weighted_score,
      final_score: time_weighted_score * record.memory_weight,
      memory_weight: record.memory_weight,
      age_days,
      partition: age_days < settings.recent_window_days ? "recent" : "old",
      created_at: record.created_at,
      content: record.content,
      category: record.category,
      tags: record.tags,
    });
  }

  candidates.sort(compareCandidates);
  return candidates.slice(0, settings.result_limit);
}

/** final_score desc, then newer created_at, then record_id */
export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (b.final_score !== a.final_score) return b.final_score - a.final_score;
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
  if (a.record_id === b.record_id) return 0;
  return a.record_id < b.record_id ? -1 : 1;
}

export function partitionCandidates(candidates: RankedCandidate[]): PartitionedCandidates {
  return {
    recent: candidates.filter((c) => c.partition === "recent"),
    old: candidates.filter((c) => c.partition === "old"),
  };
}

// --- Engine ---

export class RankingEngine {
  private store: RecordStore;
  private locks: KeyedMutex;
  private defaults: Omit<RankSettings, "as_of">;
  private lockTimeoutMs: number;
  private lockRetries: number;

  constructor(store: RecordStore, opts: RankingEngineOptions = {}) {
    this.store = store;
    this.locks = opts.locks ?? new KeyedMutex();
    this.defaults = {
      time_weight: opts.timeWeight ?? 0.3,
      result_limit: opts.resultLimit ?? 10,
      similarity_floor: opts.similarityFloor ?? 0.5,
      recent_window_days: opts.recentWindowDays ?? 180,
    };
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 5000;
    this.lockRetries = opts.lockRetries ?? 3;
  }

  /**
   * Rank the owner's records. The snapshot is taken under the owner lock, so
   * it never interleaves with a reinforce or decay of the same owner.
   */
  async rank(query: RankQuery): Promise<RankedCandidate[]> {
    const settings = this.settingsFor(query);
    const records = await runWithRetry(this.locks, query.owner_id, () => this.store.snapshot(query.owner_id), {
      timeoutMs: this.lockTimeoutMs,
      retries: this.lockRetries,
    });
    return rankRecords(records, query.query_embedding, settings);
  }

  settingsFor(query: Omit<RankQuery, "owner_id" | "query_embedding">): RankSettings {
    const settings: RankSettings = {
      result_limit: query.result_limit ?? this.defaults.result_limit,
      similarity_floor: query.similarity_floor ?? this.defaults.similarity_floor,
      time_weight: query.time_weight ?? this.defaults.time_weight,
      recent_window_days: this.defaults.recent_window_days,
      as_of: query.as_of ?? new Date(),
    };
    validateSettings(settings);
    return settings;
  }
}

export function validateSettings(settings: RankSettings): void {
  if (!Number.isInteger(settings.result_limit) || settings.result_limit < 1) {
    throw new ValidationError("result_limit", "result_limit must be a positive integer");
  }
  if (!(settings.similarity_floor >= -1 && settings.similarity_floor <= 1)) {
    throw new ValidationError("similarity_floor", "similarity_floor must be within [-1, 1]");
  }
  if (!(settings.time_weight >= 0 && settings.time_weight <= 1)) {
    throw new ValidationError("time_weight", "time_weight must be within [0, 1]");
  }
  if (Number.isNaN(settings.as_of.getTime())) {
    throw new ValidationError("as_of", "as_of is not a valid date");
  }
}
