import type { RecordView } from "./store.js";
import { MS_PER_DAY, ageInDays } from "./time.js";

/** Records at most this old count as recent for the health score */
const HEALTH_RECENT_DAYS = 90;

/** Share of records expected to be recent for a full recency score */
const RECENT_SHARE_TARGET = 0.3;

/** Distinct categories for a full diversity score */
const DIVERSITY_TARGET = 5;

/** Mean gap between records (days) at which continuity reaches 0 */
const CONTINUITY_GAP_DAYS = 180;

export type HealthStatus = "empty" | "excellent" | "good" | "fair" | "needs_improvement";

export interface HealthScore {
  status: HealthStatus;
  score: number;
  recency_score: number;
  diversity_score: number;
  continuity_score: number;
  suggestions: string[];
}

export interface MemoryHealth {
  owner_id: string;
  total_records: number;
  categories: Record<string, number>;
  date_range: {
    earliest: string | null;
    latest: string | null;
    span_days: number;
  };
  health: HealthScore;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function wholeDays(from: string, to: string): number {
  return Math.floor((Date.parse(to) - Date.parse(from)) / MS_PER_DAY);
}

/**
 * Score how useful an owner's history is for retrieval: recent, varied and
 * regularly updated records score high.
 */
export function assessHealth(records: RecordView[], asOf: Date): HealthScore {
  if (records.length === 0) {
    return { status: "empty", score: 0, recency_score: 0, diversity_score: 0, continuity_score: 0, suggestions: [] };
  }

  const total = records.length;
  const recentCount = records.filter((r) => ageInDays(r.created_at, asOf) <= HEALTH_RECENT_DAYS).length;
  const recency = Math.min(1, recentCount / Math.max(1, total * RECENT_SHARE_TARGET));

  const categories = new Set(records.map((r) => r.category ?? "unknown"));
  const diversity = Math.min(1, categories.size / DIVERSITY_TARGET);

  let continuity = 0.5;
  if (total > 1) {
    const dates = records.map((r) => r.created_at).sort();
    let gaps = 0;
    for (let i = 1; i < dates.length; i++) gaps += wholeDays(dates[i - 1], dates[i]);
    continuity = Math.max(0, 1 - gaps / (dates.length - 1) / CONTINUITY_GAP_DAYS);
  }

  const score = recency * 0.4 + diversity * 0.3 + continuity * 0.3;
  const suggestions: string[] = [];
  if (recency < 0.5) {
    suggestions.push("Consider adding recent medical records to keep the history current");
  }
  if (diversity < 0.4) {
    suggestions.push("Adding different types of records (symptoms, scans, reports) would provide better context");
  }
  if (continuity < 0.4) {
    suggestions.push("Regular updates to the history help identify patterns over time");
  }

  return {
    status: score > 0.8 ? "excellent" : score > 0.6 ? "good" : score > 0.4 ? "fair" : "needs_improvement",
    score: round2(score),
    recency_score: round2(recency),
    diversity_score: round2(diversity),
    continuity_score: round2(continuity),
    suggestions,
  };
}

export function memoryHealth(ownerId: string, records: RecordView[], asOf: Date): MemoryHealth {
  const categories: Record<string, number> = {};
  for (const r of records) {
    const key = r.category ?? "unknown";
    categories[key] = (categories[key] ?? 0) + 1;
  }
  // records arrive in chronological order
  const earliest = records.length > 0 ? records[0].created_at : null;
  const latest = records.length > 0 ? records[records.length - 1].created_at : null;
  return {
    owner_id: ownerId,
    total_records: records.length,
    categories,
    date_range: {
      earliest,
      latest,
      span_days: earliest && latest ? wholeDays(earliest, latest) : 0,
    },
    health: assessHealth(records, asOf),
  };
}
