import type { RecordView } from "./store.js";
import { MS_PER_DAY } from "./time.js";

/** Occurrences at which a symptom counts as recurring */
const RECURRING_OCCURRENCES = 3;

/** Records of one category within the window that make a pattern */
const PATTERN_THRESHOLD = 3;

export type SymptomTrend = "recurring" | "isolated";

export interface SymptomOccurrence {
  record_id: string;
  date: string;
  category: string | null;
}

export interface SymptomProgression {
  owner_id: string;
  symptom: string;
  window_days: number;
  occurrences: number;
  first_occurrence: string | null;
  latest_occurrence: string | null;
  /** Span between first and latest mention divided by the mention count; 0 for a single one */
  average_frequency_days: number;
  /** Null when the symptom is never mentioned */
  trend: SymptomTrend | null;
  timeline: SymptomOccurrence[];
}

export interface ConsolidationPattern {
  category: string;
  count: number;
  description: string;
}

export interface Consolidation {
  owner_id: string;
  window_days: number;
  total_records: number;
  patterns: ConsolidationPattern[];
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * How often a symptom shows up in the owner's records. Matching is a
 * case-insensitive substring test on the content; `records` must already be
 * limited to the window and sorted oldest first.
 */
export function analyzeSymptomProgression(
  ownerId: string,
  symptom: string,
  records: RecordView[],
  windowDays: number,
): SymptomProgression {
  const needle = symptom.toLowerCase();
  const related = records.filter((r) => r.content.toLowerCase().includes(needle));
  const first = related[0];
  const latest = related[related.length - 1];

  let averageFrequency = 0;
  if (first && latest && related.length > 1) {
    const spanDays = Math.floor((Date.parse(latest.created_at) - Date.parse(first.created_at)) / MS_PER_DAY);
    averageFrequency = spanDays > 0 ? spanDays / related.length : 0;
  }

  return {
    owner_id: ownerId,
    symptom,
    window_days: windowDays,
    occurrences: related.length,
    first_occurrence: first ? first.created_at : null,
    latest_occurrence: latest ? latest.created_at : null,
    average_frequency_days: round1(averageFrequency),
    trend: related.length === 0 ? null : related.length >= RECURRING_OCCURRENCES ? "recurring" : "isolated",
    timeline: related.map((r) => ({ record_id: r.id, date: r.created_at, category: r.category })),
  };
}

/**
 * Group the window's records by category and report every category seen at
 * least PATTERN_THRESHOLD times, in order of first appearance.
 */
export function consolidate(ownerId: string, records: RecordView[], windowDays: number): Consolidation {
  const counts = new Map<string, number>();
  for (const r of records) {
    const category = r.category ?? "unknown";
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  const patterns: ConsolidationPattern[] = [];
  for (const [category, count] of counts) {
    if (count < PATTERN_THRESHOLD) continue;
    patterns.push({
      category,
      count,
      description: `Recurring ${category} records (${count} occurrences in ${windowDays} days)`,
    });
  }
  return { owner_id: ownerId, window_days: windowDays, total_records: records.length, patterns };
}
