import type { RankedCandidate, Partition } from "./ranking.js";

export interface EvidenceItem {
  rank: number;
  record_id: string;
  created_at: string;
  category: string | null;
  similarity_score: number;
  final_score: number;
  age_days: number;
  partition: Partition;
  reason: string;
  content_preview: string;
}

export interface EvidenceSummary {
  total_records: number;
  matches: number;
  insights: number;
  /** Null when the recommend stage produced nothing */
  recommendations: number | null;
  oldest_used: string | null;
  newest_used: string | null;
  average_similarity: number | null;
}

const CATEGORY_REASONS: Record<string, string> = {
  doctor_note: "Clinical assessment",
  prescription: "Prescribed treatment",
  symptom: "Reported symptom",
  report: "Medical report",
  scan: "Imaging result",
};

export function formatAge(days: number): string {
  if (days <= 0) return "today";
  if (days < 30) return `${days} day${days === 1 ? "" : "s"} ago`;
  if (days < 365) {
    const months = Math.floor(days / 30);
    return `${months} month${months === 1 ? "" : "s"} ago`;
  }
  const years = Math.floor(days / 365);
  return `${years} year${years === 1 ? "" : "s"} ago`;
}

export function preview(text: string, max = 150): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max).trimEnd()}…` : flat;
}

/** Why a candidate made the list, e.g. "Moderate semantic similarity | 3 months ago" */
export function describeRelevance(c: RankedCandidate): string {
  const reasons: string[] = [];
  if (c.similarity_score > 0.8) reasons.push("Very high semantic similarity");
  else if (c.similarity_score > 0.6) reasons.push("Moderate semantic similarity");
  else reasons.push("Potentially related context");

  if (c.age_days < 30) reasons.push("Recent (within the last month)");
  else reasons.push(formatAge(c.age_days));

  if (c.memory_weight > 1) reasons.push("Frequently recalled");
  const categoryReason = c.category ? CATEGORY_REASONS[c.category] : undefined;
  if (categoryReason) reasons.push(categoryReason);
  return reasons.join(" | ");
}

export function buildEvidence(candidates: RankedCandidate[]): EvidenceItem[] {
  return candidates.map((c, i) => ({
    rank: i + 1,
    record_id: c.record_id,
    created_at: c.created_at,
    category: c.category,
    similarity_score: c.similarity_score,
    final_score: c.final_score,
    age_days: c.age_days,
    partition: c.partition,
    reason: describeRelevance(c),
    content_preview: preview(c.content),
  }));
}

export function summarizeEvidence(
  totalRecords: number,
  candidates: RankedCandidate[],
  insightCount: number,
  recommendationCount: number | null,
): EvidenceSummary {
  const dates = candidates.map((c) => c.created_at).sort();
  const average =
    candidates.length > 0
      ? candidates.reduce((s, c) => s + c.similarity_score, 0) / candidates.length
      : null;
  return {
    total_records: totalRecords,
    matches: candidates.length,
    insights: insightCount,
    recommendations: recommendationCount,
    oldest_used: dates[0] ?? null,
    newest_used: dates[dates.length - 1] ?? null,
    average_similarity: average,
  };
}
