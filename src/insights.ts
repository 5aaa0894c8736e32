/**
 * Forgotten-insight detection.
 *
 * Heuristic and purely lexical: an old candidate counts when its text holds an
 * unresolved-action marker ("recommended", "follow-up", ...) and no later
 * record mentions the same action. There is no semantic entailment here; a
 * paraphrased follow-through is missed and an unrelated mention of the same
 * words counts as follow-through. How precise this needs to be is an open
 * product question.
 */

import type { RecordStore } from "./store.js";
import type { RankedCandidate } from "./ranking.js";
import { silentLogger, type Logger } from "./logger.js";

/** Dropped from the start of an extracted action, ignored when matching */
const FILLER_WORDS = new Set([
  "to", "a", "an", "the", "that", "for", "with", "of",
  "start", "starting", "getting", "and", "some", "be",
]);

/** Words kept from the text following a marker */
const MAX_ACTION_WORDS = 8;

/** Significant words are at least this long */
const MIN_SIGNIFICANT_LENGTH = 4;

const DAYS_PER_MONTH = 30;

export interface ForgottenInsight {
  record_id: string;
  age_days: number;
  months_ago: number;
  marker: string;
  action: string;
  text: string;
}

export interface DetectorOptions {
  markers: string[];
  maxInsights?: number;
  logger?: Logger;
}

export interface ExtractedAction {
  marker: string;
  action: string;
}

/** The marker as a whole word: "referred" does not match inside "preferred" */
function markerPattern(marker: string): RegExp {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`);
}

/**
 * Find the earliest marker and take the clause after it. Null when there is
 * no marker or nothing follows it.
 */
export function extractAction(content: string, markers: string[]): ExtractedAction | null {
  const lower = content.toLowerCase();
  let best: { index: number; marker: string } | null = null;
  for (const raw of markers) {
    const marker = raw.toLowerCase();
    const index = lower.search(markerPattern(marker));
    if (index === -1) continue;
    if (!best || index < best.index || (index === best.index && marker.length > best.marker.length)) {
      best = { index, marker };
    }
  }
  if (!best) return null;

  const rest = content.slice(best.index + best.marker.length);
  const clause = rest.split(/[.;!?\n]/, 1)[0] ?? "";
  const words = clause
    .replace(/^[\s:,-]+/, "")
    .split(/\s+/)
    .map((w) => w.replace(/^[("'`]+|[)"'`,:]+$/g, ""))
    .filter((w) => w.length > 0);

  while (words.length > 0 && FILLER_WORDS.has(words[0].toLowerCase())) words.shift();
  const action = words.slice(0, MAX_ACTION_WORDS).join(" ");
  return action ? { marker: best.marker, action } : null;
}

export function significantWords(text: string): string[] {
  const out: string[] = [];
  for (const raw of text.toLowerCase().split(/[^a-z0-9-]+/)) {
    if (raw.length >= MIN_SIGNIFICANT_LENGTH && !FILLER_WORDS.has(raw) && !out.includes(raw)) {
      out.push(raw);
    }
  }
  return out;
}

/**
 * A later text mentions the action when it contains the whole phrase, or more
 * than half of the action's significant words.
 */
export function mentionsAction(action: string, laterText: string): boolean {
  const later = laterText.toLowerCase();
  if (later.includes(action.toLowerCase())) return true;
  const words = significantWords(action);
  if (words.length === 0) return false;
  const hits = words.filter((w) => later.includes(w)).length;
  return hits >= Math.floor(words.length / 2) + 1;
}

export function formatInsight(monthsAgo: number, action: string): string {
  return `Unfollowed recommendation from ${monthsAgo} months ago: ${action}.`;
}

export class ForgottenInsightDetector {
  private store: RecordStore;
  private markers: string[];
  private maxInsights: number;
  private log: Logger;

  constructor(store: RecordStore, opts: DetectorOptions) {
    this.store = store;
    this.markers = opts.markers;
    this.maxInsights = opts.maxInsights ?? 3;
    this.log = (opts.logger ?? silentLogger).child("insights");
  }

  detect(
    ownerId: string,
    recent: RankedCandidate[],
    old: RankedCandidate[],
    query: string,
  ): ForgottenInsight[] {
    const insights: ForgottenInsight[] = [];
    const seen = new Set<string>();

    for (const candidate of old) {
      if (insights.length >= this.maxInsights) break;

      const extracted = extractAction(candidate.content, this.markers);
      if (!extracted) continue;
      const key = extracted.action.toLowerCase();
      if (seen.has(key)) continue;

      const laterTexts = [
        ...recent.filter((r) => r.record_id !== candidate.record_id).map((r) => r.content),
        ...this.store.createdAfter(ownerId, candidate.created_at).map((r) => r.content),
      ];
      if (laterTexts.some((text) => mentionsAction(extracted.action, text))) {
        this.log.debug(`follow-through found`, { record_id: candidate.record_id, action: extracted.action });
        continue;
      }

      seen.add(key);
      const months_ago = Math.floor(candidate.age_days / DAYS_PER_MONTH);
      insights.push({
        record_id: candidate.record_id,
        age_days: candidate.age_days,
        months_ago,
        marker: extracted.marker,
        action: extracted.action,
        text: formatInsight(months_ago, extracted.action),
      });
    }

    if (insights.length > 0) {
      this.log.debug(`forgotten insights for "${query}"`, { owner_id: ownerId, count: insights.length });
    }
    return insights;
  }
}
