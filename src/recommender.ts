import type { Recommender } from "./collaborators.js";
import type { RankedCandidate } from "./ranking.js";
import type { ForgottenInsight } from "./insights.js";

/** Per-kind caps, in output priority order */
const LIMITS = {
  doctor_question: 3,
  reminder: 2,
  self_monitoring: 3,
  information: 2,
} as const;

const MAX_RECOMMENDATIONS = 10;

/** Days after which the newest related record prompts a check-up reminder */
const CHECKUP_AFTER_DAYS = 90;

export type RecommendationKind = keyof typeof LIMITS;

const KIND_ORDER: RecommendationKind[] = ["doctor_question", "reminder", "self_monitoring", "information"];

function hasAny(text: string, words: string[]): boolean {
  return words.some((w) => text.includes(w));
}

/**
 * Keyword rules producing questions for the doctor, reminders, self-monitoring
 * and information-gathering suggestions. Never diagnostic.
 */
export class RuleRecommender implements Recommender {
  async recommend(
    query: string,
    candidates: RankedCandidate[],
    insights: ForgottenInsight[],
  ): Promise<string[]> {
    const q = query.toLowerCase();
    const byKind: Record<RecommendationKind, string[]> = {
      doctor_question: this.doctorQuestions(q, candidates, insights),
      reminder: this.reminders(candidates),
      self_monitoring: this.monitoring(q, candidates),
      information: this.information(q, candidates),
    };

    const out: string[] = [];
    for (const kind of KIND_ORDER) {
      for (const text of byKind[kind].slice(0, LIMITS[kind])) {
        if (!out.includes(text)) out.push(text);
      }
    }
    return out.slice(0, MAX_RECOMMENDATIONS);
  }

  private doctorQuestions(q: string, candidates: RankedCandidate[], insights: ForgottenInsight[]): string[] {
    const out: string[] = [];
    const recent = candidates.filter((c) => c.partition === "recent");
    if (recent.length > 0) {
      out.push("Should we review the pattern of symptoms I've experienced over the past 6 months?");
      if (recent.some((c) => c.category === "prescription" || c.category === "treatment")) {
        out.push("Based on my previous treatments, what approach would you suggest this time?");
      }
    }
    for (const insight of insights) {
      out.push(`An earlier visit suggested ${insight.action}. Is that still worth doing?`);
    }
    if (q.includes("pain")) {
      out.push("What tests or examinations would help determine the cause of this pain?");
    }
    if (q.includes("symptom")) {
      out.push("What warning signs should I watch for that would require immediate attention?");
    }
    return out;
  }

  private reminders(candidates: RankedCandidate[]): string[] {
    const out: string[] = [];
    if (candidates.length > 0) {
      const newest = Math.min(...candidates.map((c) => c.age_days));
      if (newest > CHECKUP_AFTER_DAYS) {
        out.push("Consider scheduling a check-up: the newest related record is over 3 months old");
      }
    }
    if (candidates.length >= 3) {
      out.push("Schedule a follow-up appointment to discuss the pattern of recurring symptoms");
    }
    out.push("Keep your list of current medications and supplements up to date for your next visit");
    return out;
  }

  private monitoring(q: string, candidates: RankedCandidate[]): string[] {
    const out = ["Keep a daily symptom journal noting intensity, duration, and triggers"];
    if (candidates.length >= 3) {
      out.push("Track patterns: note whether symptoms occur at specific times or in specific situations");
    }
    if (q.includes("pain")) {
      out.push("Rate your pain on a scale of 1-10 and note what makes it better or worse");
    }
    if (hasAny(q, ["headache", "migraine"])) {
      out.push("Keep a headache diary tracking possible triggers (food, sleep, stress, weather)");
    }
    if (hasAny(q, ["sleep", "insomnia", "tired"])) {
      out.push("Track your sleep: hours slept, wake times, and sleep quality");
    }
    return out;
  }

  private information(q: string, candidates: RankedCandidate[]): string[] {
    const out: string[] = [];
    if (candidates.length > 0) {
      out.push("Add any recent test results or reports to keep the record complete");
    }
    if (hasAny(q, ["allergy", "allergic", "reaction"])) {
      out.push("Document all known allergies and any adverse reactions to medications or foods");
    }
    if (hasAny(q, ["family", "genetic", "hereditary"])) {
      out.push("Gather family medical history, especially for conditions that run in families");
    }
    if (hasAny(q, ["medication", "medicine", "drug"])) {
      out.push("List all medications with dosages and start dates");
    }
    return out;
  }
}
