import type { Summarizer } from "./collaborators.js";
import type { RankedCandidate } from "./ranking.js";
import { formatAge, preview } from "./evidence.js";

/**
 * Deterministic, template-based explanation. Stands in wherever no
 * language-model summarizer is wired.
 */
export class TemplateSummarizer implements Summarizer {
  async summarize(query: string, candidates: RankedCandidate[]): Promise<string> {
    if (candidates.length === 0) {
      return `No prior records matched "${query}".`;
    }

    const n = candidates.length;
    const top = candidates[0];
    const label = top.category ? `, ${top.category}` : "";
    const parts = [
      `${n} prior ${n === 1 ? "record relates" : "records relate"} to "${query}".`,
      `Closest match (${formatAge(top.age_days)}${label}): ${preview(top.content, 120)}`,
    ];

    const old = candidates.filter((c) => c.partition === "old").length;
    if (old > 0) {
      parts.push(`${old} of them ${old === 1 ? "is an older record" : "are older records"}.`);
    }
    return parts.join(" ");
  }
}
