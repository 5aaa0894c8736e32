/**
 * Contracts of the services the orchestrator consumes at fixed points.
 * One in-repo implementation each: SafetyValidator, TemplateSummarizer,
 * RuleRecommender. Anything honoring the interface can replace them.
 */

import type { RankedCandidate } from "./ranking.js";
import type { ForgottenInsight } from "./insights.js";
import type { QueryOutput } from "./orchestrator.js";
import type { ValidationError } from "./errors.js";

export interface Summarizer {
  summarize(query: string, candidates: RankedCandidate[], signal?: AbortSignal): Promise<string>;
}

export interface Recommender {
  recommend(
    query: string,
    candidates: RankedCandidate[],
    insights: ForgottenInsight[],
    signal?: AbortSignal,
  ): Promise<string[]>;
}

export type InputCheck =
  | { ok: true; owner_id: string; query: string }
  | { ok: false; reason: "invalid_input"; error: ValidationError }
  | { ok: false; reason: "emergency"; response: string; keywords: string[] };

export interface Validator {
  /** Fixed text attached to every answer, including rejections */
  readonly disclaimer: string;
  validateOwnerId(ownerId: string): ValidationError | null;
  checkInput(ownerId: string, queryText: string): InputCheck;
  /** May append notices and flags; never drops evidence fields */
  validateOutput(output: QueryOutput): QueryOutput;
}
