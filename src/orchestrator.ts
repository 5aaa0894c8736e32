/**
 * Query pipeline as an explicit state machine:
 *
 *   validate_input → retrieve → reinforce → summarize → recommend → validate_output → done
 *
 * validate_input may end in `rejected` (bad input, or an emergency that gets
 * the fixed safety response). A failure in retrieve, summarize or recommend
 * jumps straight to validate_output and ends in `degraded`, with whatever was
 * produced so far and every missing field left null. Nothing is returned
 * without passing validate_output except a rejection; when the validator
 * itself fails, the produced output is withheld and the result is degraded.
 *
 * Each state reads only the accumulating context; there is no other shared
 * mutable state. Cancellation is honored at every state boundary; reinforcement
 * that already committed stays committed.
 */

import type { RecordStore } from "./store.js";
import type { EmbeddingProvider } from "./embeddings.js";
import type { Recommender, Summarizer, Validator, InputCheck } from "./collaborators.js";
import { partitionCandidates, type RankedCandidate, type RankingEngine, type RankSettings } from "./ranking.js";
import type { ReinforcementEngine } from "./reinforcement.js";
import type { ForgottenInsight, ForgottenInsightDetector } from "./insights.js";
import { buildEvidence, summarizeEvidence, type EvidenceItem, type EvidenceSummary } from "./evidence.js";
import { ValidationError, ChartRecallError, toError, withTimeout, type ErrorCode } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

// --- Types ---

export type PipelineState =
  | "validate_input"
  | "retrieve"
  | "reinforce"
  | "summarize"
  | "recommend"
  | "validate_output"
  | "done"
  | "rejected"
  | "degraded";

export type ProducingStage = "retrieve" | "reinforce" | "summarize" | "recommend";

export interface StageFailure {
  stage: ProducingStage | "validate_output";
  message: string;
  code: ErrorCode | null;
}

export interface SafetyFlag {
  field: "summary" | "recommendation" | "insight";
  phrase: string;
  text: string;
}

/** Everything a caller sees. Null means "not produced", never "empty". */
export interface QueryOutput {
  owner_id: string;
  query: string;
  ranked_candidates: RankedCandidate[] | null;
  recent: RankedCandidate[] | null;
  old: RankedCandidate[] | null;
  insights: string[] | null;
  insight_details: ForgottenInsight[] | null;
  summary: string | null;
  recommendations: string[] | null;
  evidence: EvidenceItem[] | null;
  evidence_summary: EvidenceSummary | null;
  safety_disclaimer: string | null;
  privacy_notice: string | null;
  safety_flags: SafetyFlag[];
}

interface ResultCommon {
  /** States visited, in order, ending with the terminal one */
  states: PipelineState[];
  output: QueryOutput;
}

export interface AcceptedResult extends ResultCommon {
  status: "accepted";
  degraded: false;
  failed_stages: StageFailure[];
}

export interface DegradedResult extends ResultCommon {
  status: "degraded";
  degraded: true;
  failed_stages: StageFailure[];
}

export type RejectedResult = ResultCommon & {
  status: "rejected";
  degraded: false;
  failed_stages: StageFailure[];
} & (
    | { reason: "invalid_input"; error: ValidationError }
    | { reason: "emergency"; keywords: string[] }
  );

export type QueryResult = AcceptedResult | RejectedResult | DegradedResult;

export interface QueryRequest {
  owner_id: string;
  query_text: string;
  result_limit?: number;
  similarity_floor?: number;
  time_weight?: number;
  /** Reference time for ages; defaults to now */
  as_of?: Date;
  signal?: AbortSignal;
}

export interface OrchestratorDeps {
  store: RecordStore;
  embedder: EmbeddingProvider;
  ranking: RankingEngine;
  reinforcement: ReinforcementEngine;
  detector: ForgottenInsightDetector;
  summarizer: Summarizer;
  recommender: Recommender;
  validator: Validator;
  collaboratorTimeoutMs?: number;
  logger?: Logger;
}

interface PipelineContext {
  request: QueryRequest;
  now: Date;
  query: string;
  settings: RankSettings | null;
  ranked: RankedCandidate[] | null;
  insights: ForgottenInsight[] | null;
  totalRecords: number;
  failures: StageFailure[];
  states: PipelineState[];
  output: QueryOutput;
}

// --- Orchestrator ---

export class Orchestrator {
  private deps: OrchestratorDeps;
  private timeoutMs: number;
  private log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.timeoutMs = deps.collaboratorTimeoutMs ?? 10_000;
    this.log = (deps.logger ?? silentLogger).child("pipeline");
  }

  async query(request: QueryRequest): Promise<QueryResult> {
    const now = request.as_of ?? new Date();
    const ctx: PipelineContext = {
      request,
      now,
      query: request.query_text,
      settings: null,
      ranked: null,
      insights: null,
      totalRecords: 0,
      failures: [],
      states: [],
      output: emptyOutput(request.owner_id, request.query_text),
    };

    let state: PipelineState = "validate_input";
    while (true) {
      request.signal?.throwIfAborted();
      ctx.states.push(state);
      this.log.debug(`→ ${state}`, { owner_id: request.owner_id });

      switch (state) {
        case "validate_input": {
          const check = this.validateInput(ctx);
          if (!check.ok) return this.reject(ctx, check);
          ctx.query = check.query;
          state = "retrieve";
          break;
        }
        case "retrieve":
          state = await this.stage(ctx, "retrieve", () => this.retrieve(ctx), "reinforce");
          break;
        case "reinforce":
          // reinforcement is not transactional with the rest; a failure here
          // degrades the result but the ranked data is intact
          state = await this.stage(ctx, "reinforce", () => this.reinforce(ctx), "summarize", "summarize");
          break;
        case "summarize":
          state = await this.stage(ctx, "summarize", () => this.summarize(ctx), "recommend");
          break;
        case "recommend":
          state = await this.stage(ctx, "recommend", () => this.recommend(ctx), "validate_output");
          break;
        case "validate_output":
          try {
            ctx.output = this.deps.validator.validateOutput(this.finalizeOutput(ctx));
          } catch (err) {
            this.recordFailure(ctx, "validate_output", err);
            ctx.output = {
              ...emptyOutput(request.owner_id, ctx.query),
              safety_disclaimer: this.deps.validator.disclaimer,
            };
          }
          state = ctx.failures.length > 0 ? "degraded" : "done";
          break;
        case "done":
          return { status: "accepted", degraded: false, failed_stages: [], states: ctx.states, output: ctx.output };
        case "degraded":
          this.log.warn(`query degraded`, {
            owner_id: request.owner_id,
            failed: ctx.failures.map((f) => f.stage),
          });
          return { status: "degraded", degraded: true, failed_stages: ctx.failures, states: ctx.states, output: ctx.output };
        case "rejected":
          throw new Error("rejected is only entered through reject()");
      }
    }
  }

  // --- States ---

  private validateInput(ctx: PipelineContext): InputCheck {
    const check = this.deps.validator.checkInput(ctx.request.owner_id, ctx.request.query_text);
    if (!check.ok) return check;
    try {
      ctx.settings = this.deps.ranking.settingsFor({
        result_limit: ctx.request.result_limit,
        similarity_floor: ctx.request.similarity_floor,
        time_weight: ctx.request.time_weight,
        as_of: ctx.now,
      });
    } catch (err) {
      if (err instanceof ValidationError) return { ok: false, reason: "invalid_input", error: err };
      throw err;
    }
    return check;
  }

  private async retrieve(ctx: PipelineContext): Promise<void> {
    const ownerId = ctx.request.owner_id;
    const settings = ctx.settings ?? this.deps.ranking.settingsFor({ as_of: ctx.now });
    const embedding = await withTimeout(
      (signal) => this.deps.embedder.embed(ctx.query, signal),
      this.timeoutMs,
      "embedding",
    );
    const ranked = await this.deps.ranking.rank({
      owner_id: ownerId,
      query_embedding: embedding,
      result_limit: settings.result_limit,
      similarity_floor: settings.similarity_floor,
      time_weight: settings.time_weight,
      as_of: settings.as_of,
    });
    const { recent, old } = partitionCandidates(ranked);
    const insights = this.deps.detector.detect(ownerId, recent, old, ctx.query);

    ctx.ranked = ranked;
    ctx.insights = insights;
    ctx.totalRecords = this.deps.store.countByOwner(ownerId);
    ctx.output = {
      ...ctx.output,
      ranked_candidates: ranked,
      recent,
      old,
      insights: insights.map((i) => i.text),
      insight_details: insights,
      evidence: buildEvidence(ranked),
    };
  }

  private async reinforce(ctx: PipelineContext): Promise<void> {
    const ids = (ctx.ranked ?? []).map((c) => c.record_id);
    if (ids.length === 0) return;
    const result = await this.deps.reinforcement.reinforceMany(ctx.request.owner_id, ids, ctx.now);
    this.log.debug(`reinforced ${result.applied.length} records`, {
      owner_id: ctx.request.owner_id,
      failed: result.failed.length,
    });
  }

  private async summarize(ctx: PipelineContext): Promise<void> {
    const ranked = ctx.ranked ?? [];
    const summary = await withTimeout(
      (signal) => this.deps.summarizer.summarize(ctx.query, ranked, signal),
      this.timeoutMs,
      "summarizer",
    );
    ctx.output = { ...ctx.output, summary };
  }

  private async recommend(ctx: PipelineContext): Promise<void> {
    const ranked = ctx.ranked ?? [];
    const recommendations = await withTimeout(
      (signal) => this.deps.recommender.recommend(ctx.query, ranked, ctx.insights ?? [], signal),
      this.timeoutMs,
      "recommender",
    );
    ctx.output = { ...ctx.output, recommendations };
  }

  // --- Transitions ---

  /**
   * Run a producing stage. On failure the rest of the producing stages are
   * skipped (unless `onFailure` says otherwise) and output validation runs.
   */
  private async stage(
    ctx: PipelineContext,
    stage: ProducingStage,
    run: () => Promise<void>,
    next: PipelineState,
    onFailure: PipelineState = "validate_output",
  ): Promise<PipelineState> {
    try {
      await run();
      return next;
    } catch (err) {
      this.recordFailure(ctx, stage, err);
      return onFailure;
    }
  }

  private recordFailure(ctx: PipelineContext, stage: StageFailure["stage"], err: unknown): void {
    const error = toError(err);
    ctx.failures.push({
      stage,
      message: error.message,
      code: error instanceof ChartRecallError ? error.code : null,
    });
    this.log.warn(`${stage} failed`, { owner_id: ctx.request.owner_id, error: error.message });
  }

  private reject(ctx: PipelineContext, check: Exclude<InputCheck, { ok: true }>): RejectedResult {
    ctx.states.push("rejected");
    const disclaimer = this.deps.validator.disclaimer;
    if (check.reason === "emergency") {
      this.log.warn(`emergency keywords in query`, { owner_id: ctx.request.owner_id, keywords: check.keywords });
      return {
        status: "rejected",
        reason: "emergency",
        keywords: check.keywords,
        degraded: false,
        failed_stages: [],
        states: ctx.states,
        output: { ...ctx.output, recommendations: [check.response], safety_disclaimer: disclaimer },
      };
    }
    this.log.info(`query rejected: ${check.error.message}`, { owner_id: ctx.request.owner_id });
    return {
      status: "rejected",
      reason: "invalid_input",
      error: check.error,
      degraded: false,
      failed_stages: [],
      states: ctx.states,
      output: { ...ctx.output, safety_disclaimer: disclaimer },
    };
  }

  private finalizeOutput(ctx: PipelineContext): QueryOutput {
    if (ctx.ranked === null) return ctx.output;
    const recs = ctx.output.recommendations;
    return {
      ...ctx.output,
      evidence_summary: summarizeEvidence(
        ctx.totalRecords,
        ctx.ranked,
        ctx.insights?.length ?? 0,
        recs === null ? null : recs.length,
      ),
    };
  }
}

export function emptyOutput(ownerId: string, query: string): QueryOutput {
  return {
    owner_id: ownerId,
    query,
    ranked_candidates: null,
    recent: null,
    old: null,
    insights: null,
    insight_details: null,
    summary: null,
    recommendations: null,
    evidence: null,
    evidence_summary: null,
    safety_disclaimer: null,
    privacy_notice: null,
    safety_flags: [],
  };
}
