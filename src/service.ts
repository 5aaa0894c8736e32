/**
 * ChartRecall: time-aware recall over patient records.
 *
 * One instance owns one database handle and one set of owner locks shared
 * by every engine; nothing is process-global. Open at startup, close() at
 * shutdown.
 */

import type Database from "better-sqlite3";
import { openDb } from "./db.js";
import { loadConfig, type ChartRecallConfig } from "./config.js";
import { RecordStore, toView, type RecordView, type DateRange } from "./store.js";
import { OpenAIEmbeddingProvider, toVector, type EmbeddingProvider } from "./embeddings.js";
import { KeyedMutex, runWithRetry } from "./locks.js";
import { RankingEngine } from "./ranking.js";
import { ReinforcementEngine, type DecayResult } from "./reinforcement.js";
import { ForgottenInsightDetector } from "./insights.js";
import { Orchestrator, type QueryRequest, type QueryResult } from "./orchestrator.js";
import type { Recommender, Summarizer, Validator } from "./collaborators.js";
import { SafetyValidator, notices, type Notices } from "./safety.js";
import { TemplateSummarizer } from "./summarizer.js";
import { RuleRecommender } from "./recommender.js";
import { memoryHealth, type MemoryHealth } from "./health.js";
import { analyzeSymptomProgression, consolidate, type Consolidation, type SymptomProgression } from "./patterns.js";
import { daysAgo } from "./time.js";
import { ValidationError, toError, withTimeout } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface ChartRecallOptions {
  db: Database.Database;
  embedder: EmbeddingProvider;
  config?: ChartRecallConfig;
  summarizer?: Summarizer;
  recommender?: Recommender;
  validator?: Validator;
  logger?: Logger;
}

export interface IngestInput {
  owner_id: string;
  content: string;
  category?: string;
  tags?: string[];
  /** Defaults to now */
  created_at?: Date;
}

export interface IngestResult {
  record_id: string;
  owner_id: string;
  created_at: string;
}

export interface WindowOptions {
  /** Defaults to now */
  asOf?: Date;
  windowDays?: number;
}

/** Default look-back for symptom progression */
const SYMPTOM_WINDOW_DAYS = 365;

/** Default look-back for consolidation */
const CONSOLIDATION_WINDOW_DAYS = 30;

export interface MaintainAllResult {
  results: DecayResult[];
  failed: Array<{ owner_id: string; error: string }>;
}

export class ChartRecall {
  readonly store: RecordStore;
  readonly config: ChartRecallConfig;
  private db: Database.Database;
  private embedder: EmbeddingProvider;
  private validator: Validator;
  private locks = new KeyedMutex();
  private reinforcement: ReinforcementEngine;
  private orchestrator: Orchestrator;
  private log: Logger;

  constructor(opts: ChartRecallOptions) {
    this.db = opts.db;
    this.config = opts.config ?? loadConfig();
    this.embedder = opts.embedder;
    this.validator = opts.validator ?? new SafetyValidator();
    this.log = opts.logger ?? createLogger("chartrecall");
    this.store = new RecordStore(opts.db);

    const lockOpts = {
      locks: this.locks,
      lockTimeoutMs: this.config.lock_timeout_ms,
      lockRetries: this.config.lock_retries,
    };
    const ranking = new RankingEngine(this.store, {
      ...lockOpts,
      timeWeight: this.config.time_weight,
      resultLimit: this.config.result_limit,
      similarityFloor: this.config.similarity_floor,
      recentWindowDays: this.config.recent_window_days,
    });
    this.reinforcement = new ReinforcementEngine(this.store, { ...lockOpts, logger: this.log });
    const detector = new ForgottenInsightDetector(this.store, {
      markers: this.config.action_markers,
      maxInsights: this.config.max_insights,
      logger: this.log,
    });

    this.orchestrator = new Orchestrator({
      store: this.store,
      embedder: this.embedder,
      ranking,
      reinforcement: this.reinforcement,
      detector,
      summarizer: opts.summarizer ?? new TemplateSummarizer(),
      recommender: opts.recommender ?? new RuleRecommender(),
      validator: this.validator,
      collaboratorTimeoutMs: this.config.collaborator_timeout_ms,
      logger: this.log,
    });
  }

  /** Build from configuration: database at db_path, OpenAI-compatible embeddings. */
  static open(config: ChartRecallConfig = loadConfig()): ChartRecall {
    return new ChartRecall({
      db: openDb(config.db_path),
      config,
      embedder: new OpenAIEmbeddingProvider({
        url: config.embedding.url,
        model: config.embedding.model,
        apiKey: config.embedding.api_key,
      }),
    });
  }

  // --- Ingest ---

  /**
   * Store one record. The embedding is computed before anything is written;
   * when it fails or times out, nothing is stored.
   */
  async ingest(input: IngestInput): Promise<IngestResult> {
    this.assertOwner(input.owner_id);
    const content = input.content.trim();
    if (!content) throw new ValidationError("content", "content cannot be empty");
    const createdAt = input.created_at ?? new Date();
    if (Number.isNaN(createdAt.getTime())) {
      throw new ValidationError("created_at", "created_at is not a valid date");
    }

    const embedding = toVector(
      await withTimeout(
        (signal) => this.embedder.embed(content, signal),
        this.config.collaborator_timeout_ms,
        "embedding",
      ),
    );
    const record = this.store.insert({
      owner_id: input.owner_id,
      content,
      category: input.category ?? null,
      tags: input.tags ?? [],
      embedding,
      created_at: createdAt,
    });
    this.log.info(`ingested record`, { owner_id: record.owner_id, record_id: record.id });
    return { record_id: record.id, owner_id: record.owner_id, created_at: record.created_at };
  }

  // --- Query ---

  query(request: QueryRequest): Promise<QueryResult> {
    return this.orchestrator.query(request);
  }

  // --- Maintenance ---

  async maintain(ownerId: string, asOf: Date = new Date()): Promise<DecayResult> {
    this.assertOwner(ownerId);
    if (Number.isNaN(asOf.getTime())) throw new ValidationError("as_of", "as_of is not a valid date");
    return this.reinforcement.applyDecay(ownerId, asOf);
  }

  /** Decay every owner. One owner failing does not stop the others. */
  async maintainAll(asOf: Date = new Date()): Promise<MaintainAllResult> {
    const out: MaintainAllResult = { results: [], failed: [] };
    for (const ownerId of this.store.owners()) {
      try {
        out.results.push(await this.reinforcement.applyDecay(ownerId, asOf));
      } catch (err) {
        const message = toError(err).message;
        this.log.error(`maintenance failed`, { owner_id: ownerId, error: message });
        out.failed.push({ owner_id: ownerId, error: message });
      }
    }
    return out;
  }

  /** Hard delete of every record of the owner. Safe to repeat; returns 0 then. */
  async purge(ownerId: string): Promise<number> {
    this.assertOwner(ownerId);
    const deleted = await runWithRetry(this.locks, ownerId, () => this.store.purge(ownerId), {
      timeoutMs: this.config.lock_timeout_ms,
      retries: this.config.lock_retries,
    });
    this.log.info(`purged ${deleted} records`, { owner_id: ownerId });
    return deleted;
  }

  // --- Read-only views ---

  timeline(ownerId: string, range: DateRange = {}): RecordView[] {
    this.assertOwner(ownerId);
    return this.store.listByOwner(ownerId, range).map(toView);
  }

  memoryHealth(ownerId: string, asOf: Date = new Date()): MemoryHealth {
    return memoryHealth(ownerId, this.timeline(ownerId), asOf);
  }

  /** Mentions of one symptom within the last windowDays (365 by default) */
  symptomProgression(ownerId: string, symptom: string, opts: WindowOptions = {}): SymptomProgression {
    const term = symptom.trim();
    if (!term) throw new ValidationError("symptom", "symptom cannot be empty");
    const windowDays = opts.windowDays ?? SYMPTOM_WINDOW_DAYS;
    return analyzeSymptomProgression(ownerId, term, this.window(ownerId, opts.asOf, windowDays), windowDays);
  }

  /** Categories that recur within the last windowDays (30 by default) */
  consolidate(ownerId: string, opts: WindowOptions = {}): Consolidation {
    const windowDays = opts.windowDays ?? CONSOLIDATION_WINDOW_DAYS;
    return consolidate(ownerId, this.window(ownerId, opts.asOf, windowDays), windowDays);
  }

  notices(): Notices {
    return notices();
  }

  close(): void {
    this.db.close();
  }

  private window(ownerId: string, asOf: Date | undefined, windowDays: number): RecordView[] {
    const end = asOf ?? new Date();
    if (!Number.isInteger(windowDays) || windowDays < 1) {
      throw new ValidationError("window_days", "window_days must be a positive integer");
    }
    if (Number.isNaN(end.getTime())) throw new ValidationError("as_of", "as_of is not a valid date");
    return this.timeline(ownerId, { start: daysAgo(windowDays, end), end });
  }

  private assertOwner(ownerId: string): void {
    const error = this.validator.validateOwnerId(ownerId);
    if (error) throw error;
  }
}
