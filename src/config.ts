import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { DATA_DIR } from "./db.js";
import { createLogger } from "./logger.js";

export const CONFIG_PATH = join(DATA_DIR, "config.json");

const log = createLogger("config");

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ConfigSchema = z.object({
  db_path: z.string().min(1).optional(),
  time_weight: z.number().min(0).max(1),
  result_limit: z.number().int().positive(),
  similarity_floor: z.number().min(-1).max(1),
  /** Candidates younger than this are "recent", the rest "old" */
  recent_window_days: z.number().int().positive(),
  collaborator_timeout_ms: z.number().int().positive(),
  lock_timeout_ms: z.number().int().positive(),
  lock_retries: z.number().int().min(0),
  max_insights: z.number().int().positive(),
  /** Unresolved-action markers for forgotten-insight detection */
  action_markers: z.array(z.string().min(1)).min(1),
  log_level: LogLevelSchema,
  embedding: z.object({
    url: z.string().url(),
    model: z.string().min(1),
    api_key: z.string().min(1).optional(),
  }),
});

export type ChartRecallConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ChartRecallConfig = {
  time_weight: 0.3,
  result_limit: 10,
  similarity_floor: 0.5,
  recent_window_days: 180,
  collaborator_timeout_ms: 10_000,
  lock_timeout_ms: 5_000,
  lock_retries: 3,
  max_insights: 3,
  action_markers: [
    "recommended",
    "recommend",
    "follow-up",
    "follow up",
    "suggested",
    "advised",
    "referred",
  ],
  log_level: "info",
  embedding: {
    url: "https://api.openai.com/v1",
    model: "text-embedding-3-small",
  },
};

const PartialConfigSchema = ConfigSchema.partial().extend({
  embedding: ConfigSchema.shape.embedding.partial().optional(),
});

type PartialConfig = z.infer<typeof PartialConfigSchema>;

function readConfigFile(path: string): PartialConfig {
  if (!existsSync(path)) return {};
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    const parsed = PartialConfigSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    log.warn(`Invalid config at ${path}, using defaults`, {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  } catch (err) {
    log.warn(`Unreadable config at ${path}, using defaults`, { error: String(err) });
  }
  return {};
}

function fromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const out: PartialConfig = {};
  if (env.CHARTRECALL_DB) out.db_path = env.CHARTRECALL_DB;
  const level = LogLevelSchema.safeParse(env.CHARTRECALL_LOG_LEVEL);
  if (level.success) out.log_level = level.data;

  const embedding: NonNullable<PartialConfig["embedding"]> = {};
  if (env.CHARTRECALL_EMBEDDING_URL) embedding.url = env.CHARTRECALL_EMBEDDING_URL;
  if (env.CHARTRECALL_EMBEDDING_MODEL) embedding.model = env.CHARTRECALL_EMBEDDING_MODEL;
  if (env.OPENAI_API_KEY) embedding.api_key = env.OPENAI_API_KEY;
  if (Object.keys(embedding).length > 0) out.embedding = embedding;
  return out;
}

function merge(base: ChartRecallConfig, patch: PartialConfig): ChartRecallConfig {
  return {
    ...base,
    ...patch,
    embedding: { ...base.embedding, ...patch.embedding },
  };
}

/**
 * Load configuration: defaults < config file < environment.
 * The merged result is validated again; a bad merge falls back to defaults.
 */
export function loadConfig(
  opts: { path?: string; env?: NodeJS.ProcessEnv } = {},
): ChartRecallConfig {
  const fileConfig = readConfigFile(opts.path ?? CONFIG_PATH);
  const merged = merge(merge(DEFAULT_CONFIG, fileConfig), fromEnv(opts.env ?? process.env));
  const checked = ConfigSchema.safeParse(merged);
  if (!checked.success) {
    log.warn("Merged config failed validation, using defaults", {
      issues: checked.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return DEFAULT_CONFIG;
  }
  return checked.data;
}
