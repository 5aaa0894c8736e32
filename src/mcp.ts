#!/usr/bin/env node
/**
 * ChartRecall MCP Server
 *
 * Exposes patient-record recall as MCP tools:
 *   - chartrecall_ingest:   Store a record
 *   - chartrecall_query:    Time-aware recall with forgotten insights
 *   - chartrecall_maintain: Run one decay pass
 *   - chartrecall_purge:    Delete every record of an owner
 *   - chartrecall_timeline: Chronological record listing
 *   - chartrecall_health:   History health score
 *   - chartrecall_symptom:  Symptom progression over a window
 *   - chartrecall_patterns: Recurring record categories
 *   - chartrecall_notices:  Consent notice and data usage policy
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { ChartRecall } from "./service.js";
import { loadConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { ValidationError } from "./errors.js";

const config = loadConfig();
setLogLevel(config.log_level);
const log = createLogger("mcp");
const app = ChartRecall.open(config);

const server = new McpServer({
  name: "chartrecall",
  version: "0.1.0",
});

const ownerId = z.string().describe("Owner (patient) id: letters, digits, '-' and '_'");
const isoDate = z.string().datetime({ offset: true });

function json(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function invalid(err: ValidationError) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify({ error: err.message, field: err.field }, null, 2) }],
    isError: true,
  };
}

// --- Tool: Ingest ---
server.tool(
  "chartrecall_ingest",
  "Store one record for an owner. The text is embedded once, at ingestion.",
  {
    owner_id: ownerId,
    content: z.string().describe("Record text: note, symptom, prescription, report"),
    category: z.string().optional().describe("e.g. symptom, doctor_note, prescription, report, scan"),
    tags: z.array(z.string()).optional(),
    created_at: isoDate.optional().describe("When the record was made (ISO-8601); defaults to now"),
  },
  async ({ owner_id, content, category, tags, created_at }) => {
    try {
      const result = await app.ingest({
        owner_id,
        content,
        category,
        tags,
        created_at: created_at ? new Date(created_at) : undefined,
      });
      return json(result);
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Query ---
server.tool(
  "chartrecall_query",
  "Recall an owner's prior records relevant to a query, ranked by similarity, recency and memory weight. Surfaces old recommendations with no follow-through. Returned records are reinforced.",
  {
    owner_id: ownerId,
    query: z.string().describe("Current symptom or question"),
    result_limit: z.number().int().positive().optional().describe("Max records (default 10)"),
    similarity_floor: z.number().min(-1).max(1).optional().describe("Minimum cosine similarity (default 0.5)"),
    time_weight: z.number().min(0).max(1).optional().describe("Share of the score given to recency (default 0.3)"),
  },
  async ({ owner_id, query, result_limit, similarity_floor, time_weight }) => {
    const result = await app.query({ owner_id, query_text: query, result_limit, similarity_floor, time_weight });
    if (result.status === "rejected" && result.reason === "invalid_input") {
      return invalid(result.error);
    }
    const { output } = result;
    return json({
      status: result.status,
      degraded: result.degraded,
      failed_stages: result.failed_stages,
      summary: output.summary,
      insights: output.insights,
      recommendations: output.recommendations,
      evidence: output.evidence,
      evidence_summary: output.evidence_summary,
      safety_flags: output.safety_flags,
      disclaimer: output.safety_disclaimer,
      privacy_notice: output.privacy_notice,
    });
  }
);

// --- Tool: Maintain ---
server.tool(
  "chartrecall_maintain",
  "Apply one decay pass to an owner's records older than a year. Frequently recalled records are protected. Re-running with the same as_of changes nothing.",
  {
    owner_id: ownerId,
    as_of: isoDate.optional().describe("Reference time (ISO-8601); defaults to now"),
  },
  async ({ owner_id, as_of }) => {
    try {
      return json(await app.maintain(owner_id, as_of ? new Date(as_of) : undefined));
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Purge ---
server.tool(
  "chartrecall_purge",
  "Permanently delete every record of an owner. Returns the number deleted; 0 when there was nothing left.",
  { owner_id: ownerId },
  async ({ owner_id }) => {
    try {
      return json({ owner_id, deleted_count: await app.purge(owner_id) });
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Timeline ---
server.tool(
  "chartrecall_timeline",
  "List an owner's records in chronological order, optionally within a date range.",
  {
    owner_id: ownerId,
    start: isoDate.optional(),
    end: isoDate.optional(),
  },
  async ({ owner_id, start, end }) => {
    try {
      const records = app.timeline(owner_id, {
        start: start ? new Date(start) : undefined,
        end: end ? new Date(end) : undefined,
      });
      return json({ owner_id, count: records.length, records });
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Health ---
server.tool(
  "chartrecall_health",
  "Record counts by category, date range, and a health score for how recent, varied and regular the owner's history is.",
  { owner_id: ownerId },
  async ({ owner_id }) => {
    try {
      return json(app.memoryHealth(owner_id));
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Symptom progression ---
server.tool(
  "chartrecall_symptom",
  "How often a symptom was mentioned in the owner's records within a window, with first and latest dates and a recurring/isolated trend.",
  {
    owner_id: ownerId,
    symptom: z.string().min(1).describe("Text to look for, e.g. 'headache'"),
    window_days: z.number().int().positive().optional().describe("Look-back in days (default 365)"),
  },
  async ({ owner_id, symptom, window_days }) => {
    try {
      return json(app.symptomProgression(owner_id, symptom, { windowDays: window_days }));
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Patterns ---
server.tool(
  "chartrecall_patterns",
  "Record categories that occur at least three times within a recent window.",
  {
    owner_id: ownerId,
    window_days: z.number().int().positive().optional().describe("Look-back in days (default 30)"),
  },
  async ({ owner_id, window_days }) => {
    try {
      return json(app.consolidate(owner_id, { windowDays: window_days }));
    } catch (err) {
      if (err instanceof ValidationError) return invalid(err);
      throw err;
    }
  }
);

// --- Tool: Notices ---
server.tool(
  "chartrecall_notices",
  "Informed-consent notice, data usage policy and privacy notice. Show these to a user before their first record is stored.",
  {},
  async () => json(app.notices())
);

// --- Start server ---
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`listening on stdio`, { db: config.db_path ?? "default" });
}

process.on("SIGINT", () => {
  app.close();
  process.exit(0);
});

main().catch((err) => {
  log.error(`server failed`, { error: String(err) });
  app.close();
  process.exit(1);
});
