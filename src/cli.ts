#!/usr/bin/env node
import { ChartRecall } from "./service.js";
import { loadConfig } from "./config.js";
import { setLogLevel } from "./logger.js";
import { ValidationError } from "./errors.js";
import { parseDate } from "./time.js";
import { formatAge } from "./evidence.js";
import { notices } from "./safety.js";
import type { QueryResult } from "./orchestrator.js";

const args = process.argv.slice(2);
const command = args[0];

function usage() {
  console.log(`
chartrecall: time-aware recall over patient records

COMMANDS:
  ingest <owner> <text> [--category symptom] [--tags a,b] [--date ISO]
    Embed and store one record for an owner.

  query <owner> <text> [--limit 10] [--floor 0.5] [--time-weight 0.3]
    Rank prior records, surface forgotten recommendations, suggest next steps.
    Every returned record is reinforced.

  maintain <owner> [--as-of ISO]
    Apply one decay pass to the owner's old records.

  maintain-all [--as-of ISO]
    Apply a decay pass to every owner.

  purge <owner>
    Delete every record of the owner. Cannot be undone.

  timeline <owner> [--start ISO] [--end ISO]
    List the owner's records in chronological order.

  health <owner>
    Record counts, date range and history health score.

  symptom <owner> <symptom> [--window 365]
    How often a symptom was mentioned, and whether it recurs.

  patterns <owner> [--window 30]
    Record categories that recur within the window.

  notices
    Consent notice and data usage policy.

ENVIRONMENT:
  CHARTRECALL_DB               database path (default ~/.chartrecall/chartrecall.db)
  CHARTRECALL_EMBEDDING_URL    OpenAI-compatible embeddings endpoint
  CHARTRECALL_EMBEDDING_MODEL  embedding model name
  CHARTRECALL_LOG_LEVEL        debug | info | warn | error
  OPENAI_API_KEY               bearer token for the embeddings endpoint

EXAMPLES:
  chartrecall ingest p-001 "Knee pain after running. Recommended physical therapy." --category doctor_note
  chartrecall query p-001 "knee pain again"
  chartrecall maintain p-001
`);
}

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--") && i + 1 < args.length) {
      parsed[args[i].slice(2)] = args[i + 1];
      i++;
    }
  }
  return parsed;
}

function numberOpt(opts: Record<string, string>, key: string): number | undefined {
  if (opts[key] === undefined) return undefined;
  const n = Number(opts[key]);
  if (Number.isNaN(n)) throw new ValidationError(key, `--${key} must be a number`);
  return n;
}

function dateOpt(opts: Record<string, string>, key: string): Date | undefined {
  if (opts[key] === undefined) return undefined;
  try {
    return parseDate(opts[key], key);
  } catch (err) {
    if (err instanceof RangeError) throw new ValidationError(key, err.message);
    throw err;
  }
}

function requireArg(value: string | undefined, usageLine: string): string {
  if (!value) {
    console.error(`Usage: ${usageLine}`);
    process.exit(1);
  }
  return value;
}

function formatScore(s: number): string {
  const pct = (s * 100).toFixed(0);
  if (s >= 0.7) return `\x1b[32m${pct}%\x1b[0m`; // green
  if (s >= 0.4) return `\x1b[33m${pct}%\x1b[0m`; // yellow
  return `\x1b[31m${pct}%\x1b[0m`; // red
}

function printQueryResult(result: QueryResult) {
  const out = result.output;
  if (result.status === "rejected") {
    if (result.reason === "emergency") {
      console.log(`\x1b[31m!\x1b[0m ${out.recommendations?.[0] ?? ""}`);
    } else {
      console.error(`\x1b[31mx\x1b[0m ${result.error.field}: ${result.error.message}`);
    }
    return;
  }

  if (result.status === "degraded") {
    const stages = result.failed_stages.map((f) => `${f.stage} (${f.message})`).join(", ");
    console.log(`\x1b[33m!\x1b[0m Partial result, failed: ${stages}\n`);
  }

  const ranked = out.ranked_candidates;
  if (ranked === null) {
    console.log(`  Records: unavailable`);
  } else if (ranked.length === 0) {
    console.log(`  No prior records matched "${out.query}"`);
  } else {
    console.log(`Prior records for "${out.query}":\n`);
    for (const item of out.evidence ?? []) {
      console.log(`  ${formatScore(item.final_score)}  ${item.content_preview}`);
      console.log(`       ${formatAge(item.age_days)} · ${item.partition} · ${item.reason}`);
    }
  }

  if (out.insights && out.insights.length > 0) {
    console.log(`\nForgotten insights:`);
    for (const text of out.insights) console.log(`  - ${text}`);
  }
  if (out.summary !== null) console.log(`\n${out.summary}`);
  if (out.recommendations && out.recommendations.length > 0) {
    console.log(`\nSuggested next steps:`);
    for (const text of out.recommendations) console.log(`  - ${text}`);
  }
  if (out.safety_disclaimer) console.log(`\n${out.safety_disclaimer}`);
}

async function runCommand(app: ChartRecall) {
  switch (command) {
    case "ingest": {
      const owner = requireArg(args[1], "chartrecall ingest <owner> <text> [--category c] [--tags a,b] [--date ISO]");
      const text = requireArg(args[2], "chartrecall ingest <owner> <text> [--category c] [--tags a,b] [--date ISO]");
      const opts = parseArgs(args.slice(3));
      const result = await app.ingest({
        owner_id: owner,
        content: text,
        category: opts.category,
        tags: opts.tags ? opts.tags.split(",").map((t) => t.trim()).filter(Boolean) : undefined,
        created_at: dateOpt(opts, "date"),
      });
      console.log(`\x1b[32m✓\x1b[0m Stored ${result.record_id}`);
      console.log(`   Owner:   ${result.owner_id}`);
      console.log(`   Created: ${result.created_at}`);
      break;
    }

    case "query": {
      const owner = requireArg(args[1], "chartrecall query <owner> <text> [--limit n] [--floor f] [--time-weight w]");
      const text = requireArg(args[2], "chartrecall query <owner> <text> [--limit n] [--floor f] [--time-weight w]");
      const opts = parseArgs(args.slice(3));
      const result = await app.query({
        owner_id: owner,
        query_text: text,
        result_limit: numberOpt(opts, "limit"),
        similarity_floor: numberOpt(opts, "floor"),
        time_weight: numberOpt(opts, "time-weight"),
      });
      printQueryResult(result);
      if (result.status === "rejected" && result.reason === "invalid_input") process.exitCode = 1;
      break;
    }

    case "maintain": {
      const owner = requireArg(args[1], "chartrecall maintain <owner> [--as-of ISO]");
      const opts = parseArgs(args.slice(2));
      const result = await app.maintain(owner, dateOpt(opts, "as-of"));
      if (result.skipped) {
        console.log(`Decay already applied as of ${result.as_of}; nothing changed.`);
      } else {
        console.log(`\x1b[32m✓\x1b[0m Decay pass as of ${result.as_of}`);
        console.log(`   Decayed:   ${result.decayed_count}`);
        console.log(`   Protected: ${result.protected_count}`);
      }
      break;
    }

    case "maintain-all": {
      const opts = parseArgs(args.slice(1));
      const { results, failed } = await app.maintainAll(dateOpt(opts, "as-of"));
      for (const r of results) {
        const note = r.skipped ? "skipped" : `${r.decayed_count} decayed, ${r.protected_count} protected`;
        console.log(`  ${r.owner_id}: ${note}`);
      }
      for (const f of failed) console.log(`  \x1b[31mx\x1b[0m ${f.owner_id}: ${f.error}`);
      if (failed.length > 0) process.exitCode = 1;
      break;
    }

    case "purge": {
      const owner = requireArg(args[1], "chartrecall purge <owner>");
      const deleted = await app.purge(owner);
      console.log(`Deleted ${deleted} record${deleted === 1 ? "" : "s"} for ${owner}`);
      break;
    }

    case "timeline": {
      const owner = requireArg(args[1], "chartrecall timeline <owner> [--start ISO] [--end ISO]");
      const opts = parseArgs(args.slice(2));
      const records = app.timeline(owner, { start: dateOpt(opts, "start"), end: dateOpt(opts, "end") });
      if (records.length === 0) {
        console.log(`No records for ${owner}`);
        break;
      }
      for (const r of records) {
        const category = r.category ? ` [${r.category}]` : "";
        console.log(`  ${r.created_at.slice(0, 10)}${category} ${r.content}`);
        console.log(`       weight ${r.memory_weight.toFixed(2)} · ${r.access_count} accesses`);
      }
      break;
    }

    case "health": {
      const owner = requireArg(args[1], "chartrecall health <owner>");
      const h = app.memoryHealth(owner);
      console.log(`History health for ${owner}\n`);
      console.log(`  Records:    ${h.total_records}`);
      console.log(`  Span:       ${h.date_range.earliest?.slice(0, 10) ?? "-"} → ${h.date_range.latest?.slice(0, 10) ?? "-"} (${h.date_range.span_days} days)`);
      for (const [category, n] of Object.entries(h.categories)) {
        console.log(`    ${category}: ${n}`);
      }
      console.log(`  Score:      ${formatScore(h.health.score)} (${h.health.status})`);
      console.log(`    recency ${h.health.recency_score} · diversity ${h.health.diversity_score} · continuity ${h.health.continuity_score}`);
      for (const s of h.health.suggestions) console.log(`  - ${s}`);
      break;
    }

    case "symptom": {
      const owner = requireArg(args[1], "chartrecall symptom <owner> <symptom> [--window days]");
      const symptom = requireArg(args[2], "chartrecall symptom <owner> <symptom> [--window days]");
      const opts = parseArgs(args.slice(3));
      const p = app.symptomProgression(owner, symptom, { windowDays: numberOpt(opts, "window") });
      if (p.occurrences === 0) {
        console.log(`No mention of "${p.symptom}" in the last ${p.window_days} days`);
        break;
      }
      console.log(`"${p.symptom}" in the last ${p.window_days} days: ${p.occurrences} mention${p.occurrences === 1 ? "" : "s"} (${p.trend})\n`);
      for (const o of p.timeline) {
        console.log(`  ${o.date.slice(0, 10)}${o.category ? ` [${o.category}]` : ""}`);
      }
      if (p.average_frequency_days > 0) console.log(`\n  About every ${p.average_frequency_days} days`);
      break;
    }

    case "patterns": {
      const owner = requireArg(args[1], "chartrecall patterns <owner> [--window days]");
      const opts = parseArgs(args.slice(2));
      const c = app.consolidate(owner, { windowDays: numberOpt(opts, "window") });
      console.log(`${c.total_records} records in the last ${c.window_days} days`);
      if (c.patterns.length === 0) {
        console.log(`  No recurring categories`);
        break;
      }
      for (const pattern of c.patterns) console.log(`  - ${pattern.description}`);
      break;
    }

    default:
      usage();
  }
}

async function main() {
  if (!command || command === "help" || command === "--help") {
    usage();
    return;
  }
  if (command === "notices") {
    const n = notices();
    console.log(`${n.consent_notice}\n\n${n.data_policy}\n\n${n.privacy_notice}`);
    return;
  }
  const config = loadConfig();
  setLogLevel(config.log_level);
  const app = ChartRecall.open(config);
  try {
    await runCommand(app);
  } finally {
    app.close();
  }
}

main().catch((err) => {
  if (err instanceof ValidationError) {
    console.error(`\x1b[31mx\x1b[0m ${err.field}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
