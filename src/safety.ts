import { ValidationError } from "./errors.js";
import type { InputCheck, Validator } from "./collaborators.js";
import type { QueryOutput, SafetyFlag } from "./orchestrator.js";

// --- Constants ---

const OWNER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const MAX_OWNER_ID_LENGTH = 100;
const MAX_QUERY_LENGTH = 5000;

/** Markup that never belongs in a query */
const DANGEROUS_PATTERNS = ["<script", "javascript:", "onerror=", "onload="];

/** Any of these short-circuits the pipeline to the emergency response */
const EMERGENCY_KEYWORDS = [
  "chest pain", "can't breathe", "suicide", "severe bleeding",
  "unconscious", "stroke", "heart attack", "overdose",
  "severe pain", "can't move", "seizure",
];

/** Phrasing that reads as a diagnosis or prescription */
const DIAGNOSTIC_PHRASES = [
  "you have", "you are diagnosed", "this is definitely",
  "you suffer from", "treatment for", "take this medication",
  "prescribe", "medical advice",
];

export const STANDARD_DISCLAIMER =
  "IMPORTANT: This is a decision support tool, not a medical diagnosis. " +
  "Discuss all information with your healthcare provider. " +
  "In an emergency, contact emergency services immediately.";

export const EMERGENCY_RESPONSE =
  "EMERGENCY: Your message suggests a possible emergency. Contact emergency services " +
  "or go to the nearest emergency room now. Do not rely on this system for emergency care.";

export const PRIVACY_NOTICE =
  "Records are isolated to their owner id and can be purged on request.";

export const CONSENT_NOTICE = [
  "INFORMED CONSENT",
  "",
  "By using chartrecall you acknowledge that:",
  "1. It provides decision support only, not diagnosis or treatment.",
  "2. Everything it surfaces should be reviewed with a qualified healthcare provider.",
  "3. It does not replace professional medical advice.",
  "4. In an emergency, contact emergency services immediately.",
  "5. Keep your original records; this history is a working copy.",
  "6. Rankings, summaries and insights can be wrong. Verify anything important with your doctor.",
].join("\n");

export const DATA_POLICY = [
  "DATA USAGE POLICY",
  "",
  "- Records are isolated to their owner id.",
  "- Nothing is shared with third parties; only record text is sent to the configured embeddings endpoint.",
  "- Embeddings are derived from records and stored next to them.",
  "- Every record of an owner can be deleted at any time with purge.",
  "- The database is a local file, so the service can run fully on your own machine.",
].join("\n");

export interface Notices {
  consent_notice: string;
  data_policy: string;
  privacy_notice: string;
}

export function notices(): Notices {
  return { consent_notice: CONSENT_NOTICE, data_policy: DATA_POLICY, privacy_notice: PRIVACY_NOTICE };
}

// --- Validator ---

export class SafetyValidator implements Validator {
  readonly disclaimer = STANDARD_DISCLAIMER;

  validateOwnerId(ownerId: string): ValidationError | null {
    if (!ownerId) return new ValidationError("owner_id", "owner id is required");
    if (ownerId.length > MAX_OWNER_ID_LENGTH) {
      return new ValidationError("owner_id", `owner id exceeds ${MAX_OWNER_ID_LENGTH} characters`);
    }
    if (!OWNER_ID_PATTERN.test(ownerId)) {
      return new ValidationError("owner_id", "owner id may only contain letters, digits, '-' and '_'");
    }
    return null;
  }

  checkInput(ownerId: string, queryText: string): InputCheck {
    const ownerError = this.validateOwnerId(ownerId);
    if (ownerError) return { ok: false, reason: "invalid_input", error: ownerError };

    const query = queryText.trim();
    if (!query) {
      return { ok: false, reason: "invalid_input", error: new ValidationError("query_text", "query cannot be empty") };
    }
    if (query.length > MAX_QUERY_LENGTH) {
      return {
        ok: false,
        reason: "invalid_input",
        error: new ValidationError("query_text", `query exceeds ${MAX_QUERY_LENGTH} characters`),
      };
    }
    const lower = query.toLowerCase();
    if (DANGEROUS_PATTERNS.some((p) => lower.includes(p))) {
      return { ok: false, reason: "invalid_input", error: new ValidationError("query_text", "query contains markup") };
    }

    const keywords = EMERGENCY_KEYWORDS.filter((k) => lower.includes(k));
    if (keywords.length > 0) {
      return { ok: false, reason: "emergency", response: EMERGENCY_RESPONSE, keywords };
    }
    return { ok: true, owner_id: ownerId, query };
  }

  validateOutput(output: QueryOutput): QueryOutput {
    return {
      ...output,
      safety_flags: [...output.safety_flags, ...findDiagnosticLanguage(output)],
      safety_disclaimer: this.disclaimer,
      privacy_notice: PRIVACY_NOTICE,
    };
  }
}

export function findDiagnosticLanguage(output: QueryOutput): SafetyFlag[] {
  const fields: Array<[SafetyFlag["field"], string]> = [];
  if (output.summary) fields.push(["summary", output.summary]);
  for (const rec of output.recommendations ?? []) fields.push(["recommendation", rec]);
  for (const insight of output.insights ?? []) fields.push(["insight", insight]);

  const flags: SafetyFlag[] = [];
  for (const [field, text] of fields) {
    const lower = text.toLowerCase();
    for (const phrase of DIAGNOSTIC_PHRASES) {
      if (lower.includes(phrase)) {
        flags.push({ field, phrase, text });
      }
    }
  }
  return flags;
}
