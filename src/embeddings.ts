/**
 * ChartRecall Embedding Module
 *
 * The embedding model itself is an external collaborator. ChartRecall only
 * needs text → fixed-length vector, deterministic per model version.
 *
 * Default provider: any OpenAI-compatible /embeddings endpoint (OpenAI, a
 * local llama.cpp / vLLM / LM Studio server, ...).
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

export interface EmbeddingProvider {
  /** Model identifier, recorded for diagnostics */
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

export interface OpenAIEmbeddingOptions {
  /** Base URL, e.g. https://api.openai.com/v1 */
  url: string;
  model: string;
  apiKey?: string;
  /** Characters sent per request; longer input is cut */
  maxInputChars?: number;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly maxInputChars: number;

  constructor(opts: OpenAIEmbeddingOptions) {
    const base = opts.url.replace(/\/$/, "");
    this.endpoint = /\/embeddings$/.test(base) ? base : `${base}/embeddings`;
    this.model = opts.model;
    this.maxInputChars = opts.maxInputChars ?? 8000;
    this.headers = { "Content-Type": "application/json" };
    if (opts.apiKey) this.headers.Authorization = `Bearer ${opts.apiKey}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const res = await fetch(this.endpoint, {
      method: "POST",
      headers: this.headers,
      body: JSON.stringify({ model: this.model, input: text.slice(0, this.maxInputChars) }),
      signal,
    });
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`embedding request failed: ${res.status} ${body.slice(0, 200)}`);
    }
    const payload = EmbeddingResponseSchema.safeParse(await res.json());
    if (!payload.success) {
      throw new Error("embedding response carried no vector");
    }
    return toVector(payload.data.data[0].embedding);
  }
}

/**
 * Convert to Float32Array, rejecting empty or non-finite vectors.
 */
export function toVector(values: ArrayLike<number>): Float32Array {
  if (values.length === 0) {
    throw new ValidationError("embedding", "embedding is empty");
  }
  const out = new Float32Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = values[i];
    // checked after narrowing: 1e39 is finite as a double but Infinity as float32
    if (!Number.isFinite(out[i])) {
      throw new ValidationError("embedding", `embedding has a non-finite value at ${i}`);
    }
  }
  return out;
}

/**
 * Cosine similarity between two embedding vectors, clamped to [-1, 1].
 * Mismatched lengths, zero vectors and non-finite results score 0.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  const sim = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  if (!Number.isFinite(sim)) return 0;
  return Math.max(-1, Math.min(1, sim));
}

/**
 * Serialize a Float32Array to a Buffer for SQLite BLOB storage.
 */
export function serializeEmbedding(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Deserialize a Buffer from SQLite BLOB back to Float32Array.
 */
export function deserializeEmbedding(blob: Buffer): Float32Array {
  const ab = new ArrayBuffer(blob.length);
  const view = new Uint8Array(ab);
  view.set(blob);
  return new Float32Array(ab);
}
