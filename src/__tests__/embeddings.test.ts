import { describe, test, mock } from "node:test";
import assert from "node:assert/strict";
import { OpenAIEmbeddingProvider, cosineSimilarity, toVector } from "../embeddings.js";
import { ValidationError } from "../errors.js";

describe("toVector", () => {
  test("keeps finite values", () => {
    assert.deepEqual(Array.from(toVector([0.5, -1, 0])), [0.5, -1, 0]);
  });

  test("rejects empty vectors and values that are not finite as float32", () => {
    assert.throws(() => toVector([]), ValidationError);
    assert.throws(() => toVector([0.1, Number.NaN]), ValidationError);
    // finite as a double, Infinity once narrowed
    assert.throws(() => toVector([1e39, 0]), /non-finite value at 0/);
  });
});

describe("cosineSimilarity", () => {
  test("scores direction, not length", () => {
    assert.equal(cosineSimilarity(new Float32Array([2, 0]), new Float32Array([5, 0])), 1);
    assert.equal(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 3])), 0);
  });

  test("mismatched, zero and overflowing vectors score 0", () => {
    assert.equal(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([1, 0, 0])), 0);
    assert.equal(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 0])), 0);
    assert.equal(cosineSimilarity(new Float32Array([Infinity, 0]), new Float32Array([1, 0])), 0);
  });
});

describe("OpenAIEmbeddingProvider", () => {
  test("posts model and input to the embeddings endpoint", async () => {
    const fetchMock = mock.method(globalThis, "fetch", async () =>
      new Response(JSON.stringify({ data: [{ embedding: [0.25, 0.5] }] })),
    );
    try {
      const provider = new OpenAIEmbeddingProvider({
        url: "http://localhost:8080/v1/",
        model: "test-embed",
        apiKey: "test-secret",
      });
      const vector = await provider.embed("knee pain");
      assert.deepEqual(Array.from(vector), [0.25, 0.5]);

      const [input, init] = fetchMock.mock.calls[0].arguments;
      assert.equal(String(input), "http://localhost:8080/v1/embeddings");
      assert.deepEqual(init?.headers, { "Content-Type": "application/json", Authorization: "Bearer test-secret" });
      assert.deepEqual(JSON.parse(String(init?.body)), { model: "test-embed", input: "knee pain" });
    } finally {
      fetchMock.mock.restore();
    }
  });

  test("rejects a response whose vector overflows float32", async () => {
    const fetchMock = mock.method(globalThis, "fetch", async () =>
      new Response(JSON.stringify({ data: [{ embedding: [1e39, 0] }] })),
    );
    try {
      const provider = new OpenAIEmbeddingProvider({ url: "http://localhost:8080/v1", model: "test-embed" });
      await assert.rejects(provider.embed("knee pain"), ValidationError);
    } finally {
      fetchMock.mock.restore();
    }
  });

  test("reports a failed request with its status", async () => {
    const fetchMock = mock.method(globalThis, "fetch", async () => new Response("overloaded", { status: 503 }));
    try {
      const provider = new OpenAIEmbeddingProvider({ url: "http://localhost:8080/v1", model: "test-embed" });
      await assert.rejects(provider.embed("knee pain"), /embedding request failed: 503 overloaded/);
    } finally {
      fetchMock.mock.restore();
    }
  });
});
