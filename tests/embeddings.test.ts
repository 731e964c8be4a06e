import test from "node:test";
import assert from "node:assert/strict";
import { EmbeddingUnavailable } from "../src/errors.js";
import { OpenAiEmbeddingProvider, embedIsolated, type EmbeddingsApi } from "../src/embeddings.js";
import { TableEmbedder, VECTORS, captureLogs, testConfig } from "./fakes.js";

type CreateBody = Parameters<EmbeddingsApi["create"]>[0];

function stubApi(respond: (body: CreateBody, call: number) => Promise<Awaited<ReturnType<EmbeddingsApi["create"]>>>) {
  const bodies: CreateBody[] = [];
  const api: EmbeddingsApi = {
    create: async (body) => {
      bodies.push(body);
      return respond(body, bodies.length);
    },
  };
  return { api, bodies };
}

const noSleep = async () => {};

test("embed batches requests and restores response order", async () => {
  captureLogs();
  const { api, bodies } = stubApi(async (body) => ({
    data: body.input.map((text, index) => ({ index, embedding: [text.length, 0, 0, 1] })).reverse(),
  }));
  const provider = new OpenAiEmbeddingProvider(testConfig({ embeddingBatchSize: 2 }), api, noSleep);

  const vectors = await provider.embed(["a", "bb", "ccc"]);

  assert.deepEqual(vectors, [
    [1, 0, 0, 1],
    [2, 0, 0, 1],
    [3, 0, 0, 1],
  ]);
  assert.deepEqual(
    bodies.map((b) => b.input),
    [["a", "bb"], ["ccc"]],
  );
  assert.equal(bodies[0]?.model, "text-embedding-3-small");
});

test("embed of no texts makes no request", async () => {
  const { api, bodies } = stubApi(async () => ({ data: [] }));
  const provider = new OpenAiEmbeddingProvider(testConfig(), api, noSleep);
  assert.deepEqual(await provider.embed([]), []);
  assert.equal(bodies.length, 0);
});

test("a vector of the wrong dimensionality fails without retry", async () => {
  captureLogs();
  const { api, bodies } = stubApi(async () => ({ data: [{ index: 0, embedding: [1, 2, 3] }] }));
  const provider = new OpenAiEmbeddingProvider(testConfig(), api, noSleep);
  await assert.rejects(provider.embed(["x"]), (err: unknown) => {
    assert.ok(err instanceof EmbeddingUnavailable);
    assert.equal(err.transient, false);
    assert.match(err.message, /vector 0 has 3 dimensions, expected 4/);
    return true;
  });
  assert.equal(bodies.length, 1);
});

test("non-finite values are rejected", async () => {
  captureLogs();
  const { api } = stubApi(async () => ({ data: [{ index: 0, embedding: [1, Number.NaN, 0, 0] }] }));
  const provider = new OpenAiEmbeddingProvider(testConfig(), api, noSleep);
  await assert.rejects(provider.embed(["x"]), /non-finite/);
});

test("transport failures are retried as transient", async () => {
  captureLogs();
  const { api, bodies } = stubApi(async (_body, call) => {
    if (call === 1) throw new Error("socket hang up");
    return { data: [{ index: 0, embedding: [0, 0, 0, 1] }] };
  });
  const provider = new OpenAiEmbeddingProvider(testConfig({ retryMaxAttempts: 3 }), api, noSleep);
  assert.deepEqual(await provider.embed(["x"]), [[0, 0, 0, 1]]);
  assert.equal(bodies.length, 2);
});

test("embedIsolated embeds unique texts once and maps results back", async () => {
  const embedder = new TableEmbedder(new Map([["Lives in Paris", VECTORS.paris]]));
  const results = await embedIsolated(embedder, ["Lives in Paris", "Lives in Paris"]);
  assert.deepEqual(embedder.calls, [["Lives in Paris"]]);
  assert.deepEqual(results, [
    { ok: true, vector: [1, 0, 0, 0] },
    { ok: true, vector: [1, 0, 0, 0] },
  ]);
});

test("embedIsolated keeps one failing text from failing its siblings", async () => {
  captureLogs();
  const embedder = new TableEmbedder(
    new Map<string, readonly number[]>([
      ["Lives in Paris", VECTORS.paris],
      ["Drinks coffee", VECTORS.coffee],
    ]),
  );
  const results = await embedIsolated(embedder, ["Lives in Paris", "Has a secret", "Drinks coffee"]);

  assert.deepEqual(embedder.calls, [["Lives in Paris", "Has a secret", "Drinks coffee"], ["Lives in Paris"], ["Has a secret"], ["Drinks coffee"]]);
  assert.deepEqual(
    results.map((r) => r.ok),
    [true, false, true],
  );
  const failed = results[1];
  assert.ok(failed && !failed.ok);
  assert.ok(failed.error instanceof EmbeddingUnavailable);
});
