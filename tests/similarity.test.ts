import test from "node:test";
import assert from "node:assert/strict";
import { SimilarityResolver } from "../src/similarity.js";
import { SqliteMemoryStore } from "../src/storage.js";
import { VECTORS, captureLogs, makeFact, makeRecord } from "./fakes.js";

async function seededStore(): Promise<SqliteMemoryStore> {
  const store = new SqliteMemoryStore({ path: ":memory:" });
  await store.insert(makeRecord("teach", "Works as a teacher", VECTORS.teacher));
  await store.insert(makeRecord("teach-2", "Teaches at a school", [0, 0.98, 0.2, 0], { updatedAt: "2026-01-05T00:00:00.000Z" }));
  await store.insert(makeRecord("paris", "Lives in Paris", VECTORS.paris));
  return store;
}

test("resolve returns related memories by descending similarity", async () => {
  captureLogs();
  const store = await seededStore();
  try {
    const resolver = new SimilarityResolver(store, { topK: 5, matchThreshold: 0.88 });
    const hits = await resolver.resolve("owner-a", makeFact("Works as a professor"), VECTORS.professor.slice());
    assert.deepEqual(
      hits.map((h) => h.record.id),
      ["teach-2", "teach"],
    );
    assert.ok((hits[0]?.similarity ?? 0) > (hits[1]?.similarity ?? 1));
  } finally {
    store.close();
  }
});

test("resolve honours topK", async () => {
  captureLogs();
  const store = await seededStore();
  try {
    const resolver = new SimilarityResolver(store, { topK: 1, matchThreshold: 0.88 });
    const hits = await resolver.resolve("owner-a", makeFact("Works as a professor"), VECTORS.professor.slice());
    assert.deepEqual(
      hits.map((h) => h.record.id),
      ["teach-2"],
    );
  } finally {
    store.close();
  }
});

test("an unrelated fact has no candidates", async () => {
  captureLogs();
  const store = await seededStore();
  try {
    const resolver = new SimilarityResolver(store, { topK: 5, matchThreshold: 0.88 });
    assert.deepEqual(await resolver.resolve("owner-a", makeFact("Drinks coffee"), VECTORS.coffee.slice()), []);
    assert.deepEqual(await resolver.resolve("owner-b", makeFact("Works as a professor"), VECTORS.professor.slice()), []);
  } finally {
    store.close();
  }
});
