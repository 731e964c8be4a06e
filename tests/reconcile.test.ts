import test from "node:test";
import assert from "node:assert/strict";
import { ConflictClassifier } from "../src/contradiction.js";
import { DecisionEngine, chooseMergedContent, compareSurvivors, findCluster } from "../src/reconcile.js";
import type { GenerationRequest, GenerativeModel } from "../src/llm-client.js";
import type { MemoryRecord, ScoredRecord } from "../src/types.js";
import { ScriptedModel, VECTORS, captureLogs, makeFact, makeRecord, testConfig } from "./fakes.js";

const policy = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

function engine(model: GenerativeModel): DecisionEngine {
  return new DecisionEngine(new ConflictClassifier(model, policy), testConfig());
}

function scored(record: MemoryRecord, similarity: number): ScoredRecord {
  return { record, similarity };
}

const teacher = makeRecord("teach", "Works as a teacher", VECTORS.teacher);
const professorFact = makeFact("Works as a professor");

test("no candidates means CREATE", async () => {
  const model = new ScriptedModel();
  const decision = await engine(model).decide(professorFact, []);
  assert.deepEqual(decision, { action: "CREATE" });
  assert.equal(model.calls.length, 0);
});

test("a near-identical memory with the same text is an exact duplicate", async () => {
  captureLogs();
  const model = new ScriptedModel();
  const paris = makeRecord("paris", "Lives in Paris", VECTORS.paris);
  const decision = await engine(model).decide(makeFact("lives in paris."), [scored(paris, 0.999)]);
  assert.deepEqual(decision, { action: "IGNORE", reason: "exact duplicate", targetId: "paris" });
  assert.equal(model.calls.length, 0);
});

test("equal text below the duplicate threshold is an UPDATE", async () => {
  captureLogs();
  const paris = makeRecord("paris", "Lives in Paris", VECTORS.paris);
  const decision = await engine(new ScriptedModel()).decide(makeFact("Lives in Paris"), [
    scored(paris, 0.9),
  ]);
  assert.equal(decision.action, "UPDATE");
});

test("a single compatible candidate is updated", async () => {
  captureLogs();
  const decision = await engine(new ScriptedModel()).decide(professorFact, [scored(teacher, 0.95)]);
  assert.deepEqual(decision, { action: "UPDATE", target: teacher });
});

test("a cluster of related memories is merged into the most confident one", async () => {
  captureLogs();
  const school = makeRecord("school", "Teaches at a school", [0, 0.98, 0.2, 0], { confidence: 0.9 });
  const model = new ScriptedModel();
  const decision = await engine(model).decide(professorFact, [
    scored(school, 0.993),
    scored(teacher, 0.95),
  ]);
  assert.deepEqual(decision, {
    action: "MERGE",
    survivor: school,
    absorbed: [teacher],
    keep: "fact",
  });
  assert.equal(model.calls.length, 0);
});

test("candidates that are not related to each other are checked for conflicts, then the top one updated", async () => {
  captureLogs();
  const left = makeRecord("left", "Likes jazz", [0.95, 0.3122, 0, 0]);
  const right = makeRecord("right", "Likes techno", [0.95, -0.3122, 0, 0]);
  const model = new ScriptedModel();
  const decision = await engine(model).decide(makeFact("Likes music"), [
    scored(left, 0.95),
    scored(right, 0.94),
  ]);
  assert.deepEqual(decision, { action: "UPDATE", target: left });
  assert.equal(model.calls.length, 2);
});

test("a contradiction between equally confident statements is settled by recency", async () => {
  captureLogs();
  const model = new ScriptedModel({ contradicts: () => true });
  const decision = await engine(model).decide(professorFact, [scored(teacher, 0.95)]);
  assert.deepEqual(decision, { action: "CREATE", supersedes: { ids: ["teach"], reason: "conflict:recency" } });
});

test("a confidence gap of exactly the margin still falls back to recency", async () => {
  captureLogs();
  const weaker = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { confidence: 0.6 });
  const decision = await engine(new ScriptedModel({ contradicts: () => true })).decide(
    makeFact("Works as a professor", { confidence: 0.8 }),
    [scored(weaker, 0.95)],
  );
  assert.deepEqual(decision, { action: "CREATE", supersedes: { ids: ["teach"], reason: "conflict:recency" } });
});

test("a much more confident new fact supersedes the old one", async () => {
  captureLogs();
  const weaker = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { confidence: 0.6 });
  const decision = await engine(new ScriptedModel({ contradicts: () => true })).decide(
    makeFact("Works as a professor", { confidence: 0.95 }),
    [scored(weaker, 0.95)],
  );
  assert.deepEqual(decision, {
    action: "CREATE",
    supersedes: { ids: ["teach"], reason: "conflict:lower-confidence" },
  });
});

test("a much less confident new fact loses the conflict", async () => {
  captureLogs();
  const stronger = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { confidence: 0.95 });
  const decision = await engine(new ScriptedModel({ contradicts: () => true })).decide(
    makeFact("Works as a professor", { confidence: 0.5 }),
    [scored(stronger, 0.95)],
  );
  assert.deepEqual(decision, { action: "IGNORE", reason: "conflict:lower-confidence", targetId: "teach" });
});

test("a stored statement newer than the fact wins on recency", async () => {
  captureLogs();
  const newer = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { updatedAt: "2026-06-01T00:00:00.000Z" });
  const decision = await engine(new ScriptedModel({ contradicts: () => true })).decide(
    professorFact,
    [scored(newer, 0.95)],
  );
  assert.deepEqual(decision, { action: "IGNORE", reason: "conflict:recency", targetId: "teach" });
});

test("only the contradicted candidates take part in conflict resolution", async () => {
  captureLogs();
  const left = makeRecord("left", "Prefers dark mode", [0.95, 0.3122, 0, 0]);
  const right = makeRecord("right", "Uses a large monitor", [0.95, -0.3122, 0, 0]);
  const model = new ScriptedModel({ contradicts: (existing) => existing === "Prefers dark mode" });
  const decision = await engine(model).decide(makeFact("Prefers light mode"), [
    scored(left, 0.95),
    scored(right, 0.94),
  ]);
  assert.deepEqual(decision, { action: "CREATE", supersedes: { ids: ["left"], reason: "conflict:recency" } });
});

test("an unavailable classifier is treated as no contradiction", async () => {
  captureLogs();
  const failing: GenerativeModel = {
    async generate(_request: GenerationRequest): Promise<string> {
      throw new Error("connection reset");
    },
  };
  const decision = await engine(failing).decide(professorFact, [scored(teacher, 0.95)]);
  assert.deepEqual(decision, { action: "UPDATE", target: teacher });
});

test("findCluster grows a clique from the top candidate", () => {
  const a = makeRecord("a", "A", [1, 0, 0, 0]);
  const b = makeRecord("b", "B", [0.95, 0.3122, 0, 0]);
  const c = makeRecord("c", "C", [0.95, -0.3122, 0, 0]);
  assert.deepEqual(
    findCluster([scored(a, 0.99), scored(b, 0.95), scored(c, 0.94)], 0.88).map((r) => r.id),
    ["a", "b"],
  );
});

test("compareSurvivors ranks confidence, then recency, then id", () => {
  const records = [
    makeRecord("z", "x", VECTORS.paris, { confidence: 0.9, updatedAt: "2026-01-01T00:00:00.000Z" }),
    makeRecord("b", "x", VECTORS.paris, { confidence: 0.9, updatedAt: "2026-01-02T00:00:00.000Z" }),
    makeRecord("a", "x", VECTORS.paris, { confidence: 0.9, updatedAt: "2026-01-01T00:00:00.000Z" }),
    makeRecord("top", "x", VECTORS.paris, { confidence: 0.99 }),
  ];
  assert.deepEqual(
    records.sort(compareSurvivors).map((r) => r.id),
    ["top", "b", "a", "z"],
  );
});

test("chooseMergedContent weighs only the fact against the survivor and prefers the fact on ties", () => {
  const survivor = makeRecord("s", "Works as a teacher", VECTORS.teacher);
  assert.equal(chooseMergedContent(makeFact("Works as a tutor!!"), survivor), "survivor");
  assert.equal(chooseMergedContent(makeFact("Works as a plumber"), survivor), "fact");
  assert.equal(chooseMergedContent(makeFact("Works as a high school teacher"), survivor), "fact");
});

test("a longer absorbed member never takes over the merged text", async () => {
  captureLogs();
  const school = makeRecord("school", "Teaches", [0, 0.98, 0.2, 0], { confidence: 0.9 });
  const history = makeRecord("hist", "Teaches history at a public school", VECTORS.teacher);
  const decision = await engine(new ScriptedModel()).decide(professorFact, [scored(school, 0.993), scored(history, 0.95)]);
  assert.deepEqual(decision, { action: "MERGE", survivor: school, absorbed: [history], keep: "fact" });
});

test("recency is judged at the time the fact reaches reconciliation", async () => {
  captureLogs();
  // Written by a sibling fact after this one was extracted.
  const sibling = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { updatedAt: "2026-03-01T12:00:01.000Z" });
  const model = new ScriptedModel({ contradicts: () => true });
  assert.deepEqual(await engine(model).decide(professorFact, [scored(sibling, 0.95)]), {
    action: "IGNORE",
    reason: "conflict:recency",
    targetId: "teach",
  });
  assert.deepEqual(
    await engine(model).decide(professorFact, [scored(sibling, 0.95)], { asOf: "2026-03-01T12:00:02.000Z" }),
    { action: "CREATE", supersedes: { ids: ["teach"], reason: "conflict:recency" } },
  );
});
