import test from "node:test";
import assert from "node:assert/strict";
import { CONTRADICTION_INSTRUCTIONS, ConflictClassifier } from "../src/contradiction.js";
import { ModelRequestRejected } from "../src/errors.js";
import type { GenerationRequest, GenerativeModel } from "../src/llm-client.js";
import { VECTORS, captureLogs, makeFact, makeRecord } from "./fakes.js";

const policy = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

class OneReply implements GenerativeModel {
  readonly requests: GenerationRequest[] = [];
  constructor(private readonly reply: string | Error) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

const existing = makeRecord("teach", "Works as a teacher", VECTORS.teacher, { updatedAt: "2026-01-01T00:00:00.000Z" });
const incoming = makeFact("Works as a professor", { extractedAt: "2026-03-01T12:00:00.000Z" });

test("classify reads a structured verdict", async () => {
  captureLogs();
  const model = new OneReply('{"contradictory": true, "reason": "only one current job"}');
  const verdict = await new ConflictClassifier(model, policy).classify(incoming, existing);

  assert.deepEqual(verdict, { contradictory: true, reason: "only one current job", degraded: false });
  assert.equal(model.requests[0]?.system, CONTRADICTION_INSTRUCTIONS);
  assert.equal(
    model.requests[0]?.user,
    "Statement 1 (existing, last updated 2026-01-01T00:00:00.000Z):\nWorks as a teacher\n\n" +
      "Statement 2 (new, extracted 2026-03-01T12:00:00.000Z):\nWorks as a professor",
  );
});

test("classify accepts alternate field names inside prose", async () => {
  captureLogs();
  const model = new OneReply('Verdict: {"isContradiction": false, "reasoning": "preferences coexist"}');
  const verdict = await new ConflictClassifier(model, policy).classify(incoming, existing);
  assert.deepEqual(verdict, { contradictory: false, reason: "preferences coexist", degraded: false });
});

test("a failed model call fails open", async () => {
  const { lines } = captureLogs();
  const model = new OneReply(new ModelRequestRejected("contradiction: request rejected with 400"));
  const verdict = await new ConflictClassifier(model, policy).classify(incoming, existing);

  assert.equal(verdict.contradictory, false);
  assert.equal(verdict.degraded, true);
  assert.ok(lines.some((l) => l.level === "warn" && l.msg.includes("CONFLICT_CLASSIFICATION_DEGRADED")));
});

test("an unreadable verdict fails open", async () => {
  captureLogs();
  const verdict = await new ConflictClassifier(new OneReply("Probably yes?"), policy).classify(incoming, existing);
  assert.deepEqual(verdict, {
    contradictory: false,
    reason: "unparseable verdict for memory teach",
    degraded: true,
  });
});

test("a disabled classifier never calls the model", async () => {
  const model = new OneReply('{"contradictory": true, "reason": "x"}');
  const verdict = await new ConflictClassifier(model, policy, false).classify(incoming, existing);
  assert.equal(verdict.contradictory, false);
  assert.equal(model.requests.length, 0);
});
