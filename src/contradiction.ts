import { ConflictClassificationDegraded } from "./errors.js";
import { parseJsonPayload } from "./json-extract.js";
import type { GenerativeModel } from "./llm-client.js";
import { log } from "./logger.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import { readConflictVerdict } from "./schemas.js";
import type { Fact, MemoryRecord } from "./types.js";

export const CONTRADICTION_INSTRUCTIONS = `You are a contradiction detection system. Decide whether two statements about the same person contradict each other.

IMPORTANT: Not all similar statements are contradictions!
- "Likes TypeScript" and "Likes Go" are NOT contradictions (preferences can coexist)
- "Prefers dark mode" and "Prefers light mode" ARE contradictions (mutually exclusive)
- "Email is a@example.com" and "Email is b@example.com" ARE contradictions (only one email)
- "Works as a teacher" and "Now works as a professor" ARE contradictions (the current job changed)

Only mark as contradiction if the two statements CANNOT both be true at the same time.

Output JSON only:
{"contradictory": true|false, "reason": "<one short sentence>"}`;

export interface ConflictVerdictResult {
  contradictory: boolean;
  reason: string;
  /** True when the model could not be consulted and the pair was assumed compatible */
  degraded: boolean;
}

/**
 * Asks the generative model whether a new fact contradicts a stored memory.
 * Fails open: any failure is reported as non-contradictory.
 */
export class ConflictClassifier {
  constructor(
    private readonly model: GenerativeModel,
    private readonly retryPolicy: RetryPolicy,
    private readonly enabled = true,
  ) {}

  async classify(fact: Fact, record: MemoryRecord, options: { signal?: AbortSignal } = {}): Promise<ConflictVerdictResult> {
    if (!this.enabled) {
      return { contradictory: false, reason: "conflict detection disabled", degraded: false };
    }

    const input = `Statement 1 (existing, last updated ${record.updatedAt}):
${record.content}

Statement 2 (new, extracted ${fact.extractedAt}):
${fact.text}`;

    let raw: string;
    try {
      raw = await withRetry(
        () =>
          this.model.generate(
            { system: CONTRADICTION_INSTRUCTIONS, user: input },
            { temperature: 0, maxTokens: 200, signal: options.signal, operation: "contradiction" },
          ),
        this.retryPolicy,
        { operation: "contradiction", signal: options.signal },
      );
    } catch (err) {
      if (options.signal?.aborted) throw err;
      return this.degrade(
        new ConflictClassificationDegraded(
          `model call failed for memory ${record.id}: ${err instanceof Error ? err.message : String(err)}`,
          err,
        ),
      );
    }

    const verdict = parseJsonPayload(raw, readConflictVerdict);
    if (!verdict) {
      return this.degrade(new ConflictClassificationDegraded(`unparseable verdict for memory ${record.id}`));
    }

    log.debug(`contradiction check vs ${record.id}: ${verdict.contradictory ? "YES" : "NO"}`);
    return { ...verdict, degraded: false };
  }

  private degrade(err: ConflictClassificationDegraded): ConflictVerdictResult {
    log.warn(`contradiction check degraded [${err.code}]: ${err.message}; treating as compatible`);
    return { contradictory: false, reason: err.message, degraded: true };
  }
}
