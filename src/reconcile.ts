import type { ConflictClassifier } from "./contradiction.js";
import { log } from "./logger.js";
import { cosineSimilarity, normalizeFactText, textuallyEquivalent } from "./normalize.js";
import type { ConflictReason, Decision, EngineConfig, Fact, MemoryRecord, ScoredRecord } from "./types.js";

export type DecisionConfig = Pick<EngineConfig, "matchThreshold" | "duplicateThreshold" | "conflictConfidenceMargin">;

// Keeps a 0.8 vs 0.6 gap from counting as "more than 0.2".
const MARGIN_EPSILON = 1e-9;

/** Highest confidence, then most recently updated, then smallest id. */
export function compareSurvivors(a: MemoryRecord, b: MemoryRecord): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Greedy clique grown from the top candidate: a candidate joins only when it
 * is within `threshold` of every member already in the cluster.
 */
export function findCluster(candidates: ScoredRecord[], threshold: number): MemoryRecord[] {
  const [top, ...rest] = candidates;
  if (!top) return [];
  const cluster: MemoryRecord[] = [top.record];
  for (const { record } of rest) {
    if (cluster.every((member) => cosineSimilarity(member.embedding, record.embedding) >= threshold)) {
      cluster.push(record);
    }
  }
  return cluster;
}

/**
 * The survivor keeps its own text only when it is strictly longer once
 * normalized; otherwise the new fact replaces it. Absorbed members never
 * supply the text, they live on in the survivor's history.
 */
export function chooseMergedContent(fact: Fact, survivor: MemoryRecord): "fact" | "survivor" {
  return normalizeFactText(survivor.content).length > normalizeFactText(fact.text).length ? "survivor" : "fact";
}

/**
 * Maps a fact and its related memories to exactly one action. Rules are
 * evaluated in order and the first match wins.
 */
export class DecisionEngine {
  constructor(
    private readonly classifier: ConflictClassifier,
    private readonly config: DecisionConfig,
  ) {}

  async decide(
    fact: Fact,
    candidates: ScoredRecord[],
    options: { signal?: AbortSignal; asOf?: string } = {},
  ): Promise<Decision> {
    const [top] = candidates;
    if (!top) {
      return { action: "CREATE" };
    }

    if (top.similarity >= this.config.duplicateThreshold && textuallyEquivalent(fact.text, top.record.content)) {
      log.debug(`decide: exact duplicate of ${top.record.id}`);
      return { action: "IGNORE", reason: "exact duplicate", targetId: top.record.id };
    }

    if (candidates.length === 1) {
      const verdict = await this.classifier.classify(fact, top.record, options);
      if (!verdict.contradictory) {
        return { action: "UPDATE", target: top.record };
      }
      return this.resolveConflict(fact, [top.record], options.asOf);
    }

    const cluster = findCluster(candidates, this.config.matchThreshold);
    if (cluster.length >= 2) {
      const [survivor, ...absorbed] = [...cluster].sort(compareSurvivors);
      if (survivor) {
        const keep = chooseMergedContent(fact, survivor);
        log.debug(`decide: merge ${absorbed.map((r) => r.id).join(",")} into ${survivor.id} keeping ${keep} text`);
        return { action: "MERGE", survivor, absorbed, keep };
      }
    }

    const verdicts = await Promise.all(
      candidates.map(async ({ record }) => ({ record, verdict: await this.classifier.classify(fact, record, options) })),
    );
    const contradicted = verdicts.filter((v) => v.verdict.contradictory).map((v) => v.record);
    if (contradicted.length > 0) {
      return this.resolveConflict(fact, contradicted, options.asOf);
    }

    return { action: "UPDATE", target: top.record };
  }

  /**
   * `asOf` is when the fact reached reconciliation; it defaults to
   * `extractedAt`. Records written after extraction by sibling facts of the
   * same submission are older than `asOf` and lose on recency.
   */
  private resolveConflict(fact: Fact, contradicted: MemoryRecord[], asOf = fact.extractedAt): Decision {
    const ids = contradicted.map((r) => r.id);
    const [strongest] = [...contradicted].sort(compareSurvivors);
    if (!strongest) return { action: "CREATE" };

    const gap = fact.confidence - strongest.confidence;
    if (Math.abs(gap) - this.config.conflictConfidenceMargin > MARGIN_EPSILON) {
      if (gap > 0) {
        log.debug(`decide: conflict won by confidence over ${ids.join(",")}`);
        return { action: "CREATE", supersedes: { ids, reason: "conflict:lower-confidence" } };
      }
      log.debug(`decide: conflict lost by confidence to ${strongest.id}`);
      return { action: "IGNORE", reason: "conflict:lower-confidence", targetId: strongest.id };
    }

    const reason: ConflictReason = "conflict:recency";
    const latest = contradicted.reduce((acc, r) => (r.updatedAt > acc.updatedAt ? r : acc), strongest);
    if (asOf >= latest.updatedAt) {
      log.debug(`decide: conflict won by recency over ${ids.join(",")}`);
      return { action: "CREATE", supersedes: { ids, reason } };
    }
    log.debug(`decide: conflict lost by recency to ${latest.id}`);
    return { action: "IGNORE", reason, targetId: latest.id };
  }
}
