import { randomUUID } from "node:crypto";
import type { DiagnosticsSink } from "./diagnostics.js";
import { embedIsolated, type EmbedResult, type EmbeddingProvider } from "./embeddings.js";
import { InvariantViolation, SubmissionCancelled, errorCode, errorMessage } from "./errors.js";
import type { FactExtractor } from "./extraction.js";
import { KeyedMutex, mapWithConcurrency } from "./keyed-lock.js";
import type { LifecycleManager } from "./lifecycle.js";
import { log } from "./logger.js";
import type { DecisionEngine } from "./reconcile.js";
import type { SimilarityResolver } from "./similarity.js";
import type { MemoryStore } from "./storage.js";
import type {
  EngineConfig,
  Fact,
  FactOutcome,
  MemoryRecord,
  MemoryStatus,
  OutcomeStatus,
  ScoredRecord,
  Submission,
  SubmissionReport,
} from "./types.js";

export interface PipelineDeps {
  extractor: FactExtractor;
  embedder: EmbeddingProvider;
  resolver: SimilarityResolver;
  decisions: DecisionEngine;
  lifecycle: LifecycleManager;
  store: MemoryStore;
  diagnostics: DiagnosticsSink;
}

export type PipelineConfig = Pick<EngineConfig, "factConcurrency" | "defaultConfidence">;

type FailedOutcome = Extract<FactOutcome, { status: "failed" }>;

function failed(fact: string, err: unknown): FailedOutcome {
  return { status: "failed", fact, error: { code: errorCode(err), message: errorMessage(err) } };
}

function tally(outcomes: FactOutcome[]): Record<OutcomeStatus, number> {
  const counts: Record<OutcomeStatus, number> = { created: 0, updated: 0, merged: 0, ignored: 0, failed: 0 };
  for (const outcome of outcomes) counts[outcome.status] += 1;
  return counts;
}

/**
 * Ingress for the reconciliation engine: extract, embed, then reconcile each
 * fact against the owner's memories. Facts of one owner are reconciled one at
 * a time; extraction and embedding run outside the lock.
 */
export class MemoryPipeline {
  private readonly ownerLocks = new KeyedMutex();

  constructor(
    private readonly deps: PipelineDeps,
    private readonly config: PipelineConfig,
    private readonly options: { now?: () => Date } = {},
  ) {}

  async submit(submission: Submission, options: { signal?: AbortSignal } = {}): Promise<SubmissionReport> {
    const { ownerId, text } = submission;
    if (ownerId.trim().length === 0) {
      throw new InvariantViolation("submission ownerId must be a non-empty string");
    }
    const { signal } = options;
    const sourceRef = submission.messageId ?? randomUUID();
    const metadata = submission.metadata ?? {};

    if (signal?.aborted) {
      throw new SubmissionCancelled("submission cancelled before extraction");
    }

    let facts: Fact[];
    try {
      facts = await this.deps.extractor.extract(text, ownerId, {
        sourceRef,
        signal,
        defaultConfidence: this.config.defaultConfidence,
        ...(this.options.now ? { now: this.options.now } : {}),
      });
    } catch (err) {
      if (signal?.aborted) throw new SubmissionCancelled("submission cancelled during extraction");
      throw err;
    }

    const embedded: EmbedResult[] =
      facts.length > 0 ? await embedIsolated(this.deps.embedder, facts.map((f) => f.text), { signal }) : [];

    const outcomes = await mapWithConcurrency(facts, this.config.factConcurrency, (fact, i) =>
      this.reconcileFact(fact, embedded[i], metadata, signal),
    );

    const failures = outcomes.filter((o): o is FailedOutcome => o.status === "failed");
    const counts = tally(outcomes);
    log.info(
      `submission owner=${ownerId} ref=${sourceRef} facts=${facts.length} ` +
        `created=${counts.created} updated=${counts.updated} merged=${counts.merged} ` +
        `ignored=${counts.ignored} failed=${counts.failed}`,
    );
    return { ownerId, sourceRef, factsExtracted: facts.length, outcomes, failures, counts };
  }

  /** Nearest active memories for a free-text query. */
  async search(ownerId: string, query: string, limit = 5): Promise<ScoredRecord[]> {
    if (query.trim().length === 0 || limit <= 0) return [];
    const [vector] = await this.deps.embedder.embed([query]);
    if (!vector) return [];
    return this.deps.store.nearest(ownerId, vector, limit);
  }

  get(ownerId: string, id: string): Promise<MemoryRecord | null> {
    return this.deps.store.get(ownerId, id);
  }

  list(ownerId: string, options: { status?: MemoryStatus } = {}): Promise<MemoryRecord[]> {
    return this.deps.store.list(ownerId, options);
  }

  private async reconcileFact(
    fact: Fact,
    embedding: EmbedResult | undefined,
    metadata: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<FactOutcome> {
    if (signal?.aborted) return failed(fact.text, new SubmissionCancelled());

    try {
      if (!embedding) throw new InvariantViolation("no embedding result for fact");
      if (!embedding.ok) throw embedding.error;
      const vector = embedding.vector;

      return await this.ownerLocks.runExclusive(fact.ownerId, async () => {
        if (signal?.aborted) throw new SubmissionCancelled();
        const candidates = await this.deps.resolver.resolve(fact.ownerId, fact, vector);
        const asOf = (this.options.now?.() ?? new Date()).toISOString();
        const decision = await this.deps.decisions.decide(fact, candidates, { signal, asOf });
        log.debug(`fact ref=${fact.sourceRef}: ${decision.action}`);
        return this.deps.lifecycle.execute(fact, vector, decision, metadata);
      });
    } catch (err) {
      const outcome = failed(fact.text, err);
      log.warn(`fact failed owner=${fact.ownerId} ref=${fact.sourceRef} [${outcome.error.code}]: ${outcome.error.message}`);
      this.deps.diagnostics.emit({
        kind: "fact_failed",
        ownerId: fact.ownerId,
        sourceRef: fact.sourceRef,
        fact: fact.text,
        code: outcome.error.code,
        message: outcome.error.message,
      });
      return outcome;
    }
  }
}
