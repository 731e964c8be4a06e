import { randomUUID } from "node:crypto";
import { log } from "./logger.js";
import type { MemoryStore, WriteOp } from "./storage.js";
import type { Decision, EngineConfig, Fact, FactOutcome, HistoryEntry, MemoryRecord } from "./types.js";

export interface LifecycleOptions {
  idGen?: () => string;
  now?: () => Date;
}

function union(...lists: string[][]): string[] {
  return [...new Set(lists.flat())];
}

/** Confidence after a reinforcing UPDATE: closes `boost` of the gap to 1. */
export function boostConfidence(current: number, boost: number): number {
  return Math.min(1, current + (1 - current) * boost);
}

/**
 * Turns one decision into the writes it implies and applies them with a
 * single commit, so a fact is either fully reconciled or not at all.
 */
export class LifecycleManager {
  private readonly idGen: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly store: MemoryStore,
    private readonly config: Pick<EngineConfig, "updateConfidenceBoost">,
    options: LifecycleOptions = {},
  ) {
    this.idGen = options.idGen ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  async execute(
    fact: Fact,
    embedding: number[],
    decision: Decision,
    metadata: Record<string, unknown> = {},
  ): Promise<FactOutcome> {
    const at = this.now().toISOString();

    switch (decision.action) {
      case "CREATE": {
        const record = this.newRecord(fact, embedding, metadata, at);
        const ops: WriteOp[] = [{ kind: "insert", record }];
        const supersededIds = decision.supersedes?.ids ?? [];
        const supersededReason = decision.supersedes?.reason;
        for (const id of supersededIds) {
          ops.push({
            kind: "update",
            ownerId: fact.ownerId,
            id,
            mutation: { status: "superseded", supersededBy: record.id, supersededReason, updatedAt: at },
          });
        }
        await this.store.commit(ops);
        log.debug(`created ${record.id}${supersededIds.length ? ` superseding ${supersededIds.join(",")}` : ""}`);
        return supersededIds.length > 0
          ? { status: "created", fact: fact.text, id: record.id, supersededIds }
          : { status: "created", fact: fact.text, id: record.id };
      }

      case "UPDATE": {
        const target = decision.target;
        await this.store.commit([
          {
            kind: "update",
            ownerId: target.ownerId,
            id: target.id,
            expectedVersion: target.version,
            mutation: {
              content: fact.text,
              embedding,
              confidence: boostConfidence(target.confidence, this.config.updateConfidenceBoost),
              history: [...target.history, { content: target.content, updatedAt: at, reason: "updated" }],
              sourceRefs: union(target.sourceRefs, [fact.sourceRef]),
              metadata: { ...target.metadata, ...metadata },
              updatedAt: at,
            },
          },
        ]);
        log.debug(`updated ${target.id}`);
        return { status: "updated", fact: fact.text, id: target.id };
      }

      case "MERGE": {
        const { survivor, absorbed, keep } = decision;
        // The tail is whichever text is no longer current: the survivor's old
        // content when the fact replaces it, else the fact itself.
        const history: HistoryEntry[] = [
          ...survivor.history,
          ...absorbed.flatMap((r) => r.history),
          ...absorbed.map((r): HistoryEntry => ({ content: r.content, updatedAt: at, reason: `merged-from:${r.id}` })),
          keep === "fact"
            ? { content: survivor.content, updatedAt: at, reason: "merged" }
            : { content: fact.text, updatedAt: at, reason: "merged-fact" },
        ];
        const ops: WriteOp[] = [
          {
            kind: "update",
            ownerId: survivor.ownerId,
            id: survivor.id,
            expectedVersion: survivor.version,
            mutation: {
              ...(keep === "fact" ? { content: fact.text, embedding } : {}),
              confidence: Math.max(survivor.confidence, fact.confidence),
              history,
              sourceRefs: union(survivor.sourceRefs, ...absorbed.map((r) => r.sourceRefs), [fact.sourceRef]),
              metadata: { ...survivor.metadata, ...metadata },
              updatedAt: at,
            },
          },
          ...absorbed.map(
            (r): WriteOp => ({
              kind: "update",
              ownerId: r.ownerId,
              id: r.id,
              expectedVersion: r.version,
              mutation: { status: "superseded", supersededBy: survivor.id, supersededReason: "merged", updatedAt: at },
            }),
          ),
        ];
        await this.store.commit(ops);
        const absorbedIds = absorbed.map((r) => r.id);
        log.debug(`merged ${absorbedIds.join(",")} into ${survivor.id}`);
        return { status: "merged", fact: fact.text, survivorId: survivor.id, absorbedIds };
      }

      case "IGNORE": {
        if (decision.reason === "exact duplicate") {
          return { status: "ignored", fact: fact.text, reason: decision.reason, targetId: decision.targetId };
        }
        // The losing side of a conflict is kept, out of search, for later review.
        const alternative: MemoryRecord = {
          ...this.newRecord(fact, embedding, metadata, at),
          status: "superseded",
          supersededBy: decision.targetId,
          supersededReason: decision.reason,
        };
        await this.store.commit([{ kind: "insert", record: alternative }]);
        log.debug(`kept ${alternative.id} as alternative to ${decision.targetId}`);
        return {
          status: "ignored",
          fact: fact.text,
          reason: decision.reason,
          targetId: decision.targetId,
          alternativeId: alternative.id,
        };
      }
    }
  }

  private newRecord(fact: Fact, embedding: number[], metadata: Record<string, unknown>, at: string): MemoryRecord {
    return {
      id: this.idGen(),
      ownerId: fact.ownerId,
      content: fact.text,
      embedding,
      confidence: fact.confidence,
      status: "active",
      createdAt: at,
      updatedAt: at,
      history: [],
      sourceRefs: [fact.sourceRef],
      metadata: { ...metadata },
      version: 1,
    };
  }
}
