import { log } from "./logger.js";
import { compareScored } from "./normalize.js";
import type { MemoryStore } from "./storage.js";
import type { Fact, ScoredRecord } from "./types.js";

export interface SimilarityOptions {
  topK: number;
  /** Minimum cosine similarity for a memory to count as related */
  matchThreshold: number;
}

/**
 * Finds the owner's active memories related to a fact. An empty result
 * means the fact is new to this owner.
 */
export class SimilarityResolver {
  constructor(
    private readonly store: MemoryStore,
    private readonly options: SimilarityOptions,
  ) {}

  async resolve(ownerId: string, fact: Fact, embedding: number[]): Promise<ScoredRecord[]> {
    const hits = await this.store.nearest(ownerId, embedding, this.options.topK, this.options.matchThreshold);
    // Stores other than SQLite may rank differently; the decision rules depend on this order.
    const ranked = hits
      .filter((hit) => hit.record.ownerId === ownerId && hit.record.status === "active")
      .sort(compareScored);
    log.debug(
      `resolve: owner=${ownerId} ref=${fact.sourceRef} candidates=${ranked.length}` +
        (ranked[0] ? ` top=${ranked[0].similarity.toFixed(4)}` : ""),
    );
    return ranked;
  }
}
