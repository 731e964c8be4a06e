import { EmbeddingUnavailable, MemoryEngineError } from "./errors.js";
import { classifyOpenAiError, createOpenAiClient } from "./llm-client.js";
import { log } from "./logger.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import type { EngineConfig } from "./types.js";

/**
 * Maps texts to fixed-length vectors. One vector per input, same order.
 * A call either returns every vector or throws EmbeddingUnavailable.
 */
export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

/** The slice of the OpenAI SDK this module calls; tests pass a stub. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
  ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

// Rough per-input character cap; the embedding models reject longer inputs.
const MAX_INPUT_CHARS = 8000;

type EmbeddingConfig = Pick<
  EngineConfig,
  | "embeddingModel"
  | "embeddingDimensions"
  | "embeddingBatchSize"
  | "embeddingTimeoutMs"
  | "retryMaxAttempts"
  | "retryBaseDelayMs"
  | "retryMaxDelayMs"
  | "openaiApiKey"
  | "openaiBaseUrl"
>;

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly api: EmbeddingsApi;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly config: EmbeddingConfig,
    api?: EmbeddingsApi,
    retrySleep?: (ms: number) => Promise<void>,
  ) {
    this.dimensions = config.embeddingDimensions;
    this.retryPolicy = {
      maxAttempts: config.retryMaxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    };
    this.sleep = retrySleep;
    if (api) {
      this.api = api;
    } else {
      const client = createOpenAiClient(config);
      this.api = {
        create: (body, options) => client.embeddings.create(body, options),
      };
    }
  }

  async embed(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const out: number[][] = [];
    const batchSize = Math.max(1, this.config.embeddingBatchSize);
    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const vectors = await withRetry(
        () => this.embedBatch(batch, options.signal),
        this.retryPolicy,
        { operation: "embedding", signal: options.signal, ...(this.sleep ? { sleep: this.sleep } : {}) },
      );
      out.push(...vectors);
    }
    return out;
  }

  private async embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    let response: Awaited<ReturnType<EmbeddingsApi["create"]>>;
    try {
      response = await this.api.create(
        { model: this.config.embeddingModel, input: batch.map((t) => t.slice(0, MAX_INPUT_CHARS)) },
        { signal, timeout: this.config.embeddingTimeoutMs, maxRetries: 0 },
      );
    } catch (err) {
      const classified = classifyOpenAiError(err, "embedding");
      const transient = classified instanceof MemoryEngineError && classified.transient;
      throw new EmbeddingUnavailable(classified.message, { transient, cause: err });
    }

    return this.validate(batch.length, response.data);
  }

  private validate(expected: number, data: Array<{ embedding: number[]; index: number }>): number[][] {
    if (!Array.isArray(data) || data.length !== expected) {
      throw new EmbeddingUnavailable(
        `embedding: expected ${expected} vectors, got ${Array.isArray(data) ? data.length : "none"}`,
        { transient: false },
      );
    }

    const ordered = [...data].sort((a, b) => a.index - b.index);
    return ordered.map((item, i) => {
      const vector = item.embedding;
      if (item.index !== i) {
        throw new EmbeddingUnavailable(`embedding: response indexes are not contiguous (saw ${item.index} at ${i})`, {
          transient: false,
        });
      }
      if (!Array.isArray(vector) || vector.length !== this.dimensions) {
        throw new EmbeddingUnavailable(
          `embedding: vector ${i} has ${Array.isArray(vector) ? vector.length : 0} dimensions, expected ${this.dimensions}`,
          { transient: false },
        );
      }
      if (!vector.every((n) => Number.isFinite(n))) {
        throw new EmbeddingUnavailable(`embedding: vector ${i} contains non-finite values`, { transient: false });
      }
      return vector;
    });
  }
}

export type EmbedResult = { ok: true; vector: number[] } | { ok: false; error: unknown };

/**
 * Embed each unique text once and map the vectors back onto `texts`.
 * Returns per-text results: when the whole batch fails, each unique text is
 * retried alone so one bad input does not take its siblings down.
 */
export async function embedIsolated(
  provider: EmbeddingProvider,
  texts: string[],
  options: { signal?: AbortSignal } = {},
): Promise<EmbedResult[]> {
  const unique = [...new Set(texts)];
  const byText = new Map<string, EmbedResult>();

  try {
    const vectors = await provider.embed(unique, options);
    if (vectors.length !== unique.length) {
      throw new EmbeddingUnavailable(`embedding: provider returned ${vectors.length} vectors for ${unique.length} texts`);
    }
    unique.forEach((text, i) => byText.set(text, { ok: true, vector: vectors[i] }));
  } catch (batchErr) {
    log.warn(`embedding batch of ${unique.length} failed; embedding texts one by one: ${String(batchErr)}`);
    for (const text of unique) {
      try {
        const [vector] = await provider.embed([text], options);
        if (!vector) throw new EmbeddingUnavailable("embedding: provider returned no vector");
        byText.set(text, { ok: true, vector });
      } catch (err) {
        byText.set(text, { ok: false, error: err });
      }
    }
  }

  return texts.map(
    (text): EmbedResult => byText.get(text) ?? { ok: false, error: new EmbeddingUnavailable("embedding: missing result") },
  );
}
