import { ConflictClassifier } from "./contradiction.js";
import { FileDiagnosticsSink, NoopDiagnosticsSink, type DiagnosticsSink } from "./diagnostics.js";
import { OpenAiEmbeddingProvider, type EmbeddingProvider } from "./embeddings.js";
import { FactExtractor } from "./extraction.js";
import { LifecycleManager } from "./lifecycle.js";
import { OpenAiChatModel, type GenerativeModel } from "./llm-client.js";
import { log } from "./logger.js";
import { MemoryPipeline } from "./pipeline.js";
import { DecisionEngine } from "./reconcile.js";
import type { RetryPolicy } from "./retry.js";
import { SimilarityResolver } from "./similarity.js";
import { SqliteMemoryStore, type MemoryStore } from "./storage.js";
import type { EngineConfig } from "./types.js";

/** Collaborators a caller may supply instead of the defaults built from config. */
export interface EngineOverrides {
  model?: GenerativeModel;
  embedder?: EmbeddingProvider;
  store?: MemoryStore;
  diagnostics?: DiagnosticsSink;
  idGen?: () => string;
  now?: () => Date;
}

export interface MemoryEngine {
  readonly config: EngineConfig;
  readonly pipeline: MemoryPipeline;
  readonly store: MemoryStore;
  readonly diagnostics: DiagnosticsSink;
  /** Flushes diagnostics and closes the store. */
  close(): Promise<void>;
}

export function retryPolicyFrom(config: EngineConfig): RetryPolicy {
  return {
    maxAttempts: config.retryMaxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };
}

export function createMemoryEngine(config: EngineConfig, overrides: EngineOverrides = {}): MemoryEngine {
  const retryPolicy = retryPolicyFrom(config);

  const diagnostics =
    overrides.diagnostics ??
    (config.diagnosticsFile
      ? new FileDiagnosticsSink({
          filePath: config.diagnosticsFile,
          maxBytes: config.diagnosticsMaxBytes,
          backups: config.diagnosticsBackups,
        })
      : new NoopDiagnosticsSink());
  const store = overrides.store ?? new SqliteMemoryStore({ path: config.dbPath, retryPolicy });
  const model = overrides.model ?? new OpenAiChatModel(config);
  const embedder = overrides.embedder ?? new OpenAiEmbeddingProvider(config);

  const pipeline = new MemoryPipeline(
    {
      extractor: new FactExtractor(model, diagnostics, retryPolicy),
      embedder,
      resolver: new SimilarityResolver(store, { topK: config.topK, matchThreshold: config.matchThreshold }),
      decisions: new DecisionEngine(new ConflictClassifier(model, retryPolicy, config.conflictDetectionEnabled), config),
      lifecycle: new LifecycleManager(store, config, {
        ...(overrides.idGen ? { idGen: overrides.idGen } : {}),
        ...(overrides.now ? { now: overrides.now } : {}),
      }),
      store,
      diagnostics,
    },
    config,
    overrides.now ? { now: overrides.now } : {},
  );

  log.debug(
    `engine ready: model=${config.model} embeddingModel=${config.embeddingModel} ` +
      `topK=${config.topK} match=${config.matchThreshold} duplicate=${config.duplicateThreshold}`,
  );

  return {
    config,
    pipeline,
    store,
    diagnostics,
    async close() {
      try {
        await diagnostics.flush();
      } finally {
        store.close();
      }
    },
  };
}
