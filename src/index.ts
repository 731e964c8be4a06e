export { parseConfig } from "./config.js";
export { createMemoryEngine, retryPolicyFrom, type EngineOverrides, type MemoryEngine } from "./engine.js";
export { MemoryPipeline, type PipelineDeps } from "./pipeline.js";
export { FactExtractor, FACT_EXTRACTION_INSTRUCTIONS, parseFactsResponse } from "./extraction.js";
export { OpenAiEmbeddingProvider, embedIsolated, type EmbeddingProvider } from "./embeddings.js";
export { OpenAiChatModel, type GenerativeModel, type GenerationRequest, type GenerationOptions } from "./llm-client.js";
export { SqliteMemoryStore, type MemoryStore, type RecordMutation, type WriteOp } from "./storage.js";
export { SimilarityResolver } from "./similarity.js";
export { ConflictClassifier } from "./contradiction.js";
export { DecisionEngine } from "./reconcile.js";
export { LifecycleManager } from "./lifecycle.js";
export {
  FileDiagnosticsSink,
  MemoryDiagnosticsSink,
  NoopDiagnosticsSink,
  type DiagnosticEvent,
  type DiagnosticsSink,
} from "./diagnostics.js";
export { initLogger, log, type LoggerBackend } from "./logger.js";
export { withRetry, type RetryPolicy } from "./retry.js";
export * from "./errors.js";
export type * from "./types.js";
