import path from "node:path";
import type { EngineConfig } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_DB_PATH = path.join(process.env.HOME ?? "~", ".memweave", "memories.sqlite");

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeOpenaiBaseUrl(value: string | undefined, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid openaiBaseUrl from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(
      `ignoring openaiBaseUrl from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`,
    );
    return undefined;
  }

  // Local model servers (Ollama, LM Studio) are usually plain http on loopback.
  if (parsed.protocol === "http:" && !["localhost", "127.0.0.1", "[::1]"].includes(parsed.hostname)) {
    log.warn(`openaiBaseUrl from ${source} is using insecure http; prefer https`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function numberIn(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function positiveInt(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) return fallback;
  return Math.floor(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function parseConfig(raw: unknown): EngineConfig {
  const cfg =
    raw && typeof raw === "object" && !Array.isArray(raw)
      ? (raw as Record<string, unknown>)
      : {};

  // The key is optional at load time: the store can be listed without it,
  // model calls fail definitively when it is missing.
  let apiKey: string | undefined;
  const configuredKey = nonEmptyString(cfg.openaiApiKey);
  if (configuredKey) {
    apiKey = resolveEnvVars(configuredKey);
  } else {
    apiKey = nonEmptyString(process.env.OPENAI_API_KEY);
  }

  let baseUrl: string | undefined;
  const configuredBaseUrl = nonEmptyString(cfg.openaiBaseUrl);
  if (configuredBaseUrl) {
    baseUrl = normalizeOpenaiBaseUrl(resolveEnvVars(configuredBaseUrl), "config");
  } else {
    baseUrl = normalizeOpenaiBaseUrl(process.env.OPENAI_BASE_URL, "env");
  }

  const dbPath = nonEmptyString(cfg.dbPath) ?? nonEmptyString(process.env.MEMWEAVE_DB_PATH) ?? DEFAULT_DB_PATH;

  const matchThreshold = numberIn(cfg.matchThreshold, 0.88, -1, 1);
  let duplicateThreshold = numberIn(cfg.duplicateThreshold, 0.97, -1, 1);
  if (duplicateThreshold < matchThreshold) {
    log.warn(
      `duplicateThreshold (${duplicateThreshold}) is below matchThreshold (${matchThreshold}); using matchThreshold`,
    );
    duplicateThreshold = matchThreshold;
  }

  const diagnosticsFile = nonEmptyString(cfg.diagnosticsFile) ?? nonEmptyString(process.env.MEMWEAVE_DIAGNOSTICS_FILE);

  return {
    openaiApiKey: apiKey,
    openaiBaseUrl: baseUrl,
    model: nonEmptyString(cfg.model) ?? "gpt-4o-mini",
    embeddingModel: nonEmptyString(cfg.embeddingModel) ?? "text-embedding-3-small",
    embeddingDimensions: positiveInt(cfg.embeddingDimensions, 1536),
    embeddingBatchSize: positiveInt(cfg.embeddingBatchSize, 64),
    dbPath,
    topK: positiveInt(cfg.topK, 5),
    matchThreshold,
    duplicateThreshold,
    conflictConfidenceMargin: numberIn(cfg.conflictConfidenceMargin, 0.2, 0, 1),
    defaultConfidence: numberIn(cfg.defaultConfidence, 0.8, 0, 1),
    updateConfidenceBoost: numberIn(cfg.updateConfidenceBoost, 0.5, 0, 1),
    conflictDetectionEnabled: cfg.conflictDetectionEnabled !== false,
    modelTimeoutMs: positiveInt(cfg.modelTimeoutMs, 30_000),
    embeddingTimeoutMs: positiveInt(cfg.embeddingTimeoutMs, 15_000),
    retryMaxAttempts: positiveInt(cfg.retryMaxAttempts, 3),
    retryBaseDelayMs: numberIn(cfg.retryBaseDelayMs, 250, 0, 60_000),
    retryMaxDelayMs: numberIn(cfg.retryMaxDelayMs, 4_000, 0, 300_000),
    factConcurrency: positiveInt(cfg.factConcurrency, 4),
    diagnosticsFile,
    diagnosticsMaxBytes: positiveInt(cfg.diagnosticsMaxBytes, 5 * 1024 * 1024),
    diagnosticsBackups: typeof cfg.diagnosticsBackups === "number" && cfg.diagnosticsBackups >= 0
      ? Math.floor(cfg.diagnosticsBackups)
      : 3,
    debug: cfg.debug === true,
  };
}
