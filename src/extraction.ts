import type { DiagnosticsSink } from "./diagnostics.js";
import { ExtractionDegraded } from "./errors.js";
import { parseJsonPayload } from "./json-extract.js";
import type { GenerativeModel } from "./llm-client.js";
import { log } from "./logger.js";
import { normalizeFactText } from "./normalize.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import { readFactsPayload, type ParsedFact } from "./schemas.js";
import type { Fact } from "./types.js";

export const FACT_EXTRACTION_INSTRUCTIONS = `You are a memory extraction system for a personal assistant. Read the user's message and extract durable, standalone facts about the user worth remembering across conversations.

Rules:
- One atomic fact per entry; split compound sentences ("I live in Paris and work as a teacher" is two facts).
- Write each fact in the third person about the user ("Lives in Paris", "Works as a teacher").
- Keep names, places, dates and numbers exactly as given.
- Skip greetings, questions, small talk and anything transient.
- If nothing is worth remembering, return an empty list.
- Optionally give a confidence between 0 and 1 (explicit statements 0.9+, implied 0.7-0.9).

Output JSON only:
{"facts": ["Lives in Paris", {"text": "Works as a teacher", "confidence": 0.95}]}`;

export interface ExtractOptions {
  /** Originating message id stamped on every fact */
  sourceRef: string;
  signal?: AbortSignal;
  /** Confidence for facts whose payload carries none */
  defaultConfidence?: number;
  now?: () => Date;
}

/**
 * Outcome of parsing one model response. `null` means no recognizable
 * payload at all, as opposed to a payload with an empty list.
 */
export function parseFactsResponse(raw: string): ParsedFact[] | null {
  if (!raw || raw.trim().length === 0) return null;
  return parseJsonPayload(raw, readFactsPayload);
}

/** Trim, drop empties, drop case/whitespace duplicates (first occurrence wins). */
export function cleanFacts(facts: ParsedFact[]): ParsedFact[] {
  const seen = new Set<string>();
  const out: ParsedFact[] = [];
  for (const fact of facts) {
    const text = fact.text.trim();
    if (text.length === 0) continue;
    const key = normalizeFactText(text);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    out.push({ ...fact, text });
  }
  return out;
}

function reportDegraded(err: ExtractionDegraded): void {
  log.warn(`extraction degraded [${err.code}]: ${err.message}`);
}

export class FactExtractor {
  constructor(
    private readonly model: GenerativeModel,
    private readonly diagnostics: DiagnosticsSink,
    private readonly retryPolicy: RetryPolicy,
  ) {}

  /**
   * Never throws for model or parse problems: those degrade to an empty
   * list. Only cancellation propagates.
   */
  async extract(text: string, ownerId: string, options: ExtractOptions): Promise<Fact[]> {
    if (text.trim().length === 0) {
      log.debug("extraction skipped: empty input");
      return [];
    }

    let raw: string | null = null;
    try {
      raw = await withRetry(
        () =>
          this.model.generate(
            { system: FACT_EXTRACTION_INSTRUCTIONS, user: `Input:\n${text}` },
            { temperature: 0.1, maxTokens: 1024, signal: options.signal, operation: "extraction" },
          ),
        this.retryPolicy,
        { operation: "extraction", signal: options.signal },
      );
    } catch (err) {
      if (options.signal?.aborted) throw err;
      reportDegraded(new ExtractionDegraded(`model call failed: ${err instanceof Error ? err.message : String(err)}`, err));
    }

    let parsed: ParsedFact[] = [];
    if (raw !== null) {
      const payload = parseFactsResponse(raw);
      if (payload === null) {
        reportDegraded(new ExtractionDegraded(`no structured payload in model output (length=${raw.length})`));
      } else {
        parsed = payload;
      }
    }

    const cleaned = cleanFacts(parsed);
    if (cleaned.length === 0) {
      this.diagnostics.emit({
        kind: "empty_extraction",
        ownerId,
        sourceRef: options.sourceRef,
        sourceMessage: text,
        rawOutput: raw,
        factCount: 0,
      });
      log.info(`extraction produced 0 facts for owner=${ownerId} ref=${options.sourceRef}`);
      return [];
    }

    const extractedAt = (options.now?.() ?? new Date()).toISOString();
    const defaultConfidence = options.defaultConfidence ?? 0.8;
    log.debug(`extracted ${cleaned.length} facts for owner=${ownerId}`);
    return cleaned.map((fact) => ({
      text: fact.text,
      sourceMessage: text,
      sourceRef: options.sourceRef,
      ownerId,
      extractedAt,
      confidence: fact.confidence ?? defaultConfidence,
    }));
  }
}
