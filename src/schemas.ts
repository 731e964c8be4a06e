import { z } from "zod";

/** Keys models use for the fact list, in lookup order. */
export const FACT_PAYLOAD_KEYS = ["facts", "fact", "items", "results", "memories", "statements"] as const;

const FACT_TEXT_KEYS = ["text", "content", "fact", "statement"] as const;

export const FactObjectSchema = z
  .object({
    text: z.string().optional(),
    content: z.string().optional(),
    fact: z.string().optional(),
    statement: z.string().optional(),
    // coerced per entry by coerceConfidence
    confidence: z.unknown(),
  })
  .passthrough();

export const FactEntrySchema = z.union([z.string(), FactObjectSchema]);

export type FactEntry = z.infer<typeof FactEntrySchema>;

export interface ParsedFact {
  text: string;
  confidence?: number;
}

/**
 * Scores above 1 and up to 100 are read as percentages; anything else finite
 * is clamped into [0, 1]. Non-numbers yield undefined.
 */
export function coerceConfidence(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  const scaled = value > 1 && value <= 100 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

function entryToFact(entry: FactEntry): ParsedFact | null {
  if (typeof entry === "string") return { text: entry };
  for (const key of FACT_TEXT_KEYS) {
    const value = entry[key];
    if (typeof value === "string") {
      const confidence = coerceConfidence(entry.confidence);
      return confidence === undefined ? { text: value } : { text: value, confidence };
    }
  }
  return null;
}

const PayloadObjectSchema = z.record(z.unknown());

function listToFacts(list: unknown[]): ParsedFact[] {
  const out: ParsedFact[] = [];
  for (const item of list) {
    const parsed = FactEntrySchema.safeParse(item);
    if (!parsed.success) continue;
    const fact = entryToFact(parsed.data);
    if (fact) out.push(fact);
  }
  return out;
}

/**
 * Accepts a decoded JSON value when it carries a fact list under one of the
 * recognized keys (or is itself a list). A single string under the key counts
 * as a one-element list. Returns null when the shape is not recognized, so
 * the caller can try the next candidate.
 */
export function readFactsPayload(value: unknown): ParsedFact[] | null {
  if (Array.isArray(value)) return listToFacts(value);
  const parsed = PayloadObjectSchema.safeParse(value);
  if (!parsed.success) return null;

  const record = parsed.data;
  for (const key of FACT_PAYLOAD_KEYS) {
    if (!(key in record)) continue;
    const facts = record[key];
    if (Array.isArray(facts)) return listToFacts(facts);
    if (typeof facts === "string") return facts.trim().length > 0 ? [{ text: facts }] : [];
  }
  return null;
}

export const ConflictVerdictSchema = z
  .object({
    contradictory: z.boolean().optional(),
    isContradiction: z.boolean().optional(),
    reason: z.string().optional().nullable(),
    reasoning: z.string().optional().nullable(),
  })
  .refine((v) => v.contradictory !== undefined || v.isContradiction !== undefined, {
    message: "verdict must carry a contradictory flag",
  });

export interface ConflictVerdict {
  contradictory: boolean;
  reason: string;
}

export function readConflictVerdict(value: unknown): ConflictVerdict | null {
  const parsed = ConflictVerdictSchema.safeParse(value);
  if (!parsed.success) return null;
  return {
    contradictory: parsed.data.contradictory ?? parsed.data.isContradiction ?? false,
    reason: parsed.data.reason ?? parsed.data.reasoning ?? "",
  };
}
