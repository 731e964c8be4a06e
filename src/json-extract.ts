/**
 * Model output rarely arrives as bare JSON. The payload may sit in a fenced
 * block, follow a sentence of prose, or come after an example the model
 * echoed back. `parseJsonPayload` walks the candidate readings in order and
 * hands each decoded value to the caller, who decides whether it is the one.
 */

const MAX_SCAN_CHARS = 100_000;
const MAX_CANDIDATES = 32;

const FENCE = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;

const CLOSER: Readonly<Record<string, string>> = { "{": "}", "[": "]" };

/** Bodies of every fenced block, in order. */
function* fencedBodies(text: string): Generator<string> {
  for (const match of text.matchAll(FENCE)) {
    if (match[1] !== undefined) yield match[1];
  }
}

/**
 * Top-level `{...}` and `[...]` spans, found with a bracket stack. String
 * literals are skipped, so braces quoted inside a value do not count. A
 * mismatched closer abandons the span. A span still open at the end of the
 * text is retried from just after its opener, which recovers a payload that
 * follows a stray bracket.
 */
function* bracketSpans(text: string): Generator<string> {
  let from = 0;
  for (let pass = 0; pass < MAX_CANDIDATES && from < text.length; pass++) {
    const stack: string[] = [];
    let start = -1;
    let inString = false;
    let escaped = false;

    for (let i = from; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      const opens = CLOSER[ch];
      if (stack.length === 0) {
        if (opens) {
          stack.push(opens);
          start = i;
        }
      } else if (ch === '"') {
        inString = true;
      } else if (opens) {
        stack.push(opens);
      } else if (ch === "}" || ch === "]") {
        if (stack.pop() !== ch) {
          stack.length = 0;
        } else if (stack.length === 0) {
          yield text.slice(start, i + 1);
        }
      }
    }

    if (stack.length === 0) return;
    from = start + 1;
  }
}

/**
 * Every reading worth a JSON.parse, best first and without repeats: the whole
 * output, then fenced bodies, then bracket spans.
 */
export function* jsonCandidates(text: string): Generator<string> {
  const scanned = text.slice(0, MAX_SCAN_CHARS);
  const seen = new Set<string>();
  const strategies: Array<Iterable<string>> = [[scanned], fencedBodies(scanned), bracketSpans(scanned)];

  for (const strategy of strategies) {
    for (const raw of strategy) {
      const candidate = raw.trim();
      if (candidate.length === 0 || seen.has(candidate)) continue;
      seen.add(candidate);
      yield candidate;
      if (seen.size >= MAX_CANDIDATES) return;
    }
  }
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

/** First candidate that decodes into something `accept` takes, else null. */
export function parseJsonPayload<T>(text: string, accept: (value: unknown) => T | null): T | null {
  for (const candidate of jsonCandidates(text)) {
    const parsed = tryParse(candidate);
    if (!parsed.ok) continue;
    const accepted = accept(parsed.value);
    if (accepted !== null) return accepted;
  }
  return null;
}
