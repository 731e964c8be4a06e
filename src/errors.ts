/**
 * Error taxonomy for the reconciliation pipeline.
 *
 * `transient` marks conditions a bounded retry may clear (network, model
 * service or storage briefly unavailable). Everything else is definitive for
 * the call that raised it.
 */

export type MemoryErrorCode =
  | "EXTRACTION_DEGRADED"
  | "EMBEDDING_UNAVAILABLE"
  | "STORE_UNAVAILABLE"
  | "CONFLICT_CLASSIFICATION_DEGRADED"
  | "DUPLICATE_ID"
  | "MODEL_UNAVAILABLE"
  | "MODEL_REQUEST_REJECTED"
  | "INVARIANT_VIOLATION"
  | "CONCURRENT_MODIFICATION"
  | "SUBMISSION_CANCELLED"
  | "INTERNAL";

export class MemoryEngineError extends Error {
  readonly code: MemoryErrorCode;
  readonly transient: boolean;

  constructor(code: MemoryErrorCode, message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.transient = options.transient ?? false;
  }
}

/** Model output could not be turned into facts; recovered as an empty list. */
export class ExtractionDegraded extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super("EXTRACTION_DEGRADED", message, { cause });
  }
}

export class EmbeddingUnavailable extends MemoryEngineError {
  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super("EMBEDDING_UNAVAILABLE", message, { transient: options.transient ?? true, cause: options.cause });
  }
}

export class StoreUnavailable extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", message, { transient: true, cause });
  }
}

/** Contradiction check failed; the caller proceeds as if the facts were compatible. */
export class ConflictClassificationDegraded extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super("CONFLICT_CLASSIFICATION_DEGRADED", message, { cause });
  }
}

export class DuplicateId extends MemoryEngineError {
  readonly id: string;

  constructor(id: string) {
    super("DUPLICATE_ID", `memory id already exists: ${id}`);
    this.id = id;
  }
}

export class ModelUnavailable extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super("MODEL_UNAVAILABLE", message, { transient: true, cause });
  }
}

export class ModelRequestRejected extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super("MODEL_REQUEST_REJECTED", message, { cause });
  }
}

export class InvariantViolation extends MemoryEngineError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
  }
}

export class ConcurrentModification extends MemoryEngineError {
  constructor(id: string, expected: number, actual: number) {
    super("CONCURRENT_MODIFICATION", `memory ${id} changed underneath (expected v${expected}, found v${actual})`);
  }
}

export class SubmissionCancelled extends MemoryEngineError {
  constructor(message = "submission cancelled before this fact started") {
    super("SUBMISSION_CANCELLED", message);
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof MemoryEngineError && err.transient;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): MemoryErrorCode {
  return err instanceof MemoryEngineError ? err.code : "INTERNAL";
}
