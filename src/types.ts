export type MemoryStatus = "active" | "superseded" | "archived";

/**
 * Why a history entry was written. `merged-from:<id>` carries an absorbed
 * record's content; `merged-fact` carries an incoming fact the survivor's
 * longer text outlived.
 */
export type HistoryReason = "updated" | "merged" | "merged-fact" | `merged-from:${string}`;

export interface HistoryEntry {
  content: string;
  /** ISO 8601: when this content stopped being current */
  updatedAt: string;
  reason: HistoryReason;
}

/**
 * A candidate statement pulled out of one message. Lives only for the
 * duration of a submission.
 */
export interface Fact {
  text: string;
  sourceMessage: string;
  /** Originating message id */
  sourceRef: string;
  ownerId: string;
  /** ISO 8601 */
  extractedAt: string;
  /** 0-1 */
  confidence: number;
}

export interface MemoryRecord {
  id: string;
  ownerId: string;
  content: string;
  embedding: number[];
  /** 0-1 */
  confidence: number;
  status: MemoryStatus;
  createdAt: string;
  updatedAt: string;
  history: HistoryEntry[];
  sourceRefs: string[];
  /** Set when status is superseded: the record that won over this one */
  supersededBy?: string;
  /** Set with `supersededBy`: whether this record lost a merge or a conflict */
  supersededReason?: SupersededReason;
  metadata: Record<string, unknown>;
  /** Bumped on every mutation */
  version: number;
}

export interface ScoredRecord {
  record: MemoryRecord;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}

export type ConflictReason = "conflict:lower-confidence" | "conflict:recency";

export type SupersededReason = "merged" | ConflictReason;

export type Decision =
  | {
      action: "CREATE";
      /** Present when the new fact wins a conflict against existing records */
      supersedes?: { ids: string[]; reason: ConflictReason };
    }
  | { action: "UPDATE"; target: MemoryRecord }
  | {
      action: "MERGE";
      survivor: MemoryRecord;
      absorbed: MemoryRecord[];
      /** Whose text the survivor carries after the merge */
      keep: "fact" | "survivor";
    }
  | {
      action: "IGNORE";
      reason: "exact duplicate" | ConflictReason;
      /** The memory that made this fact redundant or won the conflict */
      targetId: string;
    };

export interface OutcomeError {
  code: string;
  message: string;
}

export type FactOutcome =
  | { status: "created"; fact: string; id: string; supersededIds?: string[] }
  | { status: "updated"; fact: string; id: string }
  | { status: "merged"; fact: string; survivorId: string; absorbedIds: string[] }
  | { status: "ignored"; fact: string; reason: string; targetId?: string; alternativeId?: string }
  | { status: "failed"; fact: string; error: OutcomeError };

export type OutcomeStatus = FactOutcome["status"];

export interface Submission {
  ownerId: string;
  text: string;
  /** Stored on every record created from this submission */
  metadata?: Record<string, unknown>;
  /** Originating message id; generated when absent */
  messageId?: string;
}

export interface SubmissionReport {
  ownerId: string;
  sourceRef: string;
  factsExtracted: number;
  /** One entry per extracted fact, in extraction order */
  outcomes: FactOutcome[];
  failures: Array<Extract<FactOutcome, { status: "failed" }>>;
  counts: Record<OutcomeStatus, number>;
}

export interface EngineConfig {
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  /** Chat model used for extraction and contradiction checks */
  model: string;
  embeddingModel: string;
  embeddingDimensions: number;
  /** Max texts per embeddings request */
  embeddingBatchSize: number;
  dbPath: string;
  // Similarity / reconciliation
  topK: number;
  /** Cosine similarity a memory must reach to count as related */
  matchThreshold: number;
  /** Cosine similarity above which a textually equal memory is a duplicate */
  duplicateThreshold: number;
  /** Confidence gap beyond which a conflict is settled by confidence instead of recency */
  conflictConfidenceMargin: number;
  /** Confidence given to facts whose payload carries none */
  defaultConfidence: number;
  /** Fraction of the remaining distance to 1.0 added on UPDATE */
  updateConfidenceBoost: number;
  conflictDetectionEnabled: boolean;
  // Boundary calls
  modelTimeoutMs: number;
  embeddingTimeoutMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Facts of one submission processed in parallel */
  factConcurrency: number;
  // Observability
  diagnosticsFile: string | undefined;
  diagnosticsMaxBytes: number;
  diagnosticsBackups: number;
  debug: boolean;
}
