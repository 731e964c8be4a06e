import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";
import { ConcurrentModification, DuplicateId, InvariantViolation, StoreUnavailable, isTransient } from "./errors.js";
import { log } from "./logger.js";
import { compareScored, cosineSimilarity } from "./normalize.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry.js";
import type { HistoryEntry, HistoryReason, MemoryRecord, MemoryStatus, ScoredRecord, SupersededReason } from "./types.js";

/** Fields a write may change. `id`, `ownerId` and `createdAt` are immutable. */
export interface RecordMutation {
  content?: string;
  embedding?: number[];
  confidence?: number;
  status?: MemoryStatus;
  /** Full replacement; must keep every existing entry as a prefix */
  history?: HistoryEntry[];
  sourceRefs?: string[];
  supersededBy?: string;
  supersededReason?: SupersededReason;
  metadata?: Record<string, unknown>;
  updatedAt?: string;
}

export type WriteOp =
  | { kind: "insert"; record: MemoryRecord }
  | { kind: "update"; ownerId: string; id: string; mutation: RecordMutation; expectedVersion?: number };

/**
 * Persistence boundary. Every query is partitioned by owner; the store
 * enforces record invariants but never decides a lifecycle transition.
 */
export interface MemoryStore {
  insert(record: MemoryRecord): Promise<void>;
  get(ownerId: string, id: string): Promise<MemoryRecord | null>;
  update(ownerId: string, id: string, mutation: RecordMutation, expectedVersion?: number): Promise<MemoryRecord>;
  /** Active records only, best first. */
  nearest(ownerId: string, vector: number[], k: number, minSimilarity?: number): Promise<ScoredRecord[]>;
  list(ownerId: string, options?: { status?: MemoryStatus }): Promise<MemoryRecord[]>;
  /** Applies every op or none. */
  commit(ops: WriteOp[]): Promise<void>;
  close(): void;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS memories (
  id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding TEXT NOT NULL,
  confidence REAL NOT NULL,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  history TEXT NOT NULL,
  source_refs TEXT NOT NULL,
  superseded_by TEXT,
  superseded_reason TEXT,
  metadata TEXT NOT NULL,
  version INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_memories_owner_status ON memories(owner_id, status);
`;

interface MemoryRow {
  id: string;
  owner_id: string;
  content: string;
  embedding: string;
  confidence: number;
  status: string;
  created_at: string;
  updated_at: string;
  history: string;
  source_refs: string;
  superseded_by: string | null;
  superseded_reason: string | null;
  metadata: string;
  version: number;
}

const FIXED_REASONS: ReadonlySet<string> = new Set(["updated", "merged", "merged-fact"]);

export function isHistoryReason(value: string): value is HistoryReason {
  return FIXED_REASONS.has(value) || (value.startsWith("merged-from:") && value.length > "merged-from:".length);
}

const StatusSchema = z.enum(["active", "superseded", "archived"]);
const SupersededReasonSchema = z.enum(["merged", "conflict:lower-confidence", "conflict:recency"]);
const EmbeddingSchema = z.array(z.number());
const HistorySchema = z.array(
  z.object({
    content: z.string(),
    updatedAt: z.string(),
    reason: z.custom<HistoryReason>((v) => typeof v === "string" && isHistoryReason(v)),
  }),
);
const SourceRefsSchema = z.array(z.string());
const MetadataSchema = z.record(z.unknown());

function decodeColumn<T>(schema: z.ZodType<T>, raw: string, column: string, id: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new InvariantViolation(`memory ${id}: stored ${column} is not valid JSON`);
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvariantViolation(`memory ${id}: stored ${column} has an unexpected shape`);
  }
  return parsed.data;
}

function rowToRecord(row: MemoryRow): MemoryRecord {
  const status = StatusSchema.safeParse(row.status);
  if (!status.success) {
    throw new InvariantViolation(`memory ${row.id}: unknown status ${row.status}`);
  }
  let supersededReason: SupersededReason | undefined;
  if (row.superseded_reason !== null) {
    const reason = SupersededReasonSchema.safeParse(row.superseded_reason);
    if (!reason.success) {
      throw new InvariantViolation(`memory ${row.id}: unknown superseded reason ${row.superseded_reason}`);
    }
    supersededReason = reason.data;
  }
  return {
    id: row.id,
    ownerId: row.owner_id,
    content: row.content,
    embedding: decodeColumn(EmbeddingSchema, row.embedding, "embedding", row.id),
    confidence: row.confidence,
    status: status.data,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    history: decodeColumn(HistorySchema, row.history, "history", row.id),
    sourceRefs: decodeColumn(SourceRefsSchema, row.source_refs, "sourceRefs", row.id),
    ...(row.superseded_by ? { supersededBy: row.superseded_by } : {}),
    ...(supersededReason ? { supersededReason } : {}),
    metadata: decodeColumn(MetadataSchema, row.metadata, "metadata", row.id),
    version: row.version,
  };
}

function recordToRow(record: MemoryRecord): MemoryRow {
  return {
    id: record.id,
    owner_id: record.ownerId,
    content: record.content,
    embedding: JSON.stringify(record.embedding),
    confidence: record.confidence,
    status: record.status,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    history: JSON.stringify(record.history),
    source_refs: JSON.stringify(record.sourceRefs),
    superseded_by: record.supersededBy ?? null,
    superseded_reason: record.supersededReason ?? null,
    metadata: JSON.stringify(record.metadata),
    version: record.version,
  };
}

function assertValidEmbedding(id: string, embedding: number[]): void {
  if (embedding.length === 0 || !embedding.every((n) => Number.isFinite(n))) {
    throw new InvariantViolation(`memory ${id}: embedding must be a non-empty vector of finite numbers`);
  }
}

function sameEntry(a: HistoryEntry, b: HistoryEntry): boolean {
  return a.content === b.content && a.updatedAt === b.updatedAt && a.reason === b.reason;
}

/**
 * Apply a mutation to a record, enforcing the invariants every write must
 * keep. Returns the next version of the record.
 */
export function applyMutation(current: MemoryRecord, mutation: RecordMutation, now: string): MemoryRecord {
  const contentChanges = mutation.content !== undefined && mutation.content !== current.content;
  if (contentChanges && mutation.embedding === undefined) {
    throw new InvariantViolation(`memory ${current.id}: content changed without a new embedding`);
  }
  if (mutation.embedding !== undefined) assertValidEmbedding(current.id, mutation.embedding);

  if (mutation.history !== undefined) {
    const next = mutation.history;
    const keepsPrefix =
      next.length >= current.history.length && current.history.every((entry, i) => {
        const other = next[i];
        return other !== undefined && sameEntry(entry, other);
      });
    if (!keepsPrefix) {
      throw new InvariantViolation(`memory ${current.id}: history may only grow`);
    }
  }

  if (mutation.confidence !== undefined && (mutation.confidence < 0 || mutation.confidence > 1)) {
    throw new InvariantViolation(`memory ${current.id}: confidence ${mutation.confidence} outside [0, 1]`);
  }

  return {
    ...current,
    content: mutation.content ?? current.content,
    embedding: mutation.embedding ?? current.embedding,
    confidence: mutation.confidence ?? current.confidence,
    status: mutation.status ?? current.status,
    history: mutation.history ?? current.history,
    sourceRefs: mutation.sourceRefs ?? current.sourceRefs,
    ...(mutation.supersededBy !== undefined ? { supersededBy: mutation.supersededBy } : {}),
    ...(mutation.supersededReason !== undefined ? { supersededReason: mutation.supersededReason } : {}),
    metadata: mutation.metadata ?? current.metadata,
    updatedAt: mutation.updatedAt ?? now,
    version: current.version + 1,
  };
}

function sqliteCode(err: unknown): string | undefined {
  return err instanceof Database.SqliteError ? err.code : undefined;
}

function isBusy(err: unknown): boolean {
  const code = sqliteCode(err);
  return code !== undefined && (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED"));
}

export interface SqliteStoreOptions {
  /** File path, or ":memory:" */
  path: string;
  retryPolicy?: RetryPolicy;
  /** Milliseconds SQLite itself waits on a lock before reporting busy */
  busyTimeoutMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export class SqliteMemoryStore implements MemoryStore {
  private readonly db: Database.Database;
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => Date;
  private readonly sleep?: (ms: number) => Promise<void>;

  private readonly selectOne: Database.Statement<[string, string], MemoryRow>;
  private readonly selectByOwnerStatus: Database.Statement<[string, string], MemoryRow>;
  private readonly selectByOwner: Database.Statement<[string], MemoryRow>;
  private readonly insertRow: Database.Statement<[MemoryRow], unknown>;
  private readonly updateRow: Database.Statement<[MemoryRow], unknown>;

  constructor(options: SqliteStoreOptions) {
    if (options.path !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(options.path)), { recursive: true });
    }
    this.db = new Database(options.path);
    this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(options.busyTimeoutMs ?? 2_000))}`);
    this.db.exec("PRAGMA journal_mode=WAL;");
    this.db.exec(SCHEMA_SQL);

    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;

    this.selectOne = this.db.prepare<[string, string], MemoryRow>(
      "SELECT * FROM memories WHERE owner_id = ? AND id = ?",
    );
    this.selectByOwnerStatus = this.db.prepare<[string, string], MemoryRow>(
      "SELECT * FROM memories WHERE owner_id = ? AND status = ? ORDER BY created_at, id",
    );
    this.selectByOwner = this.db.prepare<[string], MemoryRow>(
      "SELECT * FROM memories WHERE owner_id = ? ORDER BY created_at, id",
    );
    this.insertRow = this.db.prepare<[MemoryRow], unknown>(
      `INSERT INTO memories (id, owner_id, content, embedding, confidence, status, created_at, updated_at,
         history, source_refs, superseded_by, superseded_reason, metadata, version)
       VALUES (@id, @owner_id, @content, @embedding, @confidence, @status, @created_at, @updated_at,
         @history, @source_refs, @superseded_by, @superseded_reason, @metadata, @version)`,
    );
    this.updateRow = this.db.prepare<[MemoryRow], unknown>(
      `UPDATE memories SET content = @content, embedding = @embedding, confidence = @confidence,
         status = @status, updated_at = @updated_at, history = @history, source_refs = @source_refs,
         superseded_by = @superseded_by, superseded_reason = @superseded_reason, metadata = @metadata,
         version = @version
       WHERE id = @id AND owner_id = @owner_id`,
    );
    log.debug(`store opened at ${options.path}`);
  }

  async insert(record: MemoryRecord): Promise<void> {
    await this.retrying("insert", () => this.insertSync(record));
  }

  async get(ownerId: string, id: string): Promise<MemoryRecord | null> {
    return this.retrying("get", () => {
      const row = this.selectOne.get(ownerId, id);
      return row ? rowToRecord(row) : null;
    });
  }

  /** Not retried: a caller without `expectedVersion` could apply it twice. */
  async update(ownerId: string, id: string, mutation: RecordMutation, expectedVersion?: number): Promise<MemoryRecord> {
    return this.guard(() => this.db.transaction(() => this.updateSync(ownerId, id, mutation, expectedVersion))());
  }

  async nearest(ownerId: string, vector: number[], k: number, minSimilarity = -1): Promise<ScoredRecord[]> {
    if (k <= 0) return [];
    return this.retrying("nearest", () => {
      const scored: ScoredRecord[] = [];
      for (const row of this.selectByOwnerStatus.iterate(ownerId, "active")) {
        const record = rowToRecord(row);
        const similarity = cosineSimilarity(vector, record.embedding);
        if (similarity >= minSimilarity) scored.push({ record, similarity });
      }
      scored.sort(compareScored);
      return scored.slice(0, k);
    });
  }

  async list(ownerId: string, options: { status?: MemoryStatus } = {}): Promise<MemoryRecord[]> {
    return this.retrying("list", () => {
      const rows = options.status
        ? this.selectByOwnerStatus.all(ownerId, options.status)
        : this.selectByOwner.all(ownerId);
      return rows.map(rowToRecord);
    });
  }

  async commit(ops: WriteOp[]): Promise<void> {
    if (ops.length === 0) return;
    const apply = this.db.transaction((batch: WriteOp[]) => {
      for (const op of batch) {
        if (op.kind === "insert") {
          this.insertSync(op.record);
        } else {
          this.updateSync(op.ownerId, op.id, op.mutation, op.expectedVersion);
        }
      }
    });
    await this.retrying("commit", () => apply(ops));
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private insertSync(record: MemoryRecord): void {
    assertValidEmbedding(record.id, record.embedding);
    try {
      this.insertRow.run(recordToRow(record));
    } catch (err) {
      const code = sqliteCode(err);
      if (code === "SQLITE_CONSTRAINT_PRIMARYKEY" || code === "SQLITE_CONSTRAINT_UNIQUE") {
        throw new DuplicateId(record.id);
      }
      throw err;
    }
  }

  private updateSync(ownerId: string, id: string, mutation: RecordMutation, expectedVersion?: number): MemoryRecord {
    const row = this.selectOne.get(ownerId, id);
    if (!row) {
      throw new InvariantViolation(`memory ${id} does not exist for owner ${ownerId}`);
    }
    const current = rowToRecord(row);
    if (expectedVersion !== undefined && current.version !== expectedVersion) {
      throw new ConcurrentModification(id, expectedVersion, current.version);
    }
    const next = applyMutation(current, mutation, this.now().toISOString());
    this.updateRow.run(recordToRow(next));
    return next;
  }

  /** Translate lock contention into StoreUnavailable; everything else passes through. */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isBusy(err)) {
        throw new StoreUnavailable(`store busy: ${err instanceof Error ? err.message : String(err)}`, err);
      }
      throw err;
    }
  }

  private retrying<T>(operation: string, fn: () => T): Promise<T> {
    return withRetry(async () => this.guard(fn), this.retryPolicy, {
      operation: `store.${operation}`,
      isRetryable: isTransient,
      ...(this.sleep ? { sleep: this.sleep } : {}),
    });
  }
}
