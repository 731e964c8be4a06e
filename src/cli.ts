import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { parseConfig } from "./config.js";
import { createMemoryEngine, type MemoryEngine } from "./engine.js";
import { initLogger, type LoggerBackend } from "./logger.js";
import type { EngineConfig, MemoryRecord, MemoryStatus, ScoredRecord } from "./types.js";

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  io?: CliIo;
  /** Builds the engine for a parsed config; tests inject stub collaborators here. */
  openEngine?: (config: EngineConfig) => MemoryEngine;
  logger?: LoggerBackend;
}

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

const STATUSES: readonly MemoryStatus[] = ["active", "superseded", "archived"];

// stdout carries JSON only; diagnostics go to stderr.
const stderrLogger: LoggerBackend = {
  debug: (...args) => console.error(...args),
  info: (...args) => console.error(...args),
  warn: (...args) => console.error(...args),
  error: (...args) => console.error(...args),
};

function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) throw new InvalidArgumentError("limit must be a positive integer");
  return n;
}

function parseStatus(value: string): MemoryStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new InvalidArgumentError(`status must be one of ${STATUSES.join(", ")}`);
  return status;
}

/** Record as printed: the vector is reduced to its length. */
export function presentRecord(record: MemoryRecord): Omit<MemoryRecord, "embedding"> & { embeddingDimensions: number } {
  const { embedding, ...rest } = record;
  return { ...rest, embeddingDimensions: embedding.length };
}

function presentHit(hit: ScoredRecord) {
  return {
    id: hit.record.id,
    content: hit.record.content,
    similarity: Number(hit.similarity.toFixed(4)),
    confidence: hit.record.confidence,
    updatedAt: hit.record.updatedAt,
  };
}

async function loadConfig(options: GlobalOptions): Promise<EngineConfig> {
  let fileConfig: unknown = {};
  if (options.config) {
    const raw = await readFile(options.config, "utf-8");
    fileConfig = JSON.parse(raw);
  }
  const base = fileConfig && typeof fileConfig === "object" && !Array.isArray(fileConfig) ? fileConfig : {};
  return parseConfig(options.debug ? { ...base, debug: true } : base);
}

export function buildProgram(deps: CliDeps = {}): Command {
  const io: CliIo = deps.io ?? {
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
  };
  const openEngine = deps.openEngine ?? ((config: EngineConfig) => createMemoryEngine(config));
  const logger = deps.logger ?? stderrLogger;

  const program = new Command();
  program
    .name("memweave")
    .description("Reconcile free-text facts into long-term memory")
    .option("--config <file>", "JSON config file")
    .option("--debug", "Verbose logging on stderr");

  async function withEngine(run: (engine: MemoryEngine) => Promise<unknown>): Promise<void> {
    const config = await loadConfig(program.opts<GlobalOptions>());
    initLogger(logger, config.debug);
    const engine = openEngine(config);
    try {
      const result = await run(engine);
      if (result !== undefined) io.out(JSON.stringify(result, null, 2));
    } finally {
      await engine.close();
    }
  }

  program
    .command("add")
    .description("Extract facts from text and reconcile them into memory")
    .requiredOption("--owner <id>", "Owner the memories belong to")
    .option("--message-id <id>", "Originating message id (generated when omitted)")
    .argument("<text...>", "Message text")
    .action(async (text: string[], opts: { owner: string; messageId?: string }) => {
      await withEngine((engine) =>
        engine.pipeline.submit({
          ownerId: opts.owner,
          text: text.join(" "),
          ...(opts.messageId ? { messageId: opts.messageId } : {}),
        }),
      );
    });

  program
    .command("search")
    .description("Find the memories closest to a query")
    .requiredOption("--owner <id>", "Owner to search")
    .option("--limit <n>", "Maximum results", parseLimit, 5)
    .argument("<query...>", "Query text")
    .action(async (query: string[], opts: { owner: string; limit: number }) => {
      await withEngine(async (engine) => {
        const hits = await engine.pipeline.search(opts.owner, query.join(" "), opts.limit);
        return hits.map(presentHit);
      });
    });

  program
    .command("show")
    .description("Print one memory with its history")
    .requiredOption("--owner <id>", "Owner of the memory")
    .argument("<memoryId>", "Memory id")
    .action(async (memoryId: string, opts: { owner: string }) => {
      await withEngine(async (engine) => {
        const record = await engine.pipeline.get(opts.owner, memoryId);
        if (!record) {
          io.err(`memory not found: ${memoryId}`);
          process.exitCode = 1;
          return undefined;
        }
        return presentRecord(record);
      });
    });

  program
    .command("list")
    .description("List an owner's memories")
    .requiredOption("--owner <id>", "Owner to list")
    .option("--status <status>", "Only records with this status", parseStatus)
    .action(async (opts: { owner: string; status?: MemoryStatus }) => {
      await withEngine(async (engine) => {
        const records = await engine.pipeline.list(opts.owner, opts.status ? { status: opts.status } : {});
        return records.map(presentRecord);
      });
    });

  return program;
}
