import path from "node:path";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { log } from "./logger.js";

export type DiagnosticEvent =
  | {
      kind: "empty_extraction";
      ownerId: string;
      sourceRef: string;
      sourceMessage: string;
      /** Raw model output, or null when the model call itself failed */
      rawOutput: string | null;
      factCount: 0;
    }
  | {
      kind: "fact_failed";
      ownerId: string;
      sourceRef: string;
      fact: string;
      code: string;
      message: string;
    };

/**
 * Observability boundary. `emit` is fire-and-forget: it never throws and the
 * pipeline never waits on it.
 */
export interface DiagnosticsSink {
  emit(event: DiagnosticEvent): void;
  flush(): Promise<void>;
}

export class NoopDiagnosticsSink implements DiagnosticsSink {
  emit(): void {}
  async flush(): Promise<void> {}
}

/** Collects events in memory; used by tests and embedders that forward events elsewhere. */
export class MemoryDiagnosticsSink implements DiagnosticsSink {
  readonly events: DiagnosticEvent[] = [];

  emit(event: DiagnosticEvent): void {
    this.events.push(event);
  }

  async flush(): Promise<void> {}
}

export interface FileDiagnosticsOptions {
  filePath: string;
  maxBytes: number;
  /** Rotated files kept as <file>.1 .. <file>.N */
  backups: number;
  now?: () => Date;
}

/**
 * Appends one JSON line per event. Writes are chained so lines never
 * interleave; when the file would pass `maxBytes` it is rotated first.
 */
export class FileDiagnosticsSink implements DiagnosticsSink {
  private pending: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(private readonly options: FileDiagnosticsOptions) {
    this.now = options.now ?? (() => new Date());
  }

  emit(event: DiagnosticEvent): void {
    const line = JSON.stringify({ at: this.now().toISOString(), ...event }) + "\n";
    this.pending = this.pending
      .then(() => this.write(line))
      .catch((err) => {
        log.warn(`diagnostics: failed to write ${event.kind} event: ${err instanceof Error ? err.message : String(err)}`);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private async write(line: string): Promise<void> {
    const { filePath } = this.options;
    await mkdir(path.dirname(filePath), { recursive: true });
    const size = await currentSize(filePath);
    if (size > 0 && size + Buffer.byteLength(line) > this.options.maxBytes) {
      await this.rotate();
    }
    await appendFile(filePath, line, "utf-8");
  }

  private async rotate(): Promise<void> {
    const { filePath, backups } = this.options;
    if (backups <= 0) {
      await rm(filePath, { force: true });
      return;
    }
    await rm(`${filePath}.${backups}`, { force: true });
    for (let i = backups - 1; i >= 1; i--) {
      try {
        await rename(`${filePath}.${i}`, `${filePath}.${i + 1}`);
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    await rename(filePath, `${filePath}.1`);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function currentSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch (err) {
    if (isMissing(err)) return 0;
    throw err;
  }
}
