export interface LoggerBackend {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const PREFIX = "[memweave]";

let backend: LoggerBackend = console;
let debugEnabled = false;

/**
 * Install the backend every module logs through. Call once at startup and
 * again after config is parsed if the debug flag changes.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  backend = next;
  debugEnabled = debug;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function format(msg: unknown): string {
  return typeof msg === "string" ? `${PREFIX} ${msg}` : `${PREFIX} ${String(msg)}`;
}

export const log = {
  debug(msg: unknown, ...rest: unknown[]): void {
    if (!debugEnabled) return;
    backend.debug(format(msg), ...rest);
  },
  info(msg: unknown, ...rest: unknown[]): void {
    backend.info(format(msg), ...rest);
  },
  warn(msg: unknown, ...rest: unknown[]): void {
    backend.warn(format(msg), ...rest);
  },
  error(msg: unknown, ...rest: unknown[]): void {
    backend.error(format(msg), ...rest);
  },
};
