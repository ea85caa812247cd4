/**
 * Stderr logger with verbosity control.
 * stdout belongs to the JSON-RPC stream, so nothing here ever writes to it.
 */

const PREFIX = "sparse-proxy";

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`[${PREFIX}] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[${PREFIX} WARN] ${message}`, ...args);
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[${PREFIX} ERROR] ${message}`, ...args);
}

export interface ScopedLogger {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger whose lines carry a scope (usually a backend name), e.g.
 * `[sparse-proxy:memory WARN] ...`.
 */
export function scoped(scope: string): ScopedLogger {
  const tag = `${PREFIX}:${scope}`;
  return {
    log(message, ...args) {
      if (verbose) {
        console.error(`[${tag}] ${message}`, ...args);
      }
    },
    warn(message, ...args) {
      console.error(`[${tag} WARN] ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`[${tag} ERROR] ${message}`, ...args);
    },
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
