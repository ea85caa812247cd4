/**
 * Correlation table for one backend: request id → waiting caller.
 *
 * Three parties settle entries: the read loop (response), the deadline timer
 * (timeout) and teardown (shutdown/crash). The event loop runs each of them to
 * completion, so whoever calls `settle` first removes the entry and every
 * later attempt finds nothing and returns false.
 */

import type { JsonRpcResponse, RequestId } from "../protocol/messages";

export interface PendingRequest {
  id: number;
  method: string;
  backend: string;
  createdAt: number;
  deadline: number;
}

type Outcome =
  | { ok: true; response: JsonRpcResponse; }
  | { ok: false; error: Error; };

interface Entry extends PendingRequest {
  resolve: (response: JsonRpcResponse) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

const MAX_ID = Number.MAX_SAFE_INTEGER;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export class PendingTable {
  private entries = new Map<number, Entry>();
  private nextId = 1;
  private readonly backend: string;

  constructor(backend: string) {
    this.backend = backend;
  }

  /**
   * Allocate an id not currently in flight and register a waiter for it.
   * `onExpire` builds the error used when the deadline passes first.
   */
  register(
    method: string,
    timeoutMs: number,
    onExpire: () => Error,
  ): { id: number; promise: Promise<JsonRpcResponse>; } {
    const id = this.allocateId();
    const createdAt = Date.now();
    const promise = new Promise<JsonRpcResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(id, { ok: false, error: onExpire() });
      }, Math.min(timeoutMs, MAX_TIMER_MS));

      this.entries.set(id, {
        id,
        method,
        backend: this.backend,
        createdAt,
        deadline: createdAt + timeoutMs,
        resolve,
        reject,
        timer,
      });
    });

    return { id, promise };
  }

  /** Deliver a response. Returns false when no entry matches (late/unknown id). */
  resolve(id: RequestId | null, response: JsonRpcResponse): boolean {
    if (typeof id !== "number") return false;
    return this.settle(id, { ok: true, response });
  }

  reject(id: number, error: Error): boolean {
    return this.settle(id, { ok: false, error });
  }

  /** Fail every entry, e.g. when the process dies. Returns how many were failed. */
  rejectAll(error: Error): number {
    const ids = [...this.entries.keys()];
    let count = 0;
    for (const id of ids) {
      if (this.settle(id, { ok: false, error })) count++;
    }
    return count;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): PendingRequest[] {
    return [...this.entries.values()].map(
      ({ id, method, backend, createdAt, deadline }) => ({
        id,
        method,
        backend,
        createdAt,
        deadline,
      }),
    );
  }

  private settle(id: number, outcome: Outcome): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    this.entries.delete(id);
    clearTimeout(entry.timer);
    if (outcome.ok) {
      entry.resolve(outcome.response);
    } else {
      entry.reject(outcome.error);
    }
    return true;
  }

  private allocateId(): number {
    while (this.entries.has(this.nextId)) {
      this.advance();
    }
    const id = this.nextId;
    this.advance();
    return id;
  }

  private advance(): void {
    this.nextId = this.nextId >= MAX_ID ? 1 : this.nextId + 1;
  }
}
