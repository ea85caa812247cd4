/**
 * Public façade. Wires the pool, registry and gateway together and owns the
 * caller-visible lifecycle: start, concurrent calls, discovery, shutdown.
 */

import { createOnboardingBackend } from "../builtin/onboarding";
import type { JsonRpcRequest, JsonRpcResponse } from "../protocol/messages";
import type { ProcessLauncher } from "./backend-connection";
import { BackendPool, type DescriptorDiff, type RefreshReport } from "./backend-pool";
import { ShutdownError } from "./errors";
import { SparseGateway } from "./sparse-gateway";
import type { ToolRegistry } from "./tool-registry";
import type { Backend, BackendDescriptor } from "./types";
import { describeError, log, warn } from "../util/logger";

export interface RefreshPolicy {
  onStartup: boolean;
  onListChanged: boolean;
  /** Re-poll every backend on this interval; null disables polling. */
  intervalMs: number | null;
}

export const DEFAULT_REFRESH_POLICY: RefreshPolicy = {
  onStartup: true,
  onListChanged: true,
  intervalMs: null,
};

export interface SparseProxyOptions {
  sparseMode?: boolean;
  /** `true` hosts the default built-ins, or pass your own. */
  builtins?: boolean | Backend[];
  timeoutMs?: number;
  handshakeTimeoutMs?: number;
  shutdownGraceMs?: number;
  maxSegmentBytes?: number;
  refresh?: Partial<RefreshPolicy>;
  launch?: ProcessLauncher;
  createBackend?: (descriptor: BackendDescriptor) => Backend;
}

export class SparseProxy {
  readonly pool: BackendPool;
  readonly gateway: SparseGateway;
  private inflight = new Set<(err: Error) => void>();
  private descriptors: BackendDescriptor[] = [];
  private closing = false;
  private shutdownPromise: Promise<void> | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private nextCallId = 1;
  private readonly refreshPolicy: RefreshPolicy;
  private readonly graceMs?: number;

  constructor(options: SparseProxyOptions = {}) {
    this.refreshPolicy = { ...DEFAULT_REFRESH_POLICY, ...options.refresh };
    this.graceMs = options.shutdownGraceMs;

    const builtins = options.builtins === false
      ? []
      : Array.isArray(options.builtins)
      ? options.builtins
      : [createOnboardingBackend()];

    this.pool = new BackendPool({
      builtins,
      graceMs: options.shutdownGraceMs,
      refreshOnListChanged: this.refreshPolicy.onListChanged,
      createBackend: options.createBackend,
      connection: {
        requestTimeoutMs: options.timeoutMs,
        handshakeTimeoutMs: options.handshakeTimeoutMs,
        graceMs: options.shutdownGraceMs,
        maxSegmentBytes: options.maxSegmentBytes,
        launch: options.launch,
      },
    });
    this.gateway = new SparseGateway(this.pool, { sparseMode: options.sparseMode });
  }

  get registry(): ToolRegistry {
    return this.pool.registry;
  }

  async start(descriptors: BackendDescriptor[] = []): Promise<DescriptorDiff> {
    if (this.closing) throw new ShutdownError();
    this.descriptors = descriptors;
    const result = await this.pool.start(descriptors);

    if (this.refreshPolicy.onStartup) {
      await this.pool.broadcastRefresh();
    }
    if (this.refreshPolicy.intervalMs !== null && this.refreshPolicy.intervalMs > 0) {
      this.pollTimer = setInterval(() => {
        this.pool.broadcastRefresh().catch((err: unknown) => {
          warn(`Periodic refresh failed: ${describeError(err)}`);
        });
      }, this.refreshPolicy.intervalMs);
      this.pollTimer.unref();
    }
    return result;
  }

  /**
   * Run one caller request through the gateway. Calls are independent and
   * may overlap; each settles exactly once, with ShutdownError if shutdown
   * begins first.
   */
  call(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    if (this.closing) {
      return Promise.reject(new ShutdownError());
    }
    return new Promise<JsonRpcResponse>((resolve, reject) => {
      this.inflight.add(reject);
      void this.gateway
        .handle(request)
        .then(resolve, reject)
        .finally(() => {
          this.inflight.delete(reject);
        });
    });
  }

  /** Convenience wrapper for a single `tools/call`. */
  callTool(
    name: string,
    args: Record<string, unknown> = {},
    server?: string,
  ): Promise<JsonRpcResponse> {
    const params: Record<string, unknown> = { name, arguments: args };
    if (server !== undefined) params.server = server;
    return this.call({
      jsonrpc: "2.0",
      id: this.nextCallId++,
      method: "tools/call",
      params,
    });
  }

  listTools(): Promise<JsonRpcResponse> {
    return this.call({ jsonrpc: "2.0", id: this.nextCallId++, method: "tools/list" });
  }

  /** Query the catalog. Never touches a backend. */
  discover(path: string): unknown[] {
    return this.registry.query(path);
  }

  refresh(): Promise<RefreshReport> {
    return this.pool.broadcastRefresh();
  }

  /** Move to a new descriptor set, diffing against the current one. */
  async applyConfig(descriptors: BackendDescriptor[]): Promise<DescriptorDiff> {
    if (this.closing) throw new ShutdownError();
    const previous = this.descriptors;
    this.descriptors = descriptors;
    return this.pool.applyDescriptors(previous, descriptors);
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  /**
   * Fail every pending call with ShutdownError, then terminate all backends.
   * Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    this.closing = true;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    const reason = new ShutdownError();
    const pending = [...this.inflight];
    this.inflight.clear();
    for (const reject of pending) reject(reason);
    if (pending.length > 0) {
      log(`Cancelled ${pending.length} pending call(s)`);
    }

    this.shutdownPromise = this.pool.shutdown({ graceMs: this.graceMs, reason });
    return this.shutdownPromise;
  }
}
