/**
 * Owns every backend (built-in and configured) and routes calls to them.
 * Error isolation: one backend failing to start, crashing or answering
 * garbage never affects the others or their catalog entries.
 */

import { z } from "zod";
import {
  BackendConnection,
  type BackendConnectionOptions,
  DEFAULT_GRACE_MS,
  methodNotFound,
} from "./backend-connection";
import {
  BackendUnavailableError,
  ShutdownError,
  UnknownToolError,
} from "./errors";
import { DEFAULT_SEPARATOR, isNamespaced, parseNamespacedTool } from "./namespace";
import { ToolRegistry, type BackendInfo } from "./tool-registry";
import type {
  Backend,
  BackendDescriptor,
  IncomingMessage,
  ToolInfo,
} from "./types";
import type { JsonRpcNotification } from "../protocol/messages";
import { describeError, error as logError, log, warn } from "../util/logger";

export const MAX_TOOL_PAGES = 100;

export const LIST_CHANGED = "notifications/tools/list_changed";

export interface Route {
  backend: Backend;
  toolName: string;
}

export interface RefreshReport {
  refreshed: string[];
  failed: Array<{ name: string; error: string; }>;
}

export interface DescriptorDiff {
  added: string[];
  removed: string[];
  changed: string[];
  failed: string[];
}

export type NotificationListener = (
  notification: JsonRpcNotification,
  backend: string,
) => void;

export interface BackendPoolOptions {
  registry?: ToolRegistry;
  builtins?: Backend[];
  connection?: BackendConnectionOptions;
  /** Builds the backend for a descriptor with a command. */
  createBackend?: (descriptor: BackendDescriptor) => Backend;
  separator?: string;
  graceMs?: number;
  /** Refresh a backend's tools when it sends tools/list_changed. */
  refreshOnListChanged?: boolean;
}

const toolInfoSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.string(), z.unknown()).default({ type: "object" }),
});

const toolsPageSchema = z.object({
  tools: z.array(z.unknown()).default([]),
  nextCursor: z.string().optional(),
});

export class BackendPool {
  readonly registry: ToolRegistry;
  private backends = new Map<string, Backend>();
  private builtins = new Map<string, Backend>();
  // Backends whose first launch failed; kept so calls fail as unavailable.
  private failed = new Map<string, Backend>();
  private starting = new Set<Backend>();
  private subscriptions = new Map<Backend, Array<() => void>>();
  private addTokens = new Map<string, number>();
  private refreshTokens = new Map<string, number>();
  private listeners = new Set<NotificationListener>();
  private nextToken = 1;
  private closing = false;
  private readonly separator: string;
  private readonly graceMs: number;
  private readonly refreshOnListChanged: boolean;
  private readonly createBackend: (descriptor: BackendDescriptor) => Backend;

  constructor(options: BackendPoolOptions = {}) {
    this.registry = options.registry ?? new ToolRegistry({ separator: options.separator });
    this.separator = options.separator ?? DEFAULT_SEPARATOR;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.refreshOnListChanged = options.refreshOnListChanged ?? true;
    const connection = options.connection ?? {};
    this.createBackend = options.createBackend
      ?? (descriptor => new BackendConnection(descriptor, connection));
    for (const builtin of options.builtins ?? []) {
      this.builtins.set(builtin.name, builtin);
    }
  }

  /**
   * Start every built-in, then every configured backend concurrently.
   * Failures are logged and reported; they never abort the others.
   */
  async start(descriptors: BackendDescriptor[]): Promise<DescriptorDiff> {
    const builtinDescriptors = [...this.builtins.values()]
      .filter(b => !descriptors.some(d => d.name === b.name))
      .map(b => b.descriptor);
    const all = [...builtinDescriptors, ...descriptors];
    log(`Starting ${all.length} backends...`);

    const added: string[] = [];
    const failed: string[] = [];
    await Promise.allSettled(
      all.map(async descriptor => {
        try {
          await this.addBackend(descriptor);
          added.push(descriptor.name);
        } catch (err) {
          failed.push(descriptor.name);
          logError(`Failed to start ${descriptor.name}: ${describeError(err)}`);
        }
      }),
    );

    log(`Started ${added.length}/${all.length} backends: ${added.join(", ")}`);
    return { added, removed: [], changed: [], failed };
  }

  /**
   * Create and spawn a backend. An existing backend with the same name keeps
   * serving until the new one is ready, then it is terminated. If the new one
   * fails to start, the old one stays in place and the error is thrown; with
   * no old one, the terminated backend is kept so that calls to it fail with
   * BackendUnavailable until it is added again or removed.
   */
  async addBackend(descriptor: BackendDescriptor): Promise<Backend> {
    if (this.closing) throw new ShutdownError();
    const { name } = descriptor;
    const token = this.nextToken++;
    this.addTokens.set(name, token);

    const fresh = this.instantiate(descriptor);
    this.starting.add(fresh);
    try {
      await fresh.spawn();
    } catch (err) {
      if (this.closing) throw new ShutdownError();
      if (this.addTokens.get(name) === token && !this.backends.has(name)) {
        this.failed.set(name, fresh);
      }
      throw err;
    } finally {
      this.starting.delete(fresh);
    }

    if (this.closing || this.addTokens.get(name) !== token) {
      await fresh.terminate({
        graceMs: this.graceMs,
        reason: new BackendUnavailableError(name, "superseded"),
      });
      throw this.closing
        ? new ShutdownError()
        : new BackendUnavailableError(name, "superseded by a newer configuration");
    }

    const previous = this.backends.get(name);
    this.failed.delete(name);
    this.backends.set(name, fresh);
    this.attach(fresh);
    this.registry.setBackendInfo(name, backendInfo(fresh));

    if (previous && previous !== fresh) {
      this.detach(previous);
      this.registry.removeBackendTools(name);
      log(`Replaced backend ${name}`);
      await previous.terminate({
        graceMs: this.graceMs,
        reason: new BackendUnavailableError(name, "replaced by a new instance"),
      });
    } else {
      log(`Added backend ${name}`);
    }
    return fresh;
  }

  /** Terminate and evict a backend; its in-flight calls fail with BackendUnavailable. */
  async removeBackend(name: string): Promise<boolean> {
    this.addTokens.set(name, this.nextToken++);
    const hadFailed = this.failed.delete(name);
    const backend = this.backends.get(name);
    if (!backend) return hadFailed;

    this.backends.delete(name);
    this.detach(backend);
    this.registry.removeBackend(name);
    await backend.terminate({
      graceMs: this.graceMs,
      reason: new BackendUnavailableError(name, "removed from pool"),
    });
    log(`Removed backend ${name}`);
    return true;
  }

  /**
   * Resolve a tool name to a backend. An explicit `server` wins; otherwise
   * the longest `<backend>::` prefix, then a built-in's bare alias.
   */
  route(name: string, server?: string): Route {
    if (server !== undefined) {
      const backend = this.get(server);
      if (!backend) {
        throw new UnknownToolError(`Unknown server: ${server}`);
      }
      const prefix = `${server}${this.separator}`;
      const toolName = name.startsWith(prefix) && name.length > prefix.length
        ? name.slice(prefix.length)
        : name;
      return { backend, toolName };
    }

    const parsed = parseNamespacedTool(
      name,
      [...this.backends.keys(), ...this.failed.keys()],
      this.separator,
    );
    const owner = parsed ? this.get(parsed.backendName) : undefined;
    if (parsed && owner) {
      return { backend: owner, toolName: parsed.toolName };
    }

    const alias = this.registry.resolveAlias(name);
    const aliasOwner = alias ? this.backends.get(alias.backend) : undefined;
    if (alias && aliasOwner) {
      return { backend: aliasOwner, toolName: alias.originalName };
    }

    throw new UnknownToolError(
      isNamespaced(name, this.separator)
        ? `Unknown tool: ${name} (no backend matches its prefix)`
        : `Unknown tool: ${name}`,
    );
  }

  /** A live backend, or the terminated one left by a failed launch. */
  get(name: string): Backend | undefined {
    return this.backends.get(name) ?? this.failed.get(name);
  }

  has(name: string): boolean {
    return this.backends.has(name) || this.failed.has(name);
  }

  names(): string[] {
    return [...this.backends.keys()];
  }

  /**
   * Fetch one backend's full tool list (following pagination) and store it.
   * A result that arrives after a newer refresh or a replacement is dropped.
   */
  async refreshBackend(name: string): Promise<ToolInfo[]> {
    const backend = this.get(name);
    if (!backend) {
      throw new UnknownToolError(`Unknown server: ${name}`);
    }
    const token = this.nextToken++;
    this.refreshTokens.set(name, token);

    const tools = await this.listAllTools(backend);
    if (this.backends.get(name) === backend && this.refreshTokens.get(name) === token) {
      this.registry.updateBackendTools(name, tools, backendInfo(backend));
      log(`Refreshed ${name}: ${tools.length} tools`);
    }
    return tools;
  }

  /**
   * Ask every ready backend for its tools concurrently. Each result is merged
   * as soon as it arrives; one slow or failing backend only affects itself.
   */
  async broadcastRefresh(): Promise<RefreshReport> {
    const ready = [...this.backends.values()].filter(b => b.state === "ready");
    const report: RefreshReport = { refreshed: [], failed: [] };

    await Promise.all(
      ready.map(async backend => {
        try {
          await this.refreshBackend(backend.name);
          report.refreshed.push(backend.name);
        } catch (err) {
          const message = describeError(err);
          report.failed.push({ name: backend.name, error: message });
          warn(`Refresh of ${backend.name} failed: ${message}`);
        }
      }),
    );
    return report;
  }

  /**
   * Apply a descriptor-set change: remove deleted backends, add new ones and
   * replace changed ones, then refresh whatever was added or replaced.
   */
  async applyDescriptors(
    previous: BackendDescriptor[],
    next: BackendDescriptor[],
  ): Promise<DescriptorDiff> {
    const before = new Map(previous.map(d => [d.name, d]));
    const after = new Map(next.map(d => [d.name, d]));
    const diff: DescriptorDiff = { added: [], removed: [], changed: [], failed: [] };

    for (const name of before.keys()) {
      if (!after.has(name)) {
        await this.removeBackend(name);
        diff.removed.push(name);
      }
    }

    const starts: Array<Promise<void>> = [];
    for (const [name, descriptor] of after) {
      const old = before.get(name);
      if (old && JSON.stringify(old) === JSON.stringify(descriptor)) continue;
      const bucket = old ? diff.changed : diff.added;
      starts.push(
        this.addBackend(descriptor).then(
          async () => {
            bucket.push(name);
            await this.refreshBackend(name).catch((err: unknown) => {
              warn(`Refresh of ${name} failed: ${describeError(err)}`);
            });
          },
          (err: unknown) => {
            diff.failed.push(name);
            logError(`Failed to start ${name}: ${describeError(err)}`);
          },
        ),
      );
    }
    await Promise.all(starts);

    if (diff.added.length || diff.removed.length || diff.changed.length) {
      log(
        `Backend diff applied: +${diff.added.length} -${diff.removed.length} ~${diff.changed.length}`,
      );
    }
    return diff;
  }

  /** Subscribe to notifications from every backend. */
  onNotification(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Terminate every backend, each with its own grace period, including those
   * still starting. Resolves once all of them are terminated.
   */
  async shutdown(options: { graceMs?: number; reason?: Error; } = {}): Promise<void> {
    this.closing = true;
    const all = [...new Set([...this.backends.values(), ...this.starting])];
    this.failed.clear();
    log(`Shutting down ${all.length} backends...`);
    await Promise.allSettled(
      all.map(backend =>
        backend.terminate({
          graceMs: options.graceMs ?? this.graceMs,
          reason: options.reason ?? new ShutdownError(),
        })
      ),
    );
    for (const backend of all) this.detach(backend);
  }

  get isClosing(): boolean {
    return this.closing;
  }

  private instantiate(descriptor: BackendDescriptor): Backend {
    if (descriptor.command !== null) {
      return this.createBackend(descriptor);
    }
    const builtin = this.builtins.get(descriptor.name);
    if (!builtin) {
      throw new BackendUnavailableError(
        descriptor.name,
        "no command configured and no built-in backend by that name",
      );
    }
    return builtin;
  }

  private async listAllTools(backend: Backend): Promise<ToolInfo[]> {
    const tools: ToolInfo[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_TOOL_PAGES; page++) {
      const response = await backend.send(
        "tools/list",
        cursor === undefined ? {} : { cursor },
      );
      if ("error" in response) {
        throw new BackendUnavailableError(
          backend.name,
          `tools/list failed: ${response.error.message}`,
        );
      }
      const parsed = toolsPageSchema.safeParse(response.result);
      if (!parsed.success) {
        throw new BackendUnavailableError(backend.name, "tools/list returned no tool array");
      }
      for (const entry of parsed.data.tools) {
        const tool = toolInfoSchema.safeParse(entry);
        if (tool.success) {
          tools.push(tool.data);
        } else {
          warn(`${backend.name}: skipping malformed tool entry`);
        }
      }
      cursor = parsed.data.nextCursor;
      if (!cursor) return tools;
    }

    warn(`${backend.name}: tools/list exceeded ${MAX_TOOL_PAGES} pages, truncating`);
    return tools;
  }

  private attach(backend: Backend): void {
    if (this.subscriptions.has(backend)) return;
    this.subscriptions.set(backend, [
      backend.onMessage(message => this.handleMessage(backend, message)),
      backend.onStateChange(state => {
        if (this.backends.get(backend.name) !== backend) return;
        this.registry.setBackendInfo(backend.name, backendInfo(backend));
        if (state === "terminated" && !this.closing) {
          warn(`Backend ${backend.name} terminated; calls to it will fail until it is re-added`);
        }
      }),
    ]);
  }

  private detach(backend: Backend): void {
    for (const unsubscribe of this.subscriptions.get(backend) ?? []) {
      unsubscribe();
    }
    this.subscriptions.delete(backend);
  }

  private handleMessage(backend: Backend, message: IncomingMessage): void {
    if ("id" in message) {
      // Server-initiated requests other than ping have no handler here.
      backend.respond(methodNotFound(message.id, message.method));
      return;
    }

    if (message.method === LIST_CHANGED && this.refreshOnListChanged) {
      this.refreshBackend(backend.name).catch((err: unknown) => {
        warn(`Refresh of ${backend.name} after list change failed: ${describeError(err)}`);
      });
    }

    for (const listener of this.listeners) {
      try {
        listener(message, backend.name);
      } catch (err) {
        logError(`Notification listener failed: ${describeError(err)}`);
      }
    }
  }
}

function backendInfo(backend: Backend): BackendInfo {
  return {
    description: backend.descriptor.description,
    builtin: backend.builtin,
    state: backend.state,
    identity: backend.identity,
    aliases: backend.exposesAliases,
  };
}
