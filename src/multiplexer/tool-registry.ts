/**
 * Aggregate catalog of every backend's tools.
 *
 * Each backend owns one immutable map of its tools. An update builds the new
 * map off to the side and swaps it in with a single assignment, so readers see
 * either the old or the new set for that backend and never a mix. Other
 * backends' maps are not touched.
 */

import { compileQuery } from "./path-query";
import { DEFAULT_SEPARATOR, namespaceTool, parseNamespacedTool } from "./namespace";
import type {
  BackendState,
  ServerIdentity,
  ToolDescriptor,
  ToolInfo,
} from "./types";
import { VIRTUAL_TOOL_NAMES, virtualToolDefinitions } from "./virtual-tools";

export interface BackendInfo {
  description: string;
  builtin: boolean;
  state: BackendState;
  identity?: ServerIdentity;
  /** Publish this backend's tools under their bare names as well. */
  aliases?: boolean;
}

export interface ServerSummary {
  name: string;
  description: string;
  builtin: boolean;
  state: BackendState;
  toolCount: number;
  serverInfo?: Record<string, unknown>;
  instructions?: string;
}

export interface DiscoveryTool {
  name: string;
  originalName: string;
  server: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/** The document `mcp_discover` queries run against. */
export interface DiscoveryTree {
  tools: DiscoveryTool[];
  tool_names: string[];
  servers: Record<string, ServerSummary>;
}

export class ToolRegistry {
  private catalogs = new Map<string, ReadonlyMap<string, ToolDescriptor>>();
  private aliases = new Map<string, ToolDescriptor>();
  private servers = new Map<string, BackendInfo>();
  private readonly separator: string;

  constructor(options: { separator?: string; } = {}) {
    this.separator = options.separator ?? DEFAULT_SEPARATOR;
  }

  /** Replace everything known about one backend's tools. */
  updateBackendTools(
    backend: string,
    tools: ToolInfo[],
    info?: BackendInfo,
  ): void {
    if (info) this.servers.set(backend, info);

    const next = new Map<string, ToolDescriptor>();
    for (const tool of tools) {
      const name = namespaceTool(backend, tool.name, this.separator);
      next.set(name, {
        name,
        originalName: tool.name,
        backend,
        description: tool.description,
        inputSchema: tool.inputSchema,
      });
    }
    this.catalogs.set(backend, next);
    this.rebuildAliases();
  }

  /** Update status fields (state, identity) without touching tools. */
  setBackendInfo(backend: string, info: BackendInfo): void {
    this.servers.set(backend, info);
    this.rebuildAliases();
  }

  removeBackendTools(backend: string): void {
    if (!this.catalogs.delete(backend)) return;
    this.rebuildAliases();
  }

  /** Drop tools and status for a backend that left the pool. */
  removeBackend(backend: string): void {
    this.catalogs.delete(backend);
    this.servers.delete(backend);
    this.rebuildAliases();
  }

  hasBackend(backend: string): boolean {
    return this.catalogs.has(backend) || this.servers.has(backend);
  }

  list(): ToolDescriptor[] {
    const tools: ToolDescriptor[] = [];
    for (const catalog of this.catalogs.values()) {
      tools.push(...catalog.values());
    }
    return tools;
  }

  get size(): number {
    let count = 0;
    for (const catalog of this.catalogs.values()) count += catalog.size;
    return count;
  }

  /** Look up a namespaced name (`<backend>::<tool>`). */
  get(name: string): ToolDescriptor | undefined {
    const parsed = parseNamespacedTool(name, this.catalogs.keys(), this.separator);
    if (!parsed) return undefined;
    return this.catalogs.get(parsed.backendName)?.get(name);
  }

  resolveAlias(name: string): ToolDescriptor | undefined {
    return this.aliases.get(name);
  }

  getBackendTools(backend: string): ToolDescriptor[] {
    return [...(this.catalogs.get(backend)?.values() ?? [])];
  }

  tree(): DiscoveryTree {
    const tools = this.list().map(tool => ({
      name: tool.name,
      originalName: tool.originalName,
      server: tool.backend,
      description: tool.description ?? "",
      inputSchema: tool.inputSchema,
    }));

    const servers: Record<string, ServerSummary> = {};
    const names = new Set([...this.servers.keys(), ...this.catalogs.keys()]);
    for (const name of names) {
      const info = this.servers.get(name);
      const summary: ServerSummary = {
        name,
        description: info?.description ?? "",
        builtin: info?.builtin ?? false,
        state: info?.state ?? "idle",
        toolCount: this.catalogs.get(name)?.size ?? 0,
      };
      if (info?.identity?.serverInfo) summary.serverInfo = info.identity.serverInfo;
      if (info?.identity?.instructions) {
        summary.instructions = info.identity.instructions;
      }
      servers[name] = summary;
    }

    return { tools, tool_names: tools.map(t => t.name), servers };
  }

  /**
   * Evaluate a path query against the discovery tree. Throws
   * QuerySyntaxError for a malformed path; a path that matches nothing yields
   * an empty array. Results are copies, so callers cannot mutate the catalog.
   */
  query(path: string): unknown[] {
    const compiled = compileQuery(path);
    return structuredClone(compiled.evaluate(this.tree()));
  }

  /** The fixed meta-tool set; identical whatever the catalog holds. */
  sparseView(): ToolInfo[] {
    return virtualToolDefinitions();
  }

  private rebuildAliases(): void {
    const aliases = new Map<string, ToolDescriptor>();
    for (const [backend, catalog] of this.catalogs) {
      if (!this.servers.get(backend)?.aliases) continue;
      for (const tool of catalog.values()) {
        if (VIRTUAL_TOOL_NAMES.has(tool.originalName)) continue;
        if (aliases.has(tool.originalName)) continue;
        aliases.set(tool.originalName, tool);
      }
    }
    this.aliases = aliases;
  }
}
