/**
 * Configuration types for .sparse-proxy.json.
 */

import type { BackendDescriptor } from "../multiplexer/types";

export interface ServerConfig {
  /** Argument vector, a whitespace-separated command line, or null for a built-in. */
  command: string[] | string | null;
  args?: string[];
  env?: Record<string, string>;
  description?: string;
}

export interface RefreshConfig {
  onStartup: boolean;
  onListChanged: boolean;
  intervalMs: number | null;
}

export interface ProxySettings {
  timeoutMs: number;
  handshakeTimeoutMs: number;
  shutdownGraceMs: number;
  sparseMode: boolean;
  builtins: boolean;
  refresh: RefreshConfig;
}

export interface ConfigFile extends Partial<Omit<ProxySettings, "refresh">> {
  servers: Record<string, ServerConfig>;
  refresh?: Partial<RefreshConfig>;
}

export interface ResolvedConfig extends ProxySettings {
  servers: Record<string, ServerConfig>;
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources: string[];
}

export const DEFAULT_SETTINGS: ProxySettings = {
  timeoutMs: 30_000,
  handshakeTimeoutMs: 10_000,
  shutdownGraceMs: 5_000,
  sparseMode: true,
  builtins: true,
  refresh: { onStartup: true, onListChanged: true, intervalMs: null },
};

export function toDescriptor(name: string, config: ServerConfig): BackendDescriptor {
  const command = typeof config.command === "string"
    ? config.command.trim().split(/\s+/).filter(Boolean)
    : config.command;
  return {
    name,
    command,
    args: config.args ?? [],
    env: config.env ?? {},
    description: config.description ?? "",
  };
}

export function toDescriptors(config: ResolvedConfig): BackendDescriptor[] {
  return Object.entries(config.servers).map(([name, server]) => toDescriptor(name, server));
}
