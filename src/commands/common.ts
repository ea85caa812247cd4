/**
 * Shared utilities for sparse-proxy commands.
 * Argument-parsing helpers and the config → proxy wiring used by serve,
 * query and call.
 */

import type { Command } from "commander";
import { discoverConfig, type DiscoveryOptions } from "../config/discovery";
import { type ResolvedConfig, toDescriptors } from "../config/types";
import { MAX_TIMER_MS } from "../multiplexer/pending-table";
import { SparseProxy, type SparseProxyOptions } from "../multiplexer/sparse-proxy";

/**
 * Commander collect helper: appends each flag value into an array.
 * Pass as the third argument to `.option()` with `[]` as the default.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Parse `--server name=command` inline server definitions.
 * Validates that both name and command are non-empty.
 */
export function parseInlineServers(
  items: string[],
): Array<{ name: string; command: string; }> {
  return items.map(item => {
    const eq = item.indexOf("=");
    if (eq === -1) {
      throw new Error(`Invalid --server format: "${item}". Use name=command`);
    }
    const name = item.slice(0, eq).trim();
    const command = item.slice(eq + 1).trim();
    if (!name) {
      throw new Error(`Invalid --server format: "${item}". Server name must not be empty`);
    }
    if (!command) {
      throw new Error(`Invalid --server format: "${item}". Server command must not be empty`);
    }
    return { name, command };
  });
}

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new Error(`Invalid --timeout "${value}". Use a positive number of milliseconds`);
  }
  if (ms > MAX_TIMER_MS) {
    throw new Error(`Invalid --timeout "${value}". The limit is ${MAX_TIMER_MS} milliseconds`);
  }
  return ms;
}

/** Parse the optional JSON object given to `call`. */
export function parseJsonArguments(value: string | undefined): Record<string, unknown> {
  if (value === undefined || value.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new Error(
      `Arguments must be a JSON object: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Options every proxy-running command accepts. */
export function addProxyOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to .sparse-proxy.json config file")
    .option(
      "--server <name=command>",
      "Add a backend inline (repeatable)",
      collect,
      [],
    )
    .option("--timeout <ms>", "Per-request timeout in milliseconds", parseTimeout)
    .option("--no-builtins", "Do not host the built-in backends");
}

export interface ProxyCommandOptions {
  config?: string;
  server: string[];
  timeout?: number;
  builtins: boolean;
  sparse?: boolean;
}

export function discoveryOptions(options: ProxyCommandOptions): DiscoveryOptions {
  return {
    configPath: options.config,
    inlineServers: parseInlineServers(options.server),
    overrides: {
      timeoutMs: options.timeout,
      // Commander sets these to true unless the --no- flag was given
      builtins: options.builtins ? undefined : false,
      sparseMode: options.sparse === false ? false : undefined,
    },
  };
}

export function proxyOptions(
  config: ResolvedConfig,
  extra: Partial<SparseProxyOptions> = {},
): SparseProxyOptions {
  return {
    sparseMode: config.sparseMode,
    builtins: config.builtins,
    timeoutMs: config.timeoutMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    shutdownGraceMs: config.shutdownGraceMs,
    refresh: config.refresh,
    ...extra,
  };
}

/** Discover config, build a proxy and start every backend. */
export async function startProxy(
  options: ProxyCommandOptions,
  extra: Partial<SparseProxyOptions> = {},
): Promise<{ proxy: SparseProxy; config: ResolvedConfig; }> {
  const config = await discoverConfig(discoveryOptions(options));
  const proxy = new SparseProxy(proxyOptions(config, extra));
  await proxy.start(toDescriptors(config));
  return { proxy, config };
}
