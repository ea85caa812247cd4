/**
 * Discover and merge .sparse-proxy.json config files.
 *
 * Precedence (later wins on conflict):
 * 1. $HOME/.sparse-proxy.json (global)
 * 2. .sparse-proxy.json in CWD (project-level)
 * 3. --config <path> (explicit, replaces CWD)
 * 4. --server flags (additive)
 * 5. command-line setting overrides
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { validateConfig } from "./schema";
import {
  type ConfigFile,
  DEFAULT_SETTINGS,
  type ProxySettings,
  type ResolvedConfig,
  type ServerConfig,
} from "./types";
import { expandEnvList, expandEnvRecord } from "../util/env";
import { describeError, log, warn } from "../util/logger";

export const CONFIG_FILENAME = ".sparse-proxy.json";

async function loadConfigFile(path: string): Promise<ConfigFile | null> {
  try {
    const content = await readFile(path, "utf-8");
    const validated = validateConfig(JSON.parse(content));
    log(
      `Loaded config from ${path} (${Object.keys(validated.servers).length} servers)`,
    );
    return validated;
  } catch (err) {
    warn(`Skipping config ${path}: ${describeError(err)}`);
    return null;
  }
}

export interface SettingOverrides {
  timeoutMs?: number;
  sparseMode?: boolean;
  builtins?: boolean;
}

export interface DiscoveryOptions {
  configPath?: string;
  inlineServers?: Array<{ name: string; command: string; }>;
  overrides?: SettingOverrides;
  env?: Record<string, string | undefined>;
}

/** Config files discovery would read, in precedence order. */
export function candidatePaths(options: DiscoveryOptions = {}): string[] {
  const projectPath = options.configPath
    ? resolve(process.cwd(), options.configPath)
    : join(process.cwd(), CONFIG_FILENAME);
  return [join(homedir(), CONFIG_FILENAME), projectPath];
}

function mergeSettings(target: ProxySettings, file: ConfigFile): void {
  if (file.timeoutMs !== undefined) target.timeoutMs = file.timeoutMs;
  if (file.handshakeTimeoutMs !== undefined) {
    target.handshakeTimeoutMs = file.handshakeTimeoutMs;
  }
  if (file.shutdownGraceMs !== undefined) target.shutdownGraceMs = file.shutdownGraceMs;
  if (file.sparseMode !== undefined) target.sparseMode = file.sparseMode;
  if (file.builtins !== undefined) target.builtins = file.builtins;
  if (file.refresh) {
    const { onStartup, onListChanged, intervalMs } = file.refresh;
    if (onStartup !== undefined) target.refresh.onStartup = onStartup;
    if (onListChanged !== undefined) target.refresh.onListChanged = onListChanged;
    if (intervalMs !== undefined) target.refresh.intervalMs = intervalMs;
  }
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const servers: Record<string, ServerConfig> = {};
  const configSources: string[] = [];
  const settings: ProxySettings = {
    ...DEFAULT_SETTINGS,
    refresh: { ...DEFAULT_SETTINGS.refresh },
  };

  // 1-3. Global, then project-level or explicit config
  for (const path of candidatePaths(options)) {
    if (!existsSync(path)) continue;
    const loaded = await loadConfigFile(path);
    if (!loaded) continue;
    configSources.push(path);
    Object.assign(servers, loaded.servers);
    mergeSettings(settings, loaded);
  }

  // 4. Inline --server flags
  for (const { name, command } of options.inlineServers ?? []) {
    servers[name] = { command };
  }

  // 5. Command-line settings
  const overrides = options.overrides ?? {};
  if (overrides.timeoutMs !== undefined) settings.timeoutMs = overrides.timeoutMs;
  if (overrides.sparseMode !== undefined) settings.sparseMode = overrides.sparseMode;
  if (overrides.builtins !== undefined) settings.builtins = overrides.builtins;

  // Expand env vars in args and env of every server
  for (const [name, config] of Object.entries(servers)) {
    servers[name] = {
      ...config,
      ...(config.args ? { args: expandEnvList(config.args, env) } : {}),
      ...(config.env ? { env: expandEnvRecord(config.env, env) } : {}),
    };
  }

  log(`Resolved ${Object.keys(servers).length} total servers`);
  return { ...settings, servers, configSources };
}
