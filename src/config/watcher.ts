/**
 * Watches the loaded config files and re-applies them to the running proxy.
 *
 * Bursts of file events are debounced into one reload. Reloads never overlap:
 * a change seen while `onChange` is still applying the previous config is
 * remembered and applied once that one settles, so backends are added and
 * removed in the order the edits were made.
 */

import { type FSWatcher, watch } from "node:fs";
import { discoverConfig, type DiscoveryOptions } from "./discovery";
import type { ResolvedConfig } from "./types";
import { describeError, log, warn } from "../util/logger";

export interface ConfigWatcherOptions {
  configPaths: string[];
  discoveryOptions: DiscoveryOptions;
  /** Applies a re-read config. Never called again before the previous call settles. */
  onChange: (newConfig: ResolvedConfig) => void | Promise<void>;
  debounceMs?: number;
}

export class ConfigWatcher {
  private readonly watchers = new Map<string, FSWatcher>();
  private readonly debounceMs: number;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private rerun = false;
  private stopped = false;

  constructor(private readonly options: ConfigWatcherOptions) {
    this.debounceMs = options.debounceMs ?? 300;
  }

  start(): void {
    this.stopped = false;
    for (const configPath of this.options.configPaths) {
      if (this.arm(configPath)) log(`Watching config: ${configPath}`);
    }
  }

  /** Stops watching; a reload already applying finishes, queued ones are dropped. */
  stop(): void {
    this.stopped = true;
    this.rerun = false;
    for (const watcher of this.watchers.values()) {
      watcher.close();
    }
    this.watchers.clear();
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  /** Resolves once no reload is in flight. */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private arm(configPath: string): boolean {
    try {
      const watcher = watch(configPath, eventType => {
        // Editors that save by rename leave the old watch on a dead inode.
        if (eventType === "rename") this.rearm(configPath);
        this.schedule();
      });
      this.watchers.set(configPath, watcher);
      return true;
    } catch (err) {
      warn(`Cannot watch ${configPath}: ${describeError(err)}`);
      return false;
    }
  }

  private rearm(configPath: string): void {
    if (this.stopped) return;
    this.watchers.get(configPath)?.close();
    this.watchers.delete(configPath);
    this.arm(configPath);
  }

  private schedule(): void {
    if (this.stopped) return;
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.requestReload();
    }, this.debounceMs);
  }

  private requestReload(): void {
    if (this.running) {
      this.rerun = true;
      return;
    }
    this.running = this.drain().finally(() => {
      this.running = null;
    });
  }

  private async drain(): Promise<void> {
    do {
      this.rerun = false;
      try {
        await this.reload();
      } catch (err) {
        warn(`Config reload failed: ${describeError(err)}`);
      }
    } while (this.rerun && !this.stopped);
  }

  private async reload(): Promise<void> {
    log("Config file changed, reloading...");
    const newConfig = await discoverConfig(this.options.discoveryOptions);
    if (this.stopped) return;
    await this.options.onChange(newConfig);
  }
}
