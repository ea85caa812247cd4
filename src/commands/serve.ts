/**
 * `sparse-proxy serve` command: runs the proxy as an MCP server on stdio.
 */

import type { Command } from "commander";
import { ConfigWatcher } from "../config/watcher";
import { toDescriptors } from "../config/types";
import { ProxyServer } from "../multiplexer/proxy-server";
import { describeError, error as logError, log, warn } from "../util/logger";
import {
  addProxyOptions,
  discoveryOptions,
  type ProxyCommandOptions,
  startProxy,
} from "./common";

interface ServeOptions extends ProxyCommandOptions {
  watch?: boolean;
}

export function registerServeCommand(program: Command): void {
  addProxyOptions(
    program
      .command("serve")
      .description("Run the sparse proxy as an MCP server on stdio"),
  )
    .option("--no-sparse", "List the full namespaced catalog instead of the sparse view")
    .option("--watch", "Apply config file changes to the running backends")
    .action(async (options: ServeOptions) => {
      try {
        const { proxy, config } = await startProxy(options);

        if (Object.keys(config.servers).length === 0) {
          if (!config.builtins) {
            logError(
              "No backends configured. Use --config, --server, or create .sparse-proxy.json",
            );
            process.exit(1);
          }
          warn("No backends configured; serving built-ins only");
        }

        const server = new ProxyServer(proxy);
        let watcher: ConfigWatcher | null = null;

        if (options.watch) {
          if (config.configSources.length === 0) {
            warn("--watch given but no config file was loaded; nothing to watch");
          } else {
            watcher = new ConfigWatcher({
              configPaths: config.configSources,
              discoveryOptions: discoveryOptions(options),
              onChange: async newConfig => {
                const diff = await proxy.applyConfig(toDescriptors(newConfig));
                log(
                  `Config reloaded: +${diff.added.length} -${diff.removed.length} ~${diff.changed.length}`,
                );
              },
            });
            watcher.start();
          }
        }

        let stopping = false;
        const shutdown = async () => {
          if (stopping) return;
          stopping = true;
          log("Shutting down...");
          watcher?.stop();
          await watcher?.idle();
          await server.close();
          await proxy.shutdown();
          process.exit(0);
        };
        const onSignal = () => {
          shutdown().catch((err: unknown) => {
            logError(`shutdown failed: ${describeError(err)}`);
            process.exit(1);
          });
        };

        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);

        await server.serve();
      } catch (err) {
        logError(`serve failed: ${describeError(err)}`);
        process.exit(1);
      }
    });
}
