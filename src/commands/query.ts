/**
 * `sparse-proxy query <jsonpath>`: start the backends, refresh the catalog,
 * print the matches as JSON and exit.
 */

import type { Command } from "commander";
import type { SparseProxy } from "../multiplexer/sparse-proxy";
import { describeError, error as logError } from "../util/logger";
import { addProxyOptions, type ProxyCommandOptions, startProxy } from "./common";

export function registerQueryCommand(program: Command): void {
  addProxyOptions(
    program
      .command("query")
      .description("Query the aggregate tool catalog with a JSONPath expression")
      .argument("<jsonpath>", "e.g. '$.tools[*].name'"),
  ).action(async (jsonpath: string, options: ProxyCommandOptions) => {
    let proxy: SparseProxy | undefined;
    try {
      ({ proxy } = await startProxy(options, {
        refresh: { onStartup: true, onListChanged: false, intervalMs: null },
      }));
      console.log(JSON.stringify(proxy.discover(jsonpath), null, 2));
    } catch (err) {
      logError(`query failed: ${describeError(err)}`);
      process.exitCode = 1;
    } finally {
      await proxy?.shutdown();
    }
  });
}
