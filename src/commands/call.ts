/**
 * `sparse-proxy call <tool> [json]`: invoke one tool through the gateway
 * (virtual tools included) and print the result.
 */

import type { Command } from "commander";
import type { SparseProxy } from "../multiplexer/sparse-proxy";
import { resultObject } from "../protocol/messages";
import { describeError, error as logError } from "../util/logger";
import {
  addProxyOptions,
  parseJsonArguments,
  type ProxyCommandOptions,
  startProxy,
} from "./common";

export function registerCallCommand(program: Command): void {
  addProxyOptions(
    program
      .command("call")
      .description("Call a tool, e.g. call memory::read_graph '{}'")
      .argument("<tool>", "Namespaced tool name or virtual tool")
      .argument("[json]", "Tool arguments as a JSON object"),
  ).action(async (tool: string, json: string | undefined, options: ProxyCommandOptions) => {
    let proxy: SparseProxy | undefined;
    try {
      const args = parseJsonArguments(json);
      ({ proxy } = await startProxy(options, {
        refresh: { onStartup: true, onListChanged: false, intervalMs: null },
      }));
      const response = await proxy.callTool(tool, args);
      if ("error" in response) {
        logError(`${tool} failed: ${response.error.message}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(response.result, null, 2));
      if (resultObject(response)?.isError === true) process.exitCode = 1;
    } catch (err) {
      logError(`call failed: ${describeError(err)}`);
      process.exitCode = 1;
    } finally {
      await proxy?.shutdown();
    }
  });
}
