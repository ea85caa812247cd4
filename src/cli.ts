#!/usr/bin/env node
/**
 * sparse-proxy: MCP proxy that hides any number of backends behind three
 * virtual tools.
 *
 * Usage:
 *   sparse-proxy serve [options]          Run the proxy on stdio
 *   sparse-proxy query <jsonpath>         Query the aggregate tool catalog
 *   sparse-proxy call <tool> [json]       Call one tool and print the result
 */

import { config } from "dotenv";
import { program } from "commander";
import { registerServeCommand } from "./commands/serve";
import { registerQueryCommand } from "./commands/query";
import { registerCallCommand } from "./commands/call";
import { CLIENT_INFO } from "./multiplexer/backend-connection";
import { describeError, setVerbose } from "./util/logger";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

async function main(): Promise<void> {
  program
    .name("sparse-proxy")
    .description("MCP proxy: many backends behind mcp_discover, mcp_call and onboarding")
    .version(CLIENT_INFO.version)
    .option("--verbose", "Verbose logging to stderr")
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts();
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  registerServeCommand(program);
  registerQueryCommand(program);
  registerCallCommand(program);

  await program.parseAsync();
}

main().catch(err => {
  console.error(`sparse-proxy: ${describeError(err)}`);
  process.exit(1);
});
