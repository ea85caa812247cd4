/**
 * Caller-facing MCP endpoint on stdio. Uses the low-level Server API and
 * hands every tools/list and tools/call to the SparseProxy.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import {
  type CallToolResult,
  CallToolResultSchema,
  ErrorCode,
  ListToolsRequestSchema,
  type ListToolsResult,
  ListToolsResultSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { JsonRpcResponse } from "../protocol/messages";
import { CLIENT_INFO } from "./backend-connection";
import { ProxyError } from "./errors";
import type { SparseProxy } from "./sparse-proxy";
import { describeError, error as logError, log } from "../util/logger";

/**
 * tools/call request as the proxy reads it: the SDK's own schema drops
 * unknown params, and `server` (an explicit backend instead of a prefix)
 * has to survive parsing.
 */
export const ProxyCallToolRequestSchema = z.object({
  method: z.literal("tools/call"),
  params: z
    .object({
      name: z.string(),
      arguments: z.record(z.string(), z.unknown()).optional(),
      server: z.string().optional(),
    })
    .passthrough(),
});

export class ProxyServer {
  private server: Server;
  private proxy: SparseProxy;

  constructor(proxy: SparseProxy) {
    this.proxy = proxy;

    this.server = new Server(
      { name: CLIENT_INFO.name, version: CLIENT_INFO.version },
      { capabilities: { tools: { listChanged: true } } },
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    // tools/list: the sparse view (or the full catalog outside sparse mode)
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      const result = unwrap(await this.relay(() => this.proxy.listTools()));
      return ListToolsResultSchema.parse(result);
    });

    // tools/call: virtual tools run locally, the rest is routed by namespace
    this.server.setRequestHandler(
      ProxyCallToolRequestSchema,
      async (request): Promise<CallToolResult> => {
        const { name, arguments: args, server } = request.params;
        log(`Routing tool call: ${name}`);

        const result = unwrap(
          await this.relay(() => this.proxy.callTool(name, args ?? {}, server)),
        );
        const parsed = CallToolResultSchema.safeParse(result);
        if (!parsed.success) {
          throw new McpError(
            ErrorCode.InternalError,
            `Backend returned a malformed tool result for ${name}`,
          );
        }
        return parsed.data;
      },
    );
  }

  /** Run a proxy call, turning taxonomy errors into structured MCP errors. */
  private async relay(
    run: () => Promise<JsonRpcResponse>,
  ): Promise<JsonRpcResponse> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof ProxyError) {
        logError(`${err.kind}: ${err.message}`);
        throw new McpError(err.code, err.message, { kind: err.kind });
      }
      logError(`Unexpected failure: ${describeError(err)}`);
      throw new McpError(ErrorCode.InternalError, describeError(err));
    }
  }

  async serve(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log("Proxy listening on stdio");
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}

/** A backend error response becomes an McpError with the backend's code. */
function unwrap(response: JsonRpcResponse): unknown {
  if ("error" in response) {
    throw new McpError(response.error.code, response.error.message, response.error.data);
  }
  return response.result;
}
