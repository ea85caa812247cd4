/**
 * Message-level layer between the caller and the pool. It answers
 * `tools/list` with the fixed sparse view, runs virtual tools locally and
 * passes every other tool call through to the owning backend.
 */

import { ErrorCode, LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import {
  failureResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RequestId,
  successResponse,
} from "../protocol/messages";
import { CLIENT_INFO } from "./backend-connection";
import type { BackendPool } from "./backend-pool";
import { UnknownToolError } from "./errors";
import { namespaceTool } from "./namespace";
import type { ToolRegistry } from "./tool-registry";
import type { ToolDescriptor, ToolInfo } from "./types";
import {
  discoverPath,
  discoverResult,
  MCP_CALL,
  MCP_DISCOVER,
  ONBOARDING,
  parseEmbeddedCall,
} from "./virtual-tools";
import { log } from "../util/logger";

type VirtualHandler = (
  args: Record<string, unknown>,
  request: JsonRpcRequest,
) => Promise<JsonRpcResponse>;

/** What a bare tool name dispatches to. */
export type Dispatch =
  | { kind: "virtual"; run: VirtualHandler; }
  | { kind: "forward"; target: string; };

export interface SparseGatewayOptions {
  /** When false, tools/list returns the full catalog plus the virtual tools. */
  sparseMode?: boolean;
  /** Namespaced tool the `onboarding` virtual tool forwards to. */
  onboardingTarget?: string;
  instructions?: string;
}

export class SparseGateway {
  private readonly table: Map<string, Dispatch>;
  private readonly sparseMode: boolean;
  private readonly instructions?: string;

  constructor(
    private readonly pool: BackendPool,
    options: SparseGatewayOptions = {},
  ) {
    this.sparseMode = options.sparseMode ?? true;
    this.instructions = options.instructions;
    this.table = new Map<string, Dispatch>([
      [MCP_DISCOVER, {
        kind: "virtual",
        run: async (args, request) =>
          successResponse(
            request.id,
            discoverResult(this.registry.query(discoverPath(args))),
          ),
      }],
      [MCP_CALL, { kind: "virtual", run: (args, request) => this.embeddedCall(args, request) }],
      [ONBOARDING, {
        kind: "forward",
        target: options.onboardingTarget ?? namespaceTool(ONBOARDING, ONBOARDING),
      }],
    ]);
  }

  get registry(): ToolRegistry {
    return this.pool.registry;
  }

  dispatchFor(name: string): Dispatch | undefined {
    return this.table.get(name);
  }

  /**
   * Handle one caller request. Backend answers (results and error responses)
   * come back with the caller's id; proxy-level failures are thrown as
   * ProxyError.
   */
  async handle(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const params = request.params ?? {};
    switch (request.method) {
      case "initialize":
        return successResponse(request.id, this.initializeResult(params));
      case "ping":
        return successResponse(request.id, {});
      case "tools/list":
        return this.listTools(request.id, params, this.sparseMode);
      case "tools/call":
        return this.callTool(request.id, params);
      default:
        return this.forward(request.id, request.method, params);
    }
  }

  private initializeResult(params: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {
      protocolVersion: typeof params.protocolVersion === "string"
        ? params.protocolVersion
        : LATEST_PROTOCOL_VERSION,
      capabilities: { tools: { listChanged: true } },
      serverInfo: CLIENT_INFO,
    };
    if (this.instructions) result.instructions = this.instructions;
    return result;
  }

  private async listTools(
    id: RequestId,
    params: Record<string, unknown>,
    sparse: boolean,
  ): Promise<JsonRpcResponse> {
    const server = stringParam(params.server);
    if (server !== undefined) {
      // The backend's own list feeds the registry; the caller still only
      // sees the sparse view unless it asked for the raw catalog.
      if (!this.pool.has(server)) {
        throw new UnknownToolError(`Unknown server: ${server}`);
      }
      await this.pool.refreshBackend(server);
      const tools = sparse
        ? this.registry.sparseView()
        : this.registry.getBackendTools(server).map(toCatalogEntry);
      return successResponse(id, { tools });
    }

    const tools: ToolInfo[] = sparse
      ? this.registry.sparseView()
      : [...this.registry.list().map(toCatalogEntry), ...this.registry.sparseView()];
    return successResponse(id, { tools });
  }

  private async callTool(
    id: RequestId,
    params: Record<string, unknown>,
  ): Promise<JsonRpcResponse> {
    const name = stringParam(params.name);
    if (!name) {
      throw new UnknownToolError("tools/call requires a tool name");
    }
    const args = isRecord(params.arguments) ? params.arguments : {};
    const server = stringParam(params.server);

    if (server === undefined) {
      const entry = this.table.get(name);
      if (entry?.kind === "virtual") {
        log(`Virtual tool: ${name}`);
        return entry.run(args, { jsonrpc: "2.0", id, method: "tools/call", params });
      }
      if (entry?.kind === "forward") {
        return this.forwardTool(id, params, entry.target, args);
      }
    }
    return this.forwardTool(id, params, name, args, server);
  }

  private async forwardTool(
    id: RequestId,
    params: Record<string, unknown>,
    name: string,
    args: Record<string, unknown>,
    server?: string,
  ): Promise<JsonRpcResponse> {
    const { backend, toolName } = this.pool.route(name, server);
    log(`Routing tool call: ${name} → ${backend.name}/${toolName}`);
    const forwarded: Record<string, unknown> = { ...params, name: toolName, arguments: args };
    delete forwarded.server;
    return withId(await backend.send("tools/call", forwarded), id);
  }

  private async forward(
    id: RequestId,
    method: string,
    params: Record<string, unknown>,
  ): Promise<JsonRpcResponse> {
    const server = stringParam(params.server);
    if (server === undefined) {
      throw new UnknownToolError(`${method} needs params.server to select a backend`);
    }
    const backend = this.pool.get(server);
    if (!backend) {
      throw new UnknownToolError(`Unknown server: ${server}`);
    }
    const forwarded = { ...params };
    delete forwarded.server;
    return withId(await backend.send(method, forwarded), id);
  }

  /** `mcp_call`: unwrap the embedded request and dispatch it as a real one. */
  private async embeddedCall(
    args: Record<string, unknown>,
    request: JsonRpcRequest,
  ): Promise<JsonRpcResponse> {
    const call = parseEmbeddedCall(args);
    if (!call) {
      return failureResponse(request.id, {
        code: ErrorCode.InvalidParams,
        message: "Missing 'method' parameter",
      });
    }
    log(`mcp_call: ${call.method}`);

    if (call.method === "tools/list") {
      return this.listTools(request.id, call.params, false);
    }
    return this.handle({
      jsonrpc: "2.0",
      id: request.id,
      method: call.method,
      params: call.params,
    });
  }
}

function toCatalogEntry(tool: ToolDescriptor): ToolInfo {
  return {
    name: tool.name,
    description: tool.description
      ? `[${tool.backend}] ${tool.description}`
      : `[${tool.backend}] ${tool.originalName}`,
    inputSchema: tool.inputSchema,
  };
}

function withId(response: JsonRpcResponse, id: RequestId): JsonRpcResponse {
  return { ...response, id };
}

function stringParam(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
