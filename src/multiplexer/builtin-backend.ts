/**
 * A backend that lives inside the proxy process (`command: null`).
 * It answers the same JSON-RPC methods a spawned server would, so the pool
 * and gateway route to it without special cases.
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import {
  failureResponse,
  type JsonRpcResponse,
  successResponse,
} from "../protocol/messages";
import { BackendUnavailableError } from "./errors";
import type {
  Backend,
  BackendDescriptor,
  BackendState,
  CallToolResult,
  MessageHandler,
  ServerIdentity,
  StateHandler,
  TerminateOptions,
  ToolInfo,
} from "./types";
import { describeError } from "../util/logger";

export interface BuiltinTool extends ToolInfo {
  handler: (
    args: Record<string, unknown>,
  ) => CallToolResult | Promise<CallToolResult>;
}

export interface BuiltinBackendOptions {
  name: string;
  description: string;
  version?: string;
  instructions?: string;
  tools: BuiltinTool[];
  /** Also publish each tool under its bare name. */
  aliases?: boolean;
}

export function textResult(text: string, isError?: boolean): CallToolResult {
  const result: CallToolResult = { content: [{ type: "text", text }] };
  if (isError) result.isError = true;
  return result;
}

export class BuiltinBackend implements Backend {
  readonly name: string;
  readonly descriptor: BackendDescriptor;
  readonly builtin = true;
  readonly exposesAliases: boolean;
  readonly identity: ServerIdentity;

  private _state: BackendState = "idle";
  private tools: Map<string, BuiltinTool>;
  private stateHandlers = new Set<StateHandler>();

  constructor(options: BuiltinBackendOptions) {
    this.name = options.name;
    this.descriptor = {
      name: options.name,
      command: null,
      args: [],
      env: {},
      description: options.description,
    };
    this.exposesAliases = options.aliases ?? false;
    this.tools = new Map<string, BuiltinTool>(
      options.tools.map(tool => [tool.name, tool]),
    );
    this.identity = {
      serverInfo: { name: options.name, version: options.version ?? "1.0.0" },
      capabilities: { tools: {} },
      instructions: options.instructions,
    };
  }

  get state(): BackendState {
    return this._state;
  }

  async spawn(): Promise<void> {
    this.setState("ready");
  }

  async send(
    method: string,
    params: Record<string, unknown> = {},
  ): Promise<JsonRpcResponse> {
    if (this._state !== "ready") {
      throw new BackendUnavailableError(this.name, `state is ${this._state}`);
    }
    // Request ids are local to a connection; the gateway rewrites them.
    const id = 0;

    switch (method) {
      case "initialize":
        return successResponse(id, {
          protocolVersion: params.protocolVersion ?? "2024-11-05",
          capabilities: this.identity.capabilities ?? {},
          serverInfo: this.identity.serverInfo ?? {},
        });
      case "ping":
        return successResponse(id, {});
      case "tools/list":
        return successResponse(id, {
          tools: [...this.tools.values()].map(
            ({ name, description, inputSchema }) => ({
              name,
              description,
              inputSchema,
            }),
          ),
        });
      case "tools/call":
        return successResponse(id, await this.callTool(params));
      default:
        return failureResponse(id, {
          code: ErrorCode.MethodNotFound,
          message: `Method not found: ${method}`,
        });
    }
  }

  // Built-ins never initiate messages.
  notify(): void {}

  respond(): void {}

  onMessage(_handler: MessageHandler): () => void {
    return () => {};
  }

  onStateChange(handler: StateHandler): () => void {
    this.stateHandlers.add(handler);
    return () => {
      this.stateHandlers.delete(handler);
    };
  }

  async terminate(_options?: TerminateOptions): Promise<void> {
    this.setState("terminated");
  }

  private async callTool(
    params: Record<string, unknown>,
  ): Promise<CallToolResult> {
    const name = typeof params.name === "string" ? params.name : "";
    const tool = this.tools.get(name);
    if (!tool) {
      return textResult(`Error: Unknown tool: ${name}`, true);
    }
    const args = isRecord(params.arguments) ? params.arguments : {};
    try {
      return await tool.handler(args);
    } catch (err) {
      return textResult(`Error: ${describeError(err)}`, true);
    }
  }

  private setState(state: BackendState): void {
    if (this._state === state) return;
    this._state = state;
    for (const handler of this.stateHandlers) {
      handler(state, this);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
