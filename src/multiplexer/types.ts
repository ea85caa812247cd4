/**
 * Shared types for the multiplexer layer.
 */

import type {
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from "../protocol/messages";

/** Tool metadata as a backend reports it in `tools/list`. */
export interface ToolInfo {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

/** A tool in the aggregate catalog, keyed by its namespaced name. */
export interface ToolDescriptor {
  /** Externally visible name, `<backend>::<tool>`. */
  name: string;
  originalName: string;
  backend: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface CallToolResult {
  content: Array<{ type: string; text?: string; [key: string]: unknown; }>;
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * Immutable launch configuration of a backend. `command: null` marks a
 * built-in backend that lives inside the proxy process.
 */
export interface BackendDescriptor {
  name: string;
  command: string[] | null;
  args: string[];
  env: Record<string, string>;
  description: string;
}

export type BackendState =
  | "idle"
  | "spawning"
  | "handshaking"
  | "ready"
  | "terminated";

export interface SendOptions {
  timeoutMs?: number;
}

export interface TerminateOptions {
  /** How long the process gets to exit after SIGTERM before SIGKILL. */
  graceMs?: number;
  /** Error every still-pending request is failed with. */
  reason?: Error;
}

export type IncomingMessage = JsonRpcRequest | JsonRpcNotification;

export type MessageHandler = (message: IncomingMessage, backend: Backend) => void;

export type StateHandler = (state: BackendState, backend: Backend) => void;

export interface ServerIdentity {
  serverInfo?: Record<string, unknown>;
  capabilities?: Record<string, unknown>;
  instructions?: string;
}

/**
 * Anything the pool can route to: a spawned process or an in-process
 * built-in.
 */
export interface Backend {
  readonly name: string;
  readonly descriptor: BackendDescriptor;
  readonly state: BackendState;
  readonly builtin: boolean;
  /** Built-ins may publish their tools under unqualified names too. */
  readonly exposesAliases: boolean;
  readonly identity: ServerIdentity;
  spawn(): Promise<void>;
  send(
    method: string,
    params?: Record<string, unknown>,
    options?: SendOptions,
  ): Promise<JsonRpcResponse>;
  notify(method: string, params?: Record<string, unknown>): void;
  respond(response: JsonRpcResponse): void;
  onMessage(handler: MessageHandler): () => void;
  onStateChange(handler: StateHandler): () => void;
  terminate(options?: TerminateOptions): Promise<void>;
}
