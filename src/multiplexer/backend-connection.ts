/**
 * One spawned backend process speaking newline-delimited JSON-RPC over its
 * stdin/stdout. Owns the process handle, the Framer for its output and the
 * correlation table for its in-flight requests.
 *
 * State machine: idle → spawning → handshaking → ready → terminated.
 * A dead process is never restarted here; `spawn()` again (or replacing the
 * backend in the pool) is the caller's decision.
 */

import { spawn as spawnProcess } from "node:child_process";
import type { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { Framer, type FrameEvent } from "../protocol/framer";
import {
  failureResponse,
  isNotification,
  isRequest,
  type JsonRpcMessage,
  type JsonRpcResponse,
  type RequestId,
  serializeMessage,
  successResponse,
} from "../protocol/messages";
import {
  BackendUnavailableError,
  CorrelationError,
  TimeoutError,
} from "./errors";
import { PendingTable } from "./pending-table";
import type {
  Backend,
  BackendDescriptor,
  BackendState,
  IncomingMessage,
  MessageHandler,
  SendOptions,
  ServerIdentity,
  StateHandler,
  TerminateOptions,
} from "./types";
import { describeError, type ScopedLogger, scoped } from "../util/logger";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_GRACE_MS = 5_000;
/** How long to wait for the exit event once SIGKILL has been sent. */
export const KILL_WAIT_MS = 250;

export const CLIENT_INFO = { name: "sparse-proxy", version: "0.1.0" };

/** The parts of a ChildProcess the connection relies on. */
export interface BackendProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessLauncher = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => BackendProcess;

export const launchProcess: ProcessLauncher = (command, args, env) =>
  spawnProcess(command, args, { env, stdio: ["pipe", "pipe", "pipe"] });

export interface BackendConnectionOptions {
  requestTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  graceMs?: number;
  maxSegmentBytes?: number;
  launch?: ProcessLauncher;
}

export interface ConnectionStats {
  framingErrors: number;
  correlationErrors: number;
  timeouts: number;
}

export class BackendConnection implements Backend {
  readonly name: string;
  readonly descriptor: BackendDescriptor;
  readonly builtin = false;
  readonly exposesAliases = false;
  readonly stats: ConnectionStats = {
    framingErrors: 0,
    correlationErrors: 0,
    timeouts: 0,
  };

  private _state: BackendState = "idle";
  private _identity: ServerIdentity = {};
  private process: BackendProcess | null = null;
  private framer: Framer;
  private pending: PendingTable;
  private messageHandlers = new Set<MessageHandler>();
  private stateHandlers = new Set<StateHandler>();
  private failure: string | null = null;
  private readonly requestTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly graceMs: number;
  private readonly launch: ProcessLauncher;
  private readonly logger: ScopedLogger;

  constructor(
    descriptor: BackendDescriptor,
    options: BackendConnectionOptions = {},
  ) {
    if (!descriptor.command || descriptor.command.length === 0) {
      throw new Error(`Backend ${descriptor.name} has no command to spawn`);
    }
    this.name = descriptor.name;
    this.descriptor = descriptor;
    this.requestTimeoutMs = options.requestTimeoutMs
      ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs
      ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.launch = options.launch ?? launchProcess;
    this.framer = new Framer({ maxSegmentBytes: options.maxSegmentBytes });
    this.pending = new PendingTable(descriptor.name);
    this.logger = scoped(descriptor.name);
  }

  get state(): BackendState {
    return this._state;
  }

  get identity(): ServerIdentity {
    return this._identity;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Launch the process and run the MCP handshake. Resolves once the backend
   * is ready; rejects with BackendUnavailableError otherwise, leaving the
   * connection terminated.
   */
  async spawn(): Promise<void> {
    if (this._state === "spawning" || this._state === "handshaking") {
      throw new Error(`Backend ${this.name} is already starting`);
    }
    if (this._state === "ready") return;

    this.framer.reset();
    this.failure = null;
    this._identity = {};
    this.setState("spawning");

    const [command, ...leadingArgs] = this.descriptor.command ?? [];
    if (!command) {
      this.markTerminated("no command configured");
      throw this.unavailable();
    }

    const proc = this.startProcess(command, [
      ...leadingArgs,
      ...this.descriptor.args,
    ]);
    if (!proc) {
      throw this.unavailable();
    }

    await this.waitForSpawn(proc);
    // terminate() may have run while the launch was pending.
    if (this._state === "terminated") throw this.unavailable();
    this.setState("handshaking");

    try {
      const response = await this.request(
        "initialize",
        {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: CLIENT_INFO,
        },
        { timeoutMs: this.handshakeTimeoutMs },
      );
      if ("error" in response) {
        throw new Error(`initialize failed: ${response.error.message}`);
      }
      this._identity = readIdentity(response.result);
      this.notify("notifications/initialized");
    } catch (err) {
      const reason = describeError(err);
      this.logger.warn(`Handshake failed: ${reason}`);
      await this.terminate({
        reason: new BackendUnavailableError(this.name, reason),
      });
      this.failure = `handshake failed: ${reason}`;
      throw this.unavailable();
    }

    this.setState("ready");
    this.logger.log(
      `Ready (pid ${proc.pid ?? "?"}, server ${
        String(this._identity.serverInfo?.name ?? "unknown")
      })`,
    );
  }

  /**
   * Send a request and wait for its response. Backend error responses resolve
   * normally; only transport-level failures reject.
   */
  send(
    method: string,
    params?: Record<string, unknown>,
    options: SendOptions = {},
  ): Promise<JsonRpcResponse> {
    if (this._state !== "ready") {
      return Promise.reject(this.unavailable());
    }
    return this.request(method, params, options);
  }

  notify(method: string, params?: Record<string, unknown>): void {
    if (!this.isWritable()) return;
    this.write(
      params === undefined
        ? { jsonrpc: "2.0", method }
        : { jsonrpc: "2.0", method, params },
    );
  }

  /** Answer a request the backend sent to us. */
  respond(response: JsonRpcResponse): void {
    if (!this.isWritable()) return;
    this.write(response);
  }

  onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onStateChange(handler: StateHandler): () => void {
    this.stateHandlers.add(handler);
    return () => {
      this.stateHandlers.delete(handler);
    };
  }

  /**
   * Stop the process: close stdin, SIGTERM, wait up to `graceMs`, then
   * SIGKILL and wait at most KILL_WAIT_MS more. Pending requests fail with `reason` (BackendUnavailable by
   * default) before the process is signalled.
   */
  async terminate(options: TerminateOptions = {}): Promise<void> {
    const graceMs = options.graceMs ?? this.graceMs;
    const reason = options.reason
      ?? new BackendUnavailableError(this.name, "terminated");
    const proc = this.process;

    this.failure ??= "terminated";
    this.markTerminated(reason.message, reason);

    if (!proc || hasExited(proc)) return;

    proc.stdin?.end();
    proc.kill("SIGTERM");
    if (await waitForExit(proc, graceMs)) return;

    this.logger.warn(`Did not exit within ${graceMs}ms, sending SIGKILL`);
    proc.kill("SIGKILL");
    if (!(await waitForExit(proc, Math.min(graceMs, KILL_WAIT_MS)))) {
      this.logger.warn("No exit event after SIGKILL");
    }
  }

  private request(
    method: string,
    params: Record<string, unknown> | undefined,
    options: SendOptions,
  ): Promise<JsonRpcResponse> {
    if (!this.isWritable()) {
      return Promise.reject(this.unavailable());
    }
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    const { id, promise } = this.pending.register(method, timeoutMs, () => {
      this.stats.timeouts++;
      this.logger.warn(`${method} (id ${id}) timed out after ${timeoutMs}ms`);
      return new TimeoutError(this.name, method, timeoutMs);
    });

    try {
      this.write(
        params === undefined
          ? { jsonrpc: "2.0", id, method }
          : { jsonrpc: "2.0", id, method, params },
      );
    } catch (err) {
      this.pending.reject(
        id,
        new BackendUnavailableError(this.name, `write failed: ${describeError(err)}`),
      );
    }
    return promise;
  }

  private startProcess(command: string, args: string[]): BackendProcess | null {
    let proc: BackendProcess;
    try {
      proc = this.launch(command, args, { ...process.env, ...this.descriptor.env });
    } catch (err) {
      this.failure = `failed to launch ${command}: ${describeError(err)}`;
      this.logger.error(this.failure);
      this.markTerminated(this.failure);
      return null;
    }
    this.process = proc;
    this.logger.log(`Spawning: ${[command, ...args].join(" ")}`);

    proc.on("error", (err: Error) => {
      if (this.process !== proc) return;
      this.failure = `process error: ${err.message}`;
      this.logger.error(this.failure);
      this.markTerminated(this.failure);
    });

    proc.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.process !== proc) return;
      const how = signal ? `signal ${signal}` : `code ${String(code)}`;
      this.logger.log(`Process exited with ${how}`);
      this.failure ??= `process exited with ${how}`;
      this.markTerminated(this.failure);
    });

    proc.stdin?.on("error", (err: Error) => {
      this.logger.warn(`stdin error: ${err.message}`);
    });

    const stdout = proc.stdout;
    if (stdout) {
      stdout.on("data", (chunk: Buffer | string) => {
        if (this.process !== proc) return;
        for (const event of this.framer.feed(chunk)) {
          this.handleFrame(event);
        }
      });
      stdout.on("end", () => {
        if (this.process !== proc) return;
        for (const event of this.framer.end()) {
          this.handleFrame(event);
        }
        this.failure ??= "output stream closed";
        this.markTerminated(this.failure);
      });
    }

    if (proc.stderr) {
      const lines = createInterface({ input: proc.stderr, crlfDelay: Infinity });
      lines.on("line", line => {
        if (line.trim()) this.logger.log(`stderr: ${line}`);
      });
    }

    return proc;
  }

  private waitForSpawn(proc: BackendProcess): Promise<void> {
    return new Promise((resolve, reject) => {
      const onSpawn = () => {
        proc.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        proc.off("spawn", onSpawn);
        this.failure = `failed to launch: ${err.message}`;
        this.markTerminated(this.failure);
        reject(this.unavailable());
      };
      proc.once("spawn", onSpawn);
      proc.once("error", onError);
    });
  }

  private handleFrame(event: FrameEvent): void {
    if (event.type === "error") {
      this.stats.framingErrors++;
      this.logger.warn(`${event.error.message}: ${event.error.segment}`);
      return;
    }
    this.dispatch(event.message);
  }

  private dispatch(message: JsonRpcMessage): void {
    if (isRequest(message) || isNotification(message)) {
      if (isRequest(message) && message.method === "ping") {
        this.respond(successResponse(message.id, {}));
        return;
      }
      this.emitMessage(message);
      return;
    }

    if (!this.pending.resolve(message.id, message)) {
      this.stats.correlationErrors++;
      this.logger.warn(new CorrelationError(this.name, message.id).message);
    }
  }

  private emitMessage(message: IncomingMessage): void {
    if (isRequest(message) && this.messageHandlers.size === 0) {
      this.respond(methodNotFound(message.id, message.method));
      return;
    }
    for (const handler of this.messageHandlers) {
      try {
        handler(message, this);
      } catch (err) {
        this.logger.error(`Message handler failed: ${describeError(err)}`);
      }
    }
  }

  private write(message: JsonRpcMessage): void {
    const stdin = this.process?.stdin;
    if (!stdin) {
      throw new Error("stdin is not available");
    }
    stdin.write(serializeMessage(message));
  }

  private isWritable(): boolean {
    const stdin = this.process?.stdin;
    return (this._state === "handshaking" || this._state === "ready")
      && !!stdin
      && !stdin.destroyed
      && !stdin.writableEnded;
  }

  private markTerminated(reason: string, error?: Error): void {
    const failed = this.pending.rejectAll(
      error ?? new BackendUnavailableError(this.name, reason),
    );
    if (failed > 0) {
      this.logger.warn(`Failed ${failed} pending request(s): ${reason}`);
    }
    this.setState("terminated");
  }

  private unavailable(): BackendUnavailableError {
    return new BackendUnavailableError(
      this.name,
      this.failure ?? `state is ${this._state}`,
    );
  }

  private setState(state: BackendState): void {
    if (this._state === state) return;
    this._state = state;
    for (const handler of this.stateHandlers) {
      try {
        handler(state, this);
      } catch (err) {
        this.logger.error(`State handler failed: ${describeError(err)}`);
      }
    }
  }
}

export function methodNotFound(id: RequestId, method: string): JsonRpcResponse {
  return failureResponse(id, {
    code: -32601,
    message: `Method not found: ${method}`,
  });
}

function readIdentity(result: unknown): ServerIdentity {
  const identity: ServerIdentity = {};
  if (!isRecord(result)) return identity;
  if (isRecord(result.serverInfo)) identity.serverInfo = result.serverInfo;
  if (isRecord(result.capabilities)) identity.capabilities = result.capabilities;
  if (typeof result.instructions === "string") {
    identity.instructions = result.instructions;
  }
  return identity;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasExited(proc: BackendProcess): boolean {
  return proc.exitCode !== null || proc.signalCode !== null;
}

function waitForExit(proc: BackendProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(proc)) return Promise.resolve(true);
  return new Promise(resolve => {
    const timer = setTimeout(() => {
      proc.off("exit", onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    proc.once("exit", onExit);
  });
}
