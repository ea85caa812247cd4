/**
 * Error taxonomy for the proxy. Every failure the caller can observe from
 * `call()` or `discover()` is exactly one of these kinds.
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { JsonRpcErrorObject } from "../protocol/messages";

export type ProxyErrorKind =
  | "FramingError"
  | "CorrelationError"
  | "TimeoutError"
  | "BackendUnavailable"
  | "UnknownTool"
  | "QuerySyntaxError"
  | "ShutdownError";

export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;
  abstract readonly code: number;

  toJsonRpcError(): JsonRpcErrorObject {
    return {
      code: this.code,
      message: this.message,
      data: { kind: this.kind },
    };
  }
}

/** A delimited segment of backend output that is not a JSON-RPC message. */
export class FramingError extends ProxyError {
  readonly kind = "FramingError";
  readonly code = ErrorCode.ParseError;
  readonly segment: string;

  constructor(message: string, segment: string) {
    super(message);
    this.name = "FramingError";
    this.segment = segment;
  }
}

/** A response whose id matches no pending request. */
export class CorrelationError extends ProxyError {
  readonly kind = "CorrelationError";
  readonly code = ErrorCode.InternalError;

  constructor(backend: string, id: unknown) {
    super(`${backend}: response id ${JSON.stringify(id)} matches no pending request`);
    this.name = "CorrelationError";
  }
}

export class TimeoutError extends ProxyError {
  readonly kind = "TimeoutError";
  readonly code = ErrorCode.RequestTimeout;

  constructor(backend: string, method: string, timeoutMs: number) {
    super(`${backend}: ${method} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class BackendUnavailableError extends ProxyError {
  readonly kind = "BackendUnavailable";
  readonly code = ErrorCode.ConnectionClosed;

  constructor(backend: string, reason: string) {
    super(`Backend ${backend} unavailable: ${reason}`);
    this.name = "BackendUnavailableError";
  }
}

export class UnknownToolError extends ProxyError {
  readonly kind = "UnknownTool";
  readonly code = ErrorCode.InvalidParams;

  constructor(message: string) {
    super(message);
    this.name = "UnknownToolError";
  }
}

export class QuerySyntaxError extends ProxyError {
  readonly kind = "QuerySyntaxError";
  readonly code = ErrorCode.InvalidParams;
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "QuerySyntaxError";
    this.position = position;
  }
}

export class ShutdownError extends ProxyError {
  readonly kind = "ShutdownError";
  readonly code = ErrorCode.ConnectionClosed;

  constructor(message = "Proxy is shutting down") {
    super(message);
    this.name = "ShutdownError";
  }
}

export function toJsonRpcError(err: unknown): JsonRpcErrorObject {
  if (err instanceof ProxyError) {
    return err.toJsonRpcError();
  }
  return {
    code: ErrorCode.InternalError,
    message: err instanceof Error ? err.message : String(err),
  };
}
