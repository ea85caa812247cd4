/**
 * JSON-RPC 2.0 message model shared by the backend side and the caller side.
 */

import { z } from "zod";

export type RequestId = string | number;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: RequestId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: RequestId;
  /** Any JSON value; MCP methods answer with objects but JSON-RPC allows null or scalars. */
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: RequestId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

const requestIdSchema = z.union([z.string(), z.number()]);
const paramsSchema = z.record(z.string(), z.unknown());

const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: requestIdSchema,
  method: z.string(),
  params: paramsSchema.optional(),
});

// Any JSON value, but never absent.
const resultSchema = z.union([
  z.null(),
  z.boolean(),
  z.number(),
  z.string(),
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

const successSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: requestIdSchema,
  result: resultSchema,
});

const failureSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([requestIdSchema, z.null()]),
  error: errorObjectSchema,
});

const notificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: paramsSchema.optional(),
});

// Order matters: zod strips unknown keys, so a request would also satisfy
// the notification shape.
export const jsonRpcMessageSchema: z.ZodType<JsonRpcMessage, z.ZodTypeDef, unknown> = z.union([
  requestSchema,
  successSchema,
  failureSchema,
  notificationSchema,
]);

export function parseMessage(line: string): JsonRpcMessage {
  return jsonRpcMessageSchema.parse(JSON.parse(line));
}

export function serializeMessage(message: JsonRpcMessage): string {
  return `${JSON.stringify(message)}\n`;
}

export function isRequest(message: JsonRpcMessage): message is JsonRpcRequest {
  return "method" in message && "id" in message;
}

export function isNotification(
  message: JsonRpcMessage,
): message is JsonRpcNotification {
  return "method" in message && !("id" in message);
}

export function isResponse(
  message: JsonRpcMessage,
): message is JsonRpcResponse {
  return "result" in message || "error" in message;
}

export function isFailure(
  message: JsonRpcResponse,
): message is JsonRpcFailure {
  return "error" in message;
}

export function successResponse(id: RequestId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: "2.0", id, result };
}

/** The result of a success response when it is a JSON object, otherwise undefined. */
export function resultObject(
  response: JsonRpcSuccess,
): Record<string, unknown> | undefined {
  const { result } = response;
  if (typeof result !== "object" || result === null || Array.isArray(result)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(result));
}

export function failureResponse(
  id: RequestId | null,
  error: JsonRpcErrorObject,
): JsonRpcFailure {
  return { jsonrpc: "2.0", id, error };
}
