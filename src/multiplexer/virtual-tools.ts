/**
 * The three tools a caller sees in sparse mode. They exist only in the proxy:
 * `mcp_discover` queries the registry, `mcp_call` re-dispatches an embedded
 * JSON-RPC request, and `onboarding` is forwarded to the onboarding built-in.
 */

import { z } from "zod";
import type { CallToolResult, ToolInfo } from "./types";

export const MCP_DISCOVER = "mcp_discover";
export const MCP_CALL = "mcp_call";
export const ONBOARDING = "onboarding";

export const VIRTUAL_TOOL_NAMES: ReadonlySet<string> = new Set([
  MCP_DISCOVER,
  MCP_CALL,
  ONBOARDING,
]);

export const DEFAULT_DISCOVER_PATH = "$.tools[*]";

// Descriptions are fixed text: no tool or server counts, so the sparse view
// stays byte-identical as backends come and go.
const DEFINITIONS: readonly ToolInfo[] = [
  {
    name: MCP_DISCOVER,
    description:
      "Discover available tools and servers with a JSONPath query over "
      + "{ tools, tool_names, servers }. Supports field access, wildcards "
      + "and filters, e.g. $.tools[?(@.server=='memory')].name",
    inputSchema: {
      type: "object",
      properties: {
        jsonpath: {
          type: "string",
          description: "JSONPath expression (e.g., '$.tools[*].name')",
        },
      },
      required: ["jsonpath"],
    },
  },
  {
    name: MCP_CALL,
    description:
      "Execute any backend method by constructing a JSON-RPC call. "
      + "Address tools as '<server>::<tool>' or pass params.server.",
    inputSchema: {
      type: "object",
      properties: {
        method: {
          type: "string",
          description: "JSON-RPC method (e.g., 'tools/call')",
        },
        params: {
          type: "object",
          description: "Method parameters",
        },
      },
      required: ["method", "params"],
    },
  },
  {
    name: ONBOARDING,
    description:
      "Get or set identity-specific onboarding instructions for AI contexts.",
    inputSchema: {
      type: "object",
      properties: {
        identity: {
          type: "string",
          description: "Identity for onboarding (e.g., 'Claude', project name)",
        },
        instructions: {
          type: "string",
          description:
            "Optional: set new instructions. If omitted, retrieves existing.",
        },
        append: {
          type: "boolean",
          description: "Append to existing instructions instead of replacing",
          default: false,
        },
      },
      required: ["identity"],
    },
  },
];

/** Fresh copies of the meta-tool definitions. */
export function virtualToolDefinitions(): ToolInfo[] {
  return structuredClone([...DEFINITIONS]);
}

export function isVirtualTool(name: string): boolean {
  return VIRTUAL_TOOL_NAMES.has(name);
}

const discoverArgumentsSchema = z.object({
  jsonpath: z.string().optional(),
});

export function discoverPath(args: Record<string, unknown>): string {
  const parsed = discoverArgumentsSchema.safeParse(args);
  const path = parsed.success ? parsed.data.jsonpath : undefined;
  return path?.trim() ? path : DEFAULT_DISCOVER_PATH;
}

export function discoverResult(matches: unknown[]): CallToolResult {
  return {
    content: [{
      type: "text",
      text: matches.length > 0 ? JSON.stringify(matches, null, 2) : "No matches found",
    }],
  };
}

const callArgumentsSchema = z.object({
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export interface EmbeddedCall {
  method: string;
  params: Record<string, unknown>;
}

/** Unwrap `mcp_call` arguments; null when `method` is missing or not a string. */
export function parseEmbeddedCall(
  args: Record<string, unknown>,
): EmbeddedCall | null {
  const parsed = callArgumentsSchema.safeParse(args);
  if (!parsed.success) return null;
  return { method: parsed.data.method, params: parsed.data.params ?? {} };
}
