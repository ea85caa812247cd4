import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CallToolRequestSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { ProxyCallToolRequestSchema, ProxyServer } from "../../src/multiplexer/proxy-server.js";
import { SparseProxy } from "../../src/multiplexer/sparse-proxy.js";
import { TimeoutError } from "../../src/multiplexer/errors.js";

// Mock the MCP SDK Server and transport using class syntax
const mockConnect = vi.hoisted(() => vi.fn());
const mockClose = vi.hoisted(() => vi.fn());
const mockSetRequestHandler = vi.hoisted(() => vi.fn());

vi.mock("@modelcontextprotocol/sdk/server/index.js", () => ({
  Server: class MockServer {
    connect = mockConnect;
    close = mockClose;
    setRequestHandler = mockSetRequestHandler;
    constructor() {}
  },
}));

vi.mock("@modelcontextprotocol/sdk/server/stdio.js", () => ({
  StdioServerTransport: class MockTransport {
    constructor() {}
  },
}));

type Handler = (request: unknown) => Promise<unknown>;

function handler(index: number): Handler {
  return mockSetRequestHandler.mock.calls[index][1] as Handler;
}

const listTools = () => handler(0)({ method: "tools/list", params: {} });
// The SDK parses each request with the registered schema before the handler runs.
const callTool = (params: Record<string, unknown>) =>
  handler(1)(ProxyCallToolRequestSchema.parse({ method: "tools/call", params }));

describe("ProxyServer", () => {
  let proxy: SparseProxy;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => {});
    proxy = new SparseProxy();
    await proxy.start([]);
  });

  afterEach(async () => {
    await proxy.shutdown();
    vi.restoreAllMocks();
  });

  it("creates server and registers handlers", () => {
    new ProxyServer(proxy);
    expect(mockSetRequestHandler).toHaveBeenCalledTimes(2);
  });

  it("serves via StdioServerTransport", async () => {
    const server = new ProxyServer(proxy);
    await server.serve();
    expect(mockConnect).toHaveBeenCalledTimes(1);
  });

  it("closes the server", async () => {
    const server = new ProxyServer(proxy);
    await server.close();
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  it("list tools handler returns the sparse view", async () => {
    new ProxyServer(proxy);
    const result = await listTools();
    expect(result).toEqual({ tools: proxy.registry.sparseView() });
  });

  it("call tool handler runs virtual tools", async () => {
    new ProxyServer(proxy);
    const result = await callTool({
      name: "mcp_discover",
      arguments: { jsonpath: "$.servers.onboarding.toolCount" },
    });
    expect(result).toEqual({ content: [{ type: "text", text: "[\n  4\n]" }] });
  });

  it("registers tools/call with a schema that keeps params.server", () => {
    new ProxyServer(proxy);
    expect(mockSetRequestHandler.mock.calls[1][0]).toBe(ProxyCallToolRequestSchema);

    const raw = {
      method: "tools/call",
      params: { name: "read", server: "fs", arguments: { path: "a.txt" } },
    };
    const sdk = CallToolRequestSchema.parse(raw);
    const ours = ProxyCallToolRequestSchema.parse(raw);
    expect(ours.params).toEqual({ name: "read", server: "fs", arguments: { path: "a.txt" } });
    expect(ours.params.name).toBe(sdk.params.name);
    expect(ours.params.arguments).toEqual(sdk.params.arguments);
  });

  it("keeps request metadata alongside server", () => {
    const parsed = ProxyCallToolRequestSchema.parse({
      method: "tools/call",
      params: { name: "read", server: "fs", _meta: { progressToken: 7 } },
    });
    expect(parsed.params).toEqual({ name: "read", server: "fs", _meta: { progressToken: 7 } });
  });

  it("routes by params.server to a backend without a prefix", async () => {
    const spy = vi.spyOn(proxy, "callTool");
    new ProxyServer(proxy);
    await callTool({ name: "onboarding_list", server: "onboarding" });
    expect(spy).toHaveBeenCalledWith("onboarding_list", {}, "onboarding");
  });

  it("call tool handler passes params.server through", async () => {
    new ProxyServer(proxy);
    const result = await callTool({ name: "onboarding_list", server: "onboarding" });
    expect(result).toEqual({ content: [{ type: "text", text: "No onboarding identities found." }] });
  });

  it("turns taxonomy errors into structured MCP errors", async () => {
    new ProxyServer(proxy);
    const failure = callTool({ name: "nowhere::tool", arguments: {} });
    await expect(failure).rejects.toBeInstanceOf(McpError);
    await expect(failure).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
      data: { kind: "UnknownTool" },
    });
  });

  it("reports query syntax errors as invalid params", async () => {
    new ProxyServer(proxy);
    await expect(callTool({ name: "mcp_discover", arguments: { jsonpath: "$[0:1]" } })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
      data: { kind: "QuerySyntaxError" },
    });
  });

  it("keeps a timeout's code and kind", async () => {
    vi.spyOn(proxy, "callTool").mockRejectedValue(new TimeoutError("memory", "tools/call", 100));
    new ProxyServer(proxy);
    await expect(callTool({ name: "memory::read_graph" })).rejects.toMatchObject({
      code: ErrorCode.RequestTimeout,
      data: { kind: "TimeoutError" },
    });
  });

  it("re-raises a backend error response with the backend's code", async () => {
    vi.spyOn(proxy, "callTool").mockResolvedValue({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32000, message: "disk full" },
    });
    new ProxyServer(proxy);
    await expect(callTool({ name: "fs::write" })).rejects.toMatchObject({ code: -32000 });
  });

  it("rejects a malformed backend result", async () => {
    vi.spyOn(proxy, "callTool").mockResolvedValue({
      jsonrpc: "2.0",
      id: 1,
      result: { content: "not an array" },
    });
    new ProxyServer(proxy);
    const failure = callTool({ name: "fs::read" });
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.InternalError });
    await expect(failure).rejects.toThrow("Backend returned a malformed tool result for fs::read");
  });

  it("maps unexpected failures to internal errors", async () => {
    vi.spyOn(proxy, "listTools").mockRejectedValue(new Error("upstream down"));
    new ProxyServer(proxy);
    await expect(listTools()).rejects.toMatchObject({ code: ErrorCode.InternalError });
  });
});
