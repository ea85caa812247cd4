import { describe, expect, it } from "vitest";
import { ToolRegistry, type BackendInfo } from "../../src/multiplexer/tool-registry.js";
import { QuerySyntaxError } from "../../src/multiplexer/errors.js";
import { virtualToolDefinitions } from "../../src/multiplexer/virtual-tools.js";
import { makeTools } from "../helpers/fake-backend.js";

const ready = (description: string, extra: Partial<BackendInfo> = {}): BackendInfo => ({
  description,
  builtin: false,
  state: "ready",
  ...extra,
});

function populated(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.updateBackendTools("alpha", makeTools("a", 2), ready("Alpha server"));
  registry.updateBackendTools("beta", makeTools("b", 3), ready("Beta server"));
  return registry;
}

describe("ToolRegistry", () => {
  it("namespaces every tool with its backend", () => {
    const registry = populated();
    expect(registry.size).toBe(5);
    expect(registry.list().map(t => t.name)).toEqual([
      "alpha::a1",
      "alpha::a2",
      "beta::b1",
      "beta::b2",
      "beta::b3",
    ]);
    expect(registry.get("beta::b2")).toEqual({
      name: "beta::b2",
      originalName: "b2",
      backend: "beta",
      description: "b tool 2",
      inputSchema: { type: "object", properties: {} },
    });
  });

  it("returns undefined for unknown names", () => {
    const registry = populated();
    expect(registry.get("alpha::zzz")).toBeUndefined();
    expect(registry.get("gamma::a1")).toBeUndefined();
    expect(registry.get("a1")).toBeUndefined();
  });

  it("replaces a backend's tools without touching others", () => {
    const registry = populated();
    registry.updateBackendTools("alpha", makeTools("n", 1));
    expect(registry.getBackendTools("alpha").map(t => t.name)).toEqual(["alpha::n1"]);
    expect(registry.getBackendTools("beta")).toHaveLength(3);
    expect(registry.get("alpha::a1")).toBeUndefined();
  });

  it("removes tools but keeps status with removeBackendTools", () => {
    const registry = populated();
    registry.removeBackendTools("alpha");
    expect(registry.getBackendTools("alpha")).toEqual([]);
    expect(registry.hasBackend("alpha")).toBe(true);
    expect(registry.tree().servers.alpha?.toolCount).toBe(0);
  });

  it("forgets a backend entirely with removeBackend", () => {
    const registry = populated();
    registry.removeBackend("alpha");
    expect(registry.hasBackend("alpha")).toBe(false);
    expect(Object.keys(registry.tree().servers)).toEqual(["beta"]);
  });

  describe("aliases", () => {
    it("only publishes bare names for backends that ask for it", () => {
      const registry = populated();
      expect(registry.resolveAlias("a1")).toBeUndefined();

      registry.updateBackendTools("helper", makeTools("h", 1), ready("Helper", { builtin: true, aliases: true }));
      expect(registry.resolveAlias("h1")?.name).toBe("helper::h1");
    });

    it("never aliases a virtual tool name and keeps the first claim", () => {
      const registry = new ToolRegistry();
      const tools = [
        { name: "onboarding", inputSchema: {} },
        { name: "shared", inputSchema: {} },
      ];
      registry.updateBackendTools("one", tools, ready("One", { aliases: true }));
      registry.updateBackendTools("two", tools, ready("Two", { aliases: true }));

      expect(registry.resolveAlias("onboarding")).toBeUndefined();
      expect(registry.resolveAlias("shared")?.backend).toBe("one");

      registry.removeBackend("one");
      expect(registry.resolveAlias("shared")?.backend).toBe("two");
    });

    it("follows setBackendInfo changes", () => {
      const registry = new ToolRegistry();
      registry.updateBackendTools("helper", makeTools("h", 1));
      expect(registry.resolveAlias("h1")).toBeUndefined();
      registry.setBackendInfo("helper", ready("Helper", { aliases: true }));
      expect(registry.resolveAlias("h1")?.name).toBe("helper::h1");
    });
  });

  describe("tree", () => {
    it("builds the discovery document", () => {
      const registry = new ToolRegistry();
      registry.updateBackendTools(
        "alpha",
        [{ name: "read", inputSchema: { type: "object" } }],
        ready("Alpha server", {
          identity: { serverInfo: { name: "alpha-server", version: "2.0.0" }, instructions: "Read first" },
        }),
      );
      registry.setBackendInfo("down", { description: "Broken", builtin: false, state: "terminated" });

      expect(registry.tree()).toEqual({
        tools: [
          {
            name: "alpha::read",
            originalName: "read",
            server: "alpha",
            description: "",
            inputSchema: { type: "object" },
          },
        ],
        tool_names: ["alpha::read"],
        servers: {
          alpha: {
            name: "alpha",
            description: "Alpha server",
            builtin: false,
            state: "ready",
            toolCount: 1,
            serverInfo: { name: "alpha-server", version: "2.0.0" },
            instructions: "Read first",
          },
          down: {
            name: "down",
            description: "Broken",
            builtin: false,
            state: "terminated",
            toolCount: 0,
          },
        },
      });
    });
  });

  describe("query", () => {
    it("evaluates a path over the tree", () => {
      const registry = populated();
      expect(registry.query("$.tool_names[*]")).toHaveLength(5);
      expect(registry.query("$.tools[?(@.server == 'alpha')].originalName")).toEqual(["a1", "a2"]);
      expect(registry.query("$.servers.beta.toolCount")).toEqual([3]);
    });

    it("returns copies the caller cannot use to mutate the catalog", () => {
      const registry = populated();
      const [schema] = registry.query("$.tools[0].inputSchema");
      if (typeof schema === "object" && schema !== null) {
        Object.assign(schema, { injected: true });
      }
      expect(registry.get("alpha::a1")?.inputSchema).toEqual({ type: "object", properties: {} });
    });

    it("returns an empty list when nothing matches", () => {
      expect(populated().query("$.tools[?(@.server == 'nope')]")).toEqual([]);
    });

    it("propagates syntax errors", () => {
      expect(() => populated().query("$..name")).toThrow(QuerySyntaxError);
    });
  });

  it("serves the same sparse view regardless of catalog size", () => {
    const empty = new ToolRegistry();
    const full = populated();
    expect(full.sparseView()).toEqual(empty.sparseView());
    expect(full.sparseView().map(t => t.name)).toEqual(["mcp_discover", "mcp_call", "onboarding"]);
    expect(JSON.stringify(full.sparseView())).toBe(JSON.stringify(virtualToolDefinitions()));
  });

  it("honors a custom separator", () => {
    const registry = new ToolRegistry({ separator: "__" });
    registry.updateBackendTools("alpha", makeTools("a", 1));
    expect(registry.get("alpha__a1")?.originalName).toBe("a1");
  });
});
