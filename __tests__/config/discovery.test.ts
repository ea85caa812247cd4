import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  candidatePaths,
  CONFIG_FILENAME,
  discoverConfig,
} from "../../src/config/discovery.js";
import { DEFAULT_SETTINGS } from "../../src/config/types.js";

// Mock fs modules
const mockReadFile = vi.hoisted(() => vi.fn());
const mockExistsSync = vi.hoisted(() => vi.fn());

vi.mock("node:fs/promises", () => ({
  readFile: mockReadFile,
  default: { readFile: mockReadFile },
}));

vi.mock("node:fs", () => {
  const mocked = { existsSync: mockExistsSync };
  return { ...mocked, default: mocked };
});

const GLOBAL_PATH = join(homedir(), CONFIG_FILENAME);
const PROJECT_PATH = join(process.cwd(), CONFIG_FILENAME);

function files(contents: Record<string, unknown>): void {
  mockExistsSync.mockImplementation((path: string) => path in contents);
  mockReadFile.mockImplementation(async (path: string) => {
    const content = contents[path];
    return typeof content === "string" ? content : JSON.stringify(content);
  });
}

describe("candidatePaths", () => {
  it("lists the global file, then the project file", () => {
    expect(candidatePaths()).toEqual([GLOBAL_PATH, PROJECT_PATH]);
  });

  it("replaces the project file with an explicit path", () => {
    expect(candidatePaths({ configPath: "conf/proxy.json" })).toEqual([
      GLOBAL_PATH,
      resolve(process.cwd(), "conf/proxy.json"),
    ]);
  });
});

describe("discoverConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => {});
    mockExistsSync.mockReturnValue(false);
  });

  it("returns defaults when no config files exist", async () => {
    const result = await discoverConfig({});
    expect(result).toEqual({ ...DEFAULT_SETTINGS, servers: {}, configSources: [] });
    expect(mockReadFile).not.toHaveBeenCalled();
  });

  it("adds inline servers from --server flags", async () => {
    const result = await discoverConfig({
      inlineServers: [{ name: "test", command: "node server.js" }],
    });
    expect(result.servers.test).toEqual({ command: "node server.js" });
  });

  it("loads config from explicit path", async () => {
    files({
      "/custom/config.json": {
        servers: { memory: { command: ["npx", "-y", "memory-server"], description: "Graph memory" } },
        timeoutMs: 5000,
      },
    });

    const result = await discoverConfig({ configPath: "/custom/config.json" });
    expect(result.servers.memory).toEqual({
      command: ["npx", "-y", "memory-server"],
      description: "Graph memory",
    });
    expect(result.timeoutMs).toBe(5000);
    expect(result.configSources).toEqual(["/custom/config.json"]);
  });

  it("lets the project file override the global one", async () => {
    files({
      [GLOBAL_PATH]: {
        servers: {
          shared: { command: "global-shared" },
          home: { command: "home-only" },
        },
        sparseMode: false,
        refresh: { intervalMs: 60000 },
      },
      [PROJECT_PATH]: {
        servers: { shared: { command: "project-shared" } },
        sparseMode: true,
        refresh: { onListChanged: false },
      },
    });

    const result = await discoverConfig();

    expect(result.servers).toEqual({
      shared: { command: "project-shared" },
      home: { command: "home-only" },
    });
    expect(result.sparseMode).toBe(true);
    expect(result.refresh).toEqual({ onStartup: true, onListChanged: false, intervalMs: 60000 });
    expect(result.configSources).toEqual([GLOBAL_PATH, PROJECT_PATH]);
  });

  it("does not leak refresh settings into the defaults", async () => {
    files({ [PROJECT_PATH]: { refresh: { onStartup: false } } });
    await discoverConfig();
    expect(DEFAULT_SETTINGS.refresh.onStartup).toBe(true);
  });

  it("merges inline servers over config file servers", async () => {
    files({ [PROJECT_PATH]: { servers: { test: { command: "from-file" }, other: { command: "x" } } } });

    const result = await discoverConfig({
      inlineServers: [{ name: "test", command: "from-flag --fast" }],
    });
    expect(result.servers).toEqual({
      test: { command: "from-flag --fast" },
      other: { command: "x" },
    });
  });

  it("applies command-line overrides last", async () => {
    files({ [PROJECT_PATH]: { timeoutMs: 1000, builtins: true, sparseMode: true } });
    const result = await discoverConfig({ overrides: { timeoutMs: 2500, builtins: false, sparseMode: false } });
    expect(result).toMatchObject({ timeoutMs: 2500, builtins: false, sparseMode: false });
  });

  it("expands env vars in args and env", async () => {
    files({
      [PROJECT_PATH]: {
        servers: {
          api: {
            command: "api-server",
            args: ["--root", "${DATA_DIR}", "--mode=${MODE:-safe}"],
            env: { API_KEY: "${API_KEY}" },
          },
        },
      },
    });

    const result = await discoverConfig({ env: { DATA_DIR: "/srv/data", API_KEY: "test-secret" } });
    expect(result.servers.api).toEqual({
      command: "api-server",
      args: ["--root", "/srv/data", "--mode=safe"],
      env: { API_KEY: "test-secret" },
    });
  });

  it("skips a file with invalid JSON", async () => {
    files({ [GLOBAL_PATH]: "{ not json", [PROJECT_PATH]: { servers: { ok: { command: "ok" } } } });

    const result = await discoverConfig();
    expect(Object.keys(result.servers)).toEqual(["ok"]);
    expect(result.configSources).toEqual([PROJECT_PATH]);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining(`[sparse-proxy WARN] Skipping config ${GLOBAL_PATH}:`),
    );
  });

  it("skips a file that fails validation", async () => {
    files({ [PROJECT_PATH]: { servers: { bad: { command: 42 } } } });
    const result = await discoverConfig();
    expect(result.servers).toEqual({});
    expect(result.configSources).toEqual([]);
  });

  it("skips a file that cannot be read", async () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFile.mockRejectedValue(new Error("EACCES: permission denied"));
    const result = await discoverConfig();
    expect(result.configSources).toEqual([]);
  });
});
