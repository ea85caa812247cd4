import { beforeEach, describe, expect, it } from "vitest";
import {
  createOnboardingBackend,
  OnboardingStore,
  sanitizeIdentity,
} from "../../src/builtin/onboarding.js";
import type { BuiltinBackend } from "../../src/multiplexer/builtin-backend.js";
import { resultObject } from "../../src/protocol/messages.js";

function clock(...isoTimes: string[]): () => Date {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)] ?? "2026-01-01T00:00:00.000Z");
}

async function call(backend: BuiltinBackend, name: string, args: Record<string, unknown> = {}) {
  const response = await backend.send("tools/call", { name, arguments: args });
  if (!("result" in response)) throw new Error(response.error.message);
  const result = resultObject(response);
  const content = result?.content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  const text = typeof first === "object" && first !== null && "text" in first ? first.text : undefined;
  return { text, isError: result?.isError === true };
}

describe("sanitizeIdentity", () => {
  it("flattens path and namespace separators", () => {
    expect(sanitizeIdentity("team/app\\win:main")).toBe("team_app_win_main");
    expect(sanitizeIdentity("Claude")).toBe("Claude");
  });
});

describe("OnboardingStore", () => {
  it("sets, replaces and appends instructions with history", () => {
    const store = new OnboardingStore({
      now: clock("2026-03-01T10:00:00.000Z", "2026-03-02T10:00:00.000Z", "2026-03-03T10:00:00.000Z"),
    });

    store.set("dev", "first");
    store.set("dev", "second", true);
    expect(store.get("dev")).toEqual({
      identity: "dev",
      current: "first\n\nsecond",
      createdAt: "2026-03-01T10:00:00.000Z",
      updatedAt: "2026-03-02T10:00:00.000Z",
      history: [
        { timestamp: "2026-03-01T10:00:00.000Z", instructions: "first" },
        { timestamp: "2026-03-02T10:00:00.000Z", instructions: "second" },
      ],
    });

    const replaced = store.set("dev", "fresh");
    expect(replaced.current).toBe("fresh");
    expect(replaced.createdAt).toBe("2026-03-03T10:00:00.000Z");
    expect(replaced.history).toHaveLength(1);
  });

  it("appending to a missing identity creates it", () => {
    const store = new OnboardingStore();
    expect(store.set("new", "only", true).current).toBe("only");
  });

  it("keys records by sanitized identity", () => {
    const store = new OnboardingStore();
    store.set("a/b", "x");
    expect(store.get("a_b")?.identity).toBe("a_b");
    expect(store.delete("a/b")).toBe(true);
    expect(store.list()).toEqual([]);
  });
});

describe("onboarding backend", () => {
  let store: OnboardingStore;
  let backend: BuiltinBackend;

  beforeEach(async () => {
    store = new OnboardingStore({ now: clock("2026-05-04T08:30:00.000Z", "2026-05-06T09:00:00.000Z") });
    backend = createOnboardingBackend(store);
    await backend.spawn();
  });

  it("publishes four tools under bare aliases", async () => {
    expect(backend.exposesAliases).toBe(true);
    const response = await backend.send("tools/list");
    const listed = "result" in response ? resultObject(response)?.tools : undefined;
    const tools = Array.isArray(listed) ? listed : [];
    expect(tools.map((t: { name: string; }) => t.name)).toEqual([
      "onboarding",
      "onboarding_list",
      "onboarding_delete",
      "onboarding_export",
    ]);
  });

  it("explains how to add instructions for an unknown identity", async () => {
    expect(await call(backend, "onboarding", { identity: "ops:prod" })).toEqual({
      text: "# Onboarding for ops_prod\n\nNo onboarding instructions found.\n\n"
        + "To add onboarding, use:\nonboarding(identity='ops_prod', instructions='Your instructions here')",
      isError: false,
    });
  });

  it("sets and then shows instructions", async () => {
    expect((await call(backend, "onboarding", { identity: "dev", instructions: "Use pnpm" })).text).toBe(
      "Onboarding set for dev.\n\nInstructions:\nUse pnpm",
    );
    expect((await call(backend, "onboarding", { identity: "dev", instructions: "Run tests", append: true })).text)
      .toBe("Onboarding appended for dev.\n\nInstructions:\nRun tests");

    expect((await call(backend, "onboarding", { identity: "dev" })).text).toBe([
      "# Onboarding for dev",
      "",
      "**Created**: 2026-05-04T08:30:00.000Z",
      "**Updated**: 2026-05-06T09:00:00.000Z",
      "**Revisions**: 2",
      "",
      "## Instructions",
      "",
      "Use pnpm\n\nRun tests",
      "",
      "---",
      "",
      "*To update these instructions, use:*",
      "`onboarding(identity='dev', instructions='New instructions', append=True/False)`",
    ].join("\n"));
  });

  it("reports invalid arguments as an error result", async () => {
    expect(await call(backend, "onboarding", { identity: "" })).toEqual({
      text: "Error: identity is required",
      isError: true,
    });
  });

  it("lists identities", async () => {
    expect((await call(backend, "onboarding_list")).text).toBe("No onboarding identities found.");
    store.set("dev", "a");
    expect((await call(backend, "onboarding_list")).text).toBe(
      "# Available Onboarding Identities\n\n- **dev**: Created 2026-05-04, Updated 2026-05-04, 1 revision(s)",
    );
  });

  it("deletes an identity", async () => {
    store.set("dev", "a");
    expect((await call(backend, "onboarding_delete", { identity: "dev" })).text).toBe("Deleted onboarding for dev");
    expect((await call(backend, "onboarding_delete", { identity: "dev" })).text).toBe("No onboarding found for dev");
  });

  it("exports as JSON", async () => {
    store.set("dev", "a");
    const { text } = await call(backend, "onboarding_export", { format: "json" });
    expect(JSON.parse(String(text))).toEqual({
      dev: {
        identity: "dev",
        current: "a",
        createdAt: "2026-05-04T08:30:00.000Z",
        updatedAt: "2026-05-04T08:30:00.000Z",
        history: [{ timestamp: "2026-05-04T08:30:00.000Z", instructions: "a" }],
      },
    });
  });

  it("exports as markdown with history", async () => {
    store.set("dev", "a");
    store.set("dev", "b", true);
    expect((await call(backend, "onboarding_export")).text).toBe([
      "# All Onboarding Data\n",
      "## dev\n",
      "**Created**: 2026-05-04T08:30:00.000Z",
      "**Updated**: 2026-05-06T09:00:00.000Z",
      "\n### Current Instructions\n",
      "a\n\nb",
      "\n### History (2 revisions)\n",
      "#### Revision 1 - 2026-05-04",
      "a",
      "",
      "#### Revision 2 - 2026-05-06",
      "b",
      "",
      "\n---\n",
    ].join("\n"));
  });

  it("rejects an unknown export format", async () => {
    expect((await call(backend, "onboarding_export", { format: "xml" })).isError).toBe(true);
  });
});
