/**
 * Onboarding built-in: identity-keyed instructions that one AI context can
 * leave for the next. Records live in memory for the life of the proxy.
 */

import { z } from "zod";
import {
  BuiltinBackend,
  type BuiltinTool,
  textResult,
} from "../multiplexer/builtin-backend";

export const ONBOARDING_BACKEND = "onboarding";

export interface OnboardingRevision {
  timestamp: string;
  instructions: string;
}

export interface OnboardingRecord {
  identity: string;
  current: string;
  createdAt: string;
  updatedAt: string;
  history: OnboardingRevision[];
}

/** Identities become keys; path and namespace separators are flattened. */
export function sanitizeIdentity(identity: string): string {
  return identity.replace(/[/\\:]/g, "_");
}

export class OnboardingStore {
  private records = new Map<string, OnboardingRecord>();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date; } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get(identity: string): OnboardingRecord | undefined {
    return this.records.get(sanitizeIdentity(identity));
  }

  set(identity: string, instructions: string, append = false): OnboardingRecord {
    const key = sanitizeIdentity(identity);
    const timestamp = this.now().toISOString();
    const existing = this.records.get(key);

    const record: OnboardingRecord = existing && append
      ? {
        ...existing,
        current: `${existing.current}\n\n${instructions}`,
        updatedAt: timestamp,
        history: [...existing.history, { timestamp, instructions }],
      }
      : {
        identity: key,
        current: instructions,
        createdAt: timestamp,
        updatedAt: timestamp,
        history: [{ timestamp, instructions }],
      };
    this.records.set(key, record);
    return record;
  }

  delete(identity: string): boolean {
    return this.records.delete(sanitizeIdentity(identity));
  }

  list(): OnboardingRecord[] {
    return [...this.records.values()];
  }
}

const onboardingArgs = z.object({
  identity: z.string().min(1, "identity is required"),
  instructions: z.string().optional(),
  append: z.boolean().default(false),
});

const identityArgs = z.object({
  identity: z.string().min(1, "identity is required"),
});

const exportArgs = z.object({
  format: z.enum(["json", "markdown"]).default("markdown"),
});

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map(issue => issue.message).join("; "));
  }
  return parsed.data;
}

function formatRecord(record: OnboardingRecord): string {
  return [
    `# Onboarding for ${record.identity}`,
    "",
    `**Created**: ${record.createdAt}`,
    `**Updated**: ${record.updatedAt}`,
    `**Revisions**: ${record.history.length}`,
    "",
    "## Instructions",
    "",
    record.current,
    "",
    "---",
    "",
    "*To update these instructions, use:*",
    `\`onboarding(identity='${record.identity}', instructions='New instructions', append=True/False)\``,
  ].join("\n");
}

function formatExport(records: OnboardingRecord[]): string {
  const lines = ["# All Onboarding Data\n"];
  for (const record of records) {
    lines.push(`## ${record.identity}\n`);
    lines.push(`**Created**: ${record.createdAt}`);
    lines.push(`**Updated**: ${record.updatedAt}`);
    lines.push("\n### Current Instructions\n");
    lines.push(record.current);
    if (record.history.length > 1) {
      lines.push(`\n### History (${record.history.length} revisions)\n`);
      record.history.forEach((entry, i) => {
        lines.push(`#### Revision ${i + 1} - ${entry.timestamp.slice(0, 10)}`);
        lines.push(entry.instructions);
        lines.push("");
      });
    }
    lines.push("\n---\n");
  }
  return lines.join("\n");
}

export function onboardingTools(store: OnboardingStore): BuiltinTool[] {
  return [
    {
      name: "onboarding",
      description: "Get or set onboarding instructions for a specific identity",
      inputSchema: {
        type: "object",
        properties: {
          identity: {
            type: "string",
            description: "The identity to get/set onboarding for (e.g., 'Claude', project name)",
          },
          instructions: {
            type: "string",
            description: "Optional: new instructions to set. If not provided, retrieves existing.",
          },
          append: {
            type: "boolean",
            description: "If true, append to existing instructions instead of replacing",
            default: false,
          },
        },
        required: ["identity"],
      },
      handler: args => {
        const { identity, instructions, append } = parseArgs(onboardingArgs, args);
        const key = sanitizeIdentity(identity);

        if (instructions === undefined) {
          const record = store.get(key);
          if (record) return textResult(formatRecord(record));
          return textResult(
            `# Onboarding for ${key}\n\n`
              + "No onboarding instructions found.\n\n"
              + "To add onboarding, use:\n"
              + `onboarding(identity='${key}', instructions='Your instructions here')`,
          );
        }

        store.set(key, instructions, append);
        return textResult(
          `Onboarding ${append ? "appended" : "set"} for ${key}.\n\nInstructions:\n${instructions}`,
        );
      },
    },
    {
      name: "onboarding_list",
      description: "List all available onboarding identities",
      inputSchema: { type: "object", properties: {} },
      handler: () => {
        const records = store.list();
        if (records.length === 0) {
          return textResult("No onboarding identities found.");
        }
        const lines = records.map(r =>
          `- **${r.identity}**: Created ${r.createdAt.slice(0, 10)}, `
          + `Updated ${r.updatedAt.slice(0, 10)}, ${r.history.length} revision(s)`
        );
        return textResult(`# Available Onboarding Identities\n\n${lines.join("\n")}`);
      },
    },
    {
      name: "onboarding_delete",
      description: "Delete onboarding for a specific identity",
      inputSchema: {
        type: "object",
        properties: {
          identity: {
            type: "string",
            description: "The identity to delete onboarding for",
          },
        },
        required: ["identity"],
      },
      handler: args => {
        const key = sanitizeIdentity(parseArgs(identityArgs, args).identity);
        return textResult(
          store.delete(key) ? `Deleted onboarding for ${key}` : `No onboarding found for ${key}`,
        );
      },
    },
    {
      name: "onboarding_export",
      description: "Export all onboarding data",
      inputSchema: {
        type: "object",
        properties: {
          format: { type: "string", enum: ["json", "markdown"], default: "markdown" },
        },
      },
      handler: args => {
        const { format } = parseArgs(exportArgs, args);
        const records = store.list();
        if (format === "json") {
          return textResult(
            JSON.stringify(Object.fromEntries(records.map(r => [r.identity, r])), null, 2),
          );
        }
        return textResult(formatExport(records));
      },
    },
  ];
}

export function createOnboardingBackend(
  store: OnboardingStore = new OnboardingStore(),
): BuiltinBackend {
  return new BuiltinBackend({
    name: ONBOARDING_BACKEND,
    description: "Identity-aware onboarding instructions (built-in)",
    instructions: "Use the onboarding tool to read or leave instructions for an identity.",
    tools: onboardingTools(store),
    aliases: true,
  });
}
