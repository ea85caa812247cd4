/**
 * Zod schemas for validating .sparse-proxy.json config files.
 */

import { z } from "zod";
import type { ConfigFile } from "./types";
import { MAX_TIMER_MS } from "../multiplexer/pending-table";

const delayMs = z.number().int().max(MAX_TIMER_MS);

const serverConfigSchema = z.object({
  command: z.union([
    z.array(z.string().min(1)).min(1),
    z.string().min(1),
    z.null(),
  ]),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  description: z.string().optional(),
});

const refreshSchema = z.object({
  onStartup: z.boolean().optional(),
  onListChanged: z.boolean().optional(),
  intervalMs: delayMs.positive().nullable().optional(),
});

export const configFileSchema = z.object({
  servers: z.record(z.string().min(1), serverConfigSchema).default({}),
  timeoutMs: delayMs.positive().optional(),
  handshakeTimeoutMs: delayMs.positive().optional(),
  shutdownGraceMs: delayMs.nonnegative().optional(),
  sparseMode: z.boolean().optional(),
  builtins: z.boolean().optional(),
  refresh: refreshSchema.optional(),
});

export type ValidatedConfig = z.infer<typeof configFileSchema>;

export function validateConfig(data: unknown): ConfigFile {
  return configFileSchema.parse(data);
}
