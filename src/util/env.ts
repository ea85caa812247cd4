/**
 * Expand ${VAR} and ${VAR:-default} references in string values from
 * process.env. `:-` falls back when the variable is unset or empty.
 */

import { warn } from "./logger";

const ENV_VAR_RE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(
    ENV_VAR_RE,
    (_, varName: string, fallback: string | undefined) => {
      const current = env[varName];
      if (fallback !== undefined) {
        return current ? current : fallback;
      }
      if (current === undefined) {
        warn(`Environment variable '${varName}' is not set, substituting an empty string`);
      }
      return current ?? "";
    },
  );
}

export function expandEnvRecord(
  record: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = expandEnvVars(value, env);
  }
  return result;
}

export function expandEnvList(
  values: string[],
  env: Record<string, string | undefined> = process.env,
): string[] {
  return values.map(value => expandEnvVars(value, env));
}
