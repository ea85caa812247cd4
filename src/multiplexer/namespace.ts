/**
 * Tool name namespacing: "<backend>::<tool>".
 * E.g., "memory" + "read_graph" → "memory::read_graph"
 */

export const DEFAULT_SEPARATOR = "::";

export function namespaceTool(
  backendName: string,
  toolName: string,
  separator: string = DEFAULT_SEPARATOR,
): string {
  return `${backendName}${separator}${toolName}`;
}

export interface ParsedTool {
  backendName: string;
  toolName: string;
}

/**
 * Split a namespaced tool name into backend + tool.
 * The longest known backend prefix wins, so "a::b" and "a::b::c" can coexist.
 */
export function parseNamespacedTool(
  namespacedName: string,
  knownBackends: Iterable<string>,
  separator: string = DEFAULT_SEPARATOR,
): ParsedTool | null {
  const sorted = [...knownBackends].sort((a, b) => b.length - a.length);

  for (const backend of sorted) {
    const prefix = `${backend}${separator}`;
    if (namespacedName.startsWith(prefix) && namespacedName.length > prefix.length) {
      return {
        backendName: backend,
        toolName: namespacedName.slice(prefix.length),
      };
    }
  }

  return null;
}

export function isNamespaced(
  name: string,
  separator: string = DEFAULT_SEPARATOR,
): boolean {
  return name.includes(separator);
}
