import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the separator used inside zip archives
 * and generated templates regardless of the host platform.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Builds a search-path variable value (such as PYTHONPATH) from ordered entries,
 * appending any inherited value after them.
 *
 * @param entries Directories to place first, in order.
 * @param inherited The value already present in the environment, if any.
 * @param delimiter Separator between entries; the platform's by default.
 */
export function joinSearchPath(
  entries: string[],
  inherited?: string,
  delimiter: string = path.delimiter,
): string {
  const parts = [...entries];
  if (inherited) {
    parts.push(inherited);
  }
  return parts.join(delimiter);
}

/**
 * Logical id safe for CloudFormation: the function name with underscores removed,
 * suffixed with "Function".
 */
export function functionLogicalId(functionName: string): string {
  return `${functionName.replace(/_/g, '')}Function`;
}
