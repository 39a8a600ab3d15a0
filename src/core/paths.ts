import type { PathFilter } from "./types.js";

function toForwardSlashes(value: string): string {
  return value.replace(/\\/g, "/");
}

export function normalizeRepoPath(raw: string): string {
  const cleaned = toForwardSlashes(raw.trim());
  return cleaned.replace(/^\/+/, "").replace(/^\.\//, "");
}

export function normalizePrefix(raw: string): string {
  return normalizeRepoPath(raw).replace(/\/+$/, "");
}

export function isUnderPrefix(path: string, prefix: string): boolean {
  if (!prefix) return false;
  if (path === prefix) return true;
  return path.startsWith(`${prefix}/`);
}

/**
 * Include prefixes narrow the candidate set (empty means everything);
 * exclude prefixes always win.
 */
export function matchesPathFilter(rawPath: string, filter: PathFilter): boolean {
  const path = normalizeRepoPath(rawPath);
  const include = filter.include.map(normalizePrefix).filter((prefix) => prefix.length > 0);
  const exclude = filter.exclude.map(normalizePrefix).filter((prefix) => prefix.length > 0);

  if (exclude.some((prefix) => isUnderPrefix(path, prefix))) return false;
  if (include.length === 0) return true;
  return include.some((prefix) => isUnderPrefix(path, prefix));
}
