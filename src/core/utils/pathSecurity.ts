/**
 * Path checks for file-system literals found in submitted code
 */

import path from "path";

export const MAX_PATH_LENGTH = 1024;

/**
 * True when a literal path stays inside one of the allowed prefixes once normalized.
 *
 * Rejects:
 * - relative paths (they resolve against an unknown working directory)
 * - null bytes and over-long paths
 * - URI-encoded traversal (%2e%2e%2f)
 * - ".." segments that climb out of the prefix
 */
export function isWithinAllowedPrefix(candidate: string, prefixes: readonly string[]): boolean {
  if (!candidate || candidate.length > MAX_PATH_LENGTH) return false;
  if (candidate.includes("\0")) return false;
  if (/%2e|%2f|%5c/i.test(candidate)) return false;

  const unified = candidate.replace(/\\/g, "/");
  if (!path.posix.isAbsolute(unified)) return false;

  const normalized = path.posix.normalize(unified);
  return prefixes.some((prefix) => {
    const base = path.posix.normalize(prefix.endsWith("/") ? prefix : `${prefix}/`);
    return normalized.startsWith(base) && normalized.length > base.length;
  });
}
