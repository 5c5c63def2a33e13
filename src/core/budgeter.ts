import path from "node:path";

import type { CatalogEntry, FileCandidate } from "../utils/types.js";

/**
 * True when the file name without its extension contains any marker,
 * compared case-insensitively.
 */
export function isPriorityFile(relativePath: string, markers: readonly string[]): boolean {
  const base = path.posix.basename(relativePath);
  const stem = base.slice(0, base.length - path.posix.extname(base).length).toLowerCase();
  return markers.some((marker) => stem.includes(marker.toLowerCase()));
}

/**
 * Order files for review under an optional maximum count.
 *
 * A fractional limit is floored. With no limit (null, undefined, or nothing
 * above zero) or a list already within it, the input order is kept.
 * Otherwise priority files move to the front, each partition keeping its
 * original relative order, and the result is cut to the limit.
 */
export function budgetFiles(
  files: readonly CatalogEntry[],
  limit: number | null | undefined,
  markers: readonly string[],
): FileCandidate[] {
  const candidates = files.map((file) => ({
    ...file,
    priority: isPriorityFile(file.relativePath, markers),
  }));

  const cap = limit == null ? 0 : Math.floor(limit);
  if (!(cap > 0) || candidates.length <= cap) {
    return candidates;
  }

  const important = candidates.filter((file) => file.priority);
  const others = candidates.filter((file) => !file.priority);
  return [...important, ...others].slice(0, cap);
}
