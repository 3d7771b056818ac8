/**
 * Path helpers: local names for remote objects, state keys, exclusion globs
 * and containment checks.
 */

import * as path from "path";
import { minimatch } from "minimatch";

const UNSAFE_CHARS = /[<>:"/\\|?*]/g;

/**
 * Turn a remote display name into a safe local file or directory name.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    .replace(UNSAFE_CHARS, "_")
    .replace(/[_\s]+/g, "_")
    .replace(/^[_ ]+|[_ ]+$/g, "");
  return cleaned.length > 0 ? cleaned : "unnamed";
}

/**
 * Key under which a file is tracked: relative to the base directory,
 * "/"-separated, no leading "./".
 */
export function normalizeStatePath(filePath: string, baseDir?: string): string {
  const relative = baseDir ? path.relative(baseDir, path.resolve(baseDir, filePath)) : filePath;
  return relative
    .split(path.sep)
    .join("/")
    .replace(/\\/g, "/")
    .replace(/^(\.\/)+/, "");
}

/**
 * True when the relative path or its last segment matches any pattern.
 */
export function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) {
    return false;
  }
  const normalized = relativePath.replace(/\\/g, "/").replace(/^\/+/, "");
  const leaf = normalized.split("/").pop() ?? normalized;
  return patterns.some(
    (pattern) =>
      minimatch(normalized, pattern, { dot: true }) || minimatch(leaf, pattern, { dot: true })
  );
}

/**
 * True when `candidate` is `root` or lies underneath it.
 * Compares resolved paths segment by segment, not as string prefixes.
 */
export function isWithin(candidate: string, root: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return relative === "" || (relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative));
}

/**
 * Join "/"-separated remote path segments, skipping empty ones.
 */
export function joinRemotePath(...segments: string[]): string {
  return segments.filter((segment) => segment.length > 0).join("/");
}
