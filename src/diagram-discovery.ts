// src/diagram-discovery.ts — Diagram file discovery
// Lists *.mmd files directly inside a directory (no recursion), sorted by name.

import { readdirSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import picomatch from "picomatch";
import { DirectoryNotFoundError } from "./errors.js";
import { DIAGRAM_EXTENSION, type Warning } from "./types.js";

/**
 * Throws DirectoryNotFoundError when `dir` is missing or is not a directory.
 * `label` is how the error names it (defaults to `dir`).
 */
export function assertDirectory(dir: string, label = dir): void {
  let isDir = false;
  try {
    isDir = statSync(dir).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) throw new DirectoryNotFoundError(label);
}

/**
 * Discover diagram sources in `diagramDir`. Returns absolute paths.
 * Symlinks that resolve to regular files count; subdirectories are never entered.
 */
export function discoverDiagrams(
  diagramDir: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const absDir = resolve(diagramDir);
  assertDirectory(absDir);

  const isExcluded = excludePatterns.length > 0
    ? picomatch(excludePatterns, { dot: true })
    : () => false;

  const files: string[] = [];
  for (const entry of readdirSync(absDir, { withFileTypes: true })) {
    if (!entry.name.endsWith(DIAGRAM_EXTENSION)) continue;
    if (isExcluded(entry.name)) continue;

    const fullPath = join(absDir, entry.name);
    if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      try {
        if (statSync(fullPath).isFile()) files.push(fullPath);
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "diagram-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    }
  }

  return files.sort();
}
