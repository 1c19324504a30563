// src/file-discovery.ts: XML file discovery
// git ls-files when the directory is inside a repository (honours .gitignore),
// otherwise a filesystem walk with symlink cycle detection. picomatch excludes.

import { readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import type { Warning } from "./types.js";

export const XML_EXTENSION = /\.xml$/i;

/** Directory names never descended into. */
export const DEFAULT_EXCLUDE_DIRS = [".git", "node_modules", "bin", "obj"] as const;

function isExcludedDir(name: string): boolean {
  return (DEFAULT_EXCLUDE_DIRS as readonly string[]).includes(name);
}

/**
 * Discover all `.xml` files under each directory, in sorted order per directory.
 * Exclude patterns are matched against paths relative to the scanned directory.
 */
export function discoverXmlFiles(
  dirs: readonly string[],
  excludePatterns: readonly string[] = [],
  warnings: Warning[] = [],
): string[] {
  const all: string[] = [];
  const seen = new Set<string>();
  for (const dir of dirs) {
    for (const file of discoverInDirectory(dir, excludePatterns, warnings)) {
      if (seen.has(file)) continue;
      seen.add(file);
      all.push(file);
    }
  }
  return all;
}

function discoverInDirectory(
  dir: string,
  excludePatterns: readonly string[],
  warnings: Warning[],
): string[] {
  const absDir = resolve(dir);

  const gitFiles = tryGitLsFiles(absDir);
  if (gitFiles !== null) {
    return filterAndSort(gitFiles, absDir, excludePatterns);
  }

  const visited = new Set<number>(); // inode set for symlink cycle detection
  const files: string[] = [];
  walkDirectory(absDir, absDir, files, visited, warnings);
  return filterAndSort(files, absDir, excludePatterns);
}

/**
 * Non-ignored files known to git, or null when git is unavailable or the
 * directory is not inside a repository.
 */
function tryGitLsFiles(dir: string): string[] | null {
  let output: string;
  try {
    output = execSync("git ls-files --cached --others --exclude-standard", {
      cwd: dir,
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    // not a repository, or no git on PATH
    return null;
  }

  const files: string[] = [];
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || !XML_EXTENSION.test(trimmed)) continue;
    if (trimmed.split("/").some(isExcludedDir)) continue;
    files.push(resolve(dir, trimmed));
  }
  return files;
}

function walkDirectory(
  dir: string,
  rootDir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (isExcludedDir(entry.name)) continue;
      walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        const stat = statSync(realPath);

        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino)) {
            warnings.push({
              level: "info",
              module: "file-discovery",
              message: `Symlink cycle detected at ${relative(rootDir, fullPath)}; skipped`,
              file: fullPath,
            });
            continue;
          }
          visitedInodes.add(stat.ino);
          if (!isExcludedDir(entry.name)) {
            walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
          }
        } else if (stat.isFile() && XML_EXTENSION.test(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && XML_EXTENSION.test(entry.name)) {
      results.push(fullPath);
    }
  }
}

function filterAndSort(
  files: string[],
  rootDir: string,
  excludePatterns: readonly string[],
): string[] {
  if (excludePatterns.length === 0) {
    return files.sort();
  }

  const isExcluded = picomatch([...excludePatterns], { dot: true });
  return files.filter((f) => !isExcluded(relative(rootDir, f))).sort();
}
