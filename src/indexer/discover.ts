/**
 * markdown discovery — recursive walk of the source root.
 *
 * rules:
 *   - only regular files ending in .md
 *   - a path segment starting with an ignored prefix drops the file (and the
 *     whole directory is not descended into)
 *   - the destination file never indexes itself (base name, case-insensitive)
 *   - a missing source root yields nothing
 */

import { existsSync, readdirSync, statSync, type Dirent } from "fs";
import { basename, join, sep } from "path";

export interface DiscoverOptions {
  destFileName: string;
  ignoredPrefixes: string[];
}

export function isIgnoredSegment(segment: string, ignoredPrefixes: string[]): boolean {
  return ignoredPrefixes.some((prefix) => prefix.length > 0 && segment.startsWith(prefix));
}

export function hasIgnoredSegment(relPath: string, ignoredPrefixes: string[]): boolean {
  return relPath
    .split(/[\\/]/)
    .some((segment) => isIgnoredSegment(segment, ignoredPrefixes));
}

export function isDestinationFile(filePath: string, destFileName: string): boolean {
  return basename(filePath).toLowerCase() === basename(destFileName).toLowerCase();
}

export function discover(sourceRoot: string, options: DiscoverOptions): string[] {
  if (!existsSync(sourceRoot) || !statSync(sourceRoot).isDirectory()) return [];

  const files: string[] = [];
  walk(sourceRoot, files, options.ignoredPrefixes);

  return files.filter((file) => !isDestinationFile(file, options.destFileName));
}

/** symlinks count when they resolve to a regular file */
function isRegularFile(entry: Dirent, fullPath: string): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(fullPath).isFile();
  } catch {
    return false;
  }
}

function walk(dir: string, out: string[], ignoredPrefixes: string[]): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    // unreadable directory: nothing to index below it
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (isIgnoredSegment(entry.name, ignoredPrefixes)) continue;

    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(fullPath, out, ignoredPrefixes);
    } else if (entry.name.endsWith(".md") && isRegularFile(entry, fullPath)) {
      out.push(fullPath.split(sep).join("/"));
    }
  }
}
