/**
 * note index — turns discovered files into sorted, truncated records.
 */

import { relative } from "path";
import { inferDate } from "./dates.js";
import { extractTitle } from "./title.js";
import { hasIgnoredSegment, isDestinationFile } from "./discover.js";
import type { NoteRecord } from "../schema.js";

export { discover, hasIgnoredSegment } from "./discover.js";
export { inferDate, formatDate } from "./dates.js";
export { extractTitle } from "./title.js";

export interface BuildIndexOptions {
  count: number;
  destFileName: string;
  ignoredPrefixes: string[];
}

export function toRelativePath(filePath: string, repoRoot: string): string {
  return relative(repoRoot, filePath).replace(/\\/g, "/");
}

/**
 * newest first; equal dates keep discovery order (Array.prototype.sort is stable).
 */
export function buildIndex(files: string[], repoRoot: string, options: BuildIndexOptions): NoteRecord[] {
  const seen = new Set<string>();
  const records: NoteRecord[] = [];

  for (const file of files) {
    const rel = toRelativePath(file, repoRoot);
    if (isDestinationFile(rel, options.destFileName)) continue;
    if (hasIgnoredSegment(rel, options.ignoredPrefixes)) continue;
    if (seen.has(rel)) continue;
    seen.add(rel);

    records.push({ path: rel, date: inferDate(file), title: extractTitle(file) });
  }

  records.sort((a, b) => b.date.getTime() - a.date.getTime());

  return records.slice(0, Math.max(0, options.count));
}
