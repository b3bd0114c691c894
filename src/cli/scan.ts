/**
 * resolve paths and run the indexer for a parsed set of options.
 */

import { resolve } from "path";
import { expandPath } from "../config.js";
import { buildIndex, discover, hasIgnoredSegment, toRelativePath } from "../indexer/index.js";
import type { NoteRecord } from "../schema.js";
import type { CliOptions } from "./options.js";

export interface ScanResult {
  discovered: number;
  records: NoteRecord[];
  destPath: string;
}

export function scan(opts: CliOptions, repoRoot: string = process.cwd()): ScanResult {
  const sourceRoot = resolve(repoRoot, expandPath(opts.source));
  const destPath = resolve(repoRoot, expandPath(opts.dest));

  // a source under an ignored directory of the repo yields nothing
  const files = discover(sourceRoot, { destFileName: opts.dest, ignoredPrefixes: opts.ignore }).filter(
    (file) => !hasIgnoredSegment(toRelativePath(file, repoRoot), opts.ignore),
  );
  const records = buildIndex(files, repoRoot, {
    count: opts.count,
    destFileName: opts.dest,
    ignoredPrefixes: opts.ignore,
  });

  return { discovered: files.length, records, destPath };
}
