/**
 * sentinel-delimited section replacement.
 *
 * works on raw bytes: everything outside [start marker, end marker] is written
 * back exactly as read, whatever its encoding. only the first marker pair is
 * replaced; what happens to further pairs is undefined (they are left alone).
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { ok, err, type Result } from "neverthrow";
import type { SectionError, SectionMarkers } from "../schema.js";

export function wrapInSection(body: string, markers: SectionMarkers): string {
  return `${markers.start}\n${body}\n${markers.end}`;
}

/**
 * compute the new file content. null `existing` means the file is absent.
 */
export function applySection(existing: Buffer | null, body: string, markers: SectionMarkers): Buffer {
  const wrapped = Buffer.from(wrapInSection(body, markers), "utf-8");

  if (existing === null) {
    return Buffer.concat([wrapped, Buffer.from("\n", "utf-8")]);
  }

  const start = Buffer.from(markers.start, "utf-8");
  const end = Buffer.from(markers.end, "utf-8");

  const startIdx = existing.indexOf(start);
  const endIdx = startIdx === -1 ? -1 : existing.indexOf(end, startIdx + start.length);

  if (startIdx === -1 || endIdx === -1) {
    return Buffer.concat([existing, Buffer.from("\n\n", "utf-8"), wrapped]);
  }

  return Buffer.concat([
    existing.subarray(0, startIdx),
    wrapped,
    existing.subarray(endIdx + end.length),
  ]);
}

/**
 * replace the marked section of destPath with body.
 * ok(true) when the file was written, ok(false) when it already matched.
 */
export function replaceSection(
  destPath: string,
  body: string,
  markers: SectionMarkers,
): Result<boolean, SectionError> {
  let existing: Buffer | null = null;

  if (existsSync(destPath)) {
    try {
      existing = readFileSync(destPath);
    } catch (e) {
      return err({
        _tag: "section.read",
        path: destPath,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  const updated = applySection(existing, body, markers);
  if (existing !== null && existing.equals(updated)) {
    return ok(false);
  }

  try {
    writeFileSync(destPath, updated);
  } catch (e) {
    return err({
      _tag: "section.write",
      path: destPath,
      message: e instanceof Error ? e.message : String(e),
    });
  }

  return ok(true);
}
