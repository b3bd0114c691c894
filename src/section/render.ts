/**
 * markdown list rendering for the notes section.
 * one `- [label](url)` line per record.
 */

import { formatDate } from "../indexer/dates.js";
import { fileStem } from "../indexer/title.js";
import type { LabelMode, NoteRecord } from "../schema.js";

/** backslash first, so the escapes added for brackets are not doubled */
export function escapeLabel(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\[/g, "\\[").replace(/\]/g, "\\]");
}

/**
 * percent-encode each path segment, keeping `/` literal.
 * only unreserved characters (A-Z a-z 0-9 - _ . ~) survive unencoded.
 */
export function encodePath(relPath: string): string {
  return relPath
    .split("/")
    .map((segment) =>
      encodeURIComponent(segment).replace(
        /[!'()*]/g,
        (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
      ),
    )
    .join("/");
}

export function labelFor(record: NoteRecord, mode: LabelMode): string {
  switch (mode) {
    case "title":
      return record.title;
    case "date_title":
      return `${formatDate(record.date)} — ${record.title}`;
    case "filename":
      return fileStem(record.path);
    case "path":
      return record.path;
  }
}

export function renderList(records: NoteRecord[], mode: LabelMode): string {
  return records
    .map((record) => `- [${escapeLabel(labelFor(record, mode))}](${encodePath(record.path)})`)
    .join("\n");
}
