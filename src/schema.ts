/**
 * shared types for the note index.
 *
 * records are derived from disk on every run and never persisted. the only
 * durable artifact is the marked region in the destination file.
 */

import { type } from "arktype";

export const LabelModeSchema = type("'filename' | 'title' | 'date_title' | 'path'");

export type LabelMode = typeof LabelModeSchema.infer;

export const LABEL_MODES: readonly LabelMode[] = ["filename", "title", "date_title", "path"];

/**
 * one indexed markdown file.
 * path: relative to the repository root, forward slashes, unique within a run.
 * date: inferred from filename, then frontmatter, then mtime. sort key only.
 * title: first heading, else the file stem. never empty.
 */
export interface NoteRecord {
  path: string;
  date: Date;
  title: string;
}

export interface SectionMarkers {
  start: string;
  end: string;
}

export const DEFAULT_MARKERS: SectionMarkers = {
  start: "<!-- DAILY_NOTES:START -->",
  end: "<!-- DAILY_NOTES:END -->",
};

export type SectionError =
  | { _tag: "section.read"; path: string; message: string }
  | { _tag: "section.write"; path: string; message: string };

export type OptionsError = { _tag: "options.invalid"; message: string };
