/**
 * date inference for indexed notes.
 *
 * tiers, first hit wins:
 *   1. YYYY-MM-DD in the file's base name
 *   2. `date` in the frontmatter block
 *   3. file modification time
 *
 * every tier swallows its own failures so inferDate always returns a date.
 * calendar dates are local midnight, the same clock the mtime tier reads.
 */

import { readFileSync, statSync } from "fs";
import { basename } from "path";
import matter from "gray-matter";

const FILENAME_DATE_PATTERN = /(\d{4})-(\d{2})-(\d{2})/;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)?$/i;

/** local-midnight date, or null when the components don't name a real day */
export function calendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function dateFromFilename(name: string): Date | null {
  const match = name.match(FILENAME_DATE_PATTERN);
  if (!match) return null;
  return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * interpret a frontmatter `date` value.
 * YAML parses bare dates into UTC-midnight Date objects; those are read back as
 * the calendar day they name. strings are tried as ISO-8601 timestamps first,
 * then as YYYY-MM-DD.
 */
export function parseFrontmatterDate(value: unknown): Date | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    const isBareDate =
      value.getUTCHours() === 0 &&
      value.getUTCMinutes() === 0 &&
      value.getUTCSeconds() === 0 &&
      value.getUTCMilliseconds() === 0;
    if (isBareDate) {
      return calendarDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
    }
    return value;
  }

  if (typeof value !== "string") return null;
  const text = value.trim();

  if (ISO_TIMESTAMP_PATTERN.test(text)) {
    const parsed = new Date(text.replace(" ", "T"));
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }

  const match = text.match(CALENDAR_DATE_PATTERN);
  if (!match) return null;
  return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function refuseScript(): never {
  throw new Error("script frontmatter is not evaluated");
}

/** yaml/json/toml only; gray-matter would otherwise eval `---js` blocks */
const MATTER_OPTIONS = {
  engines: { js: refuseScript, javascript: refuseScript },
};

export function dateFromFrontmatter(filePath: string): Date | null {
  try {
    const { data } = matter(readFileSync(filePath, "utf-8"), MATTER_OPTIONS);
    if (!Object.hasOwn(data, "date")) return null;
    return parseFrontmatterDate(data["date"]);
  } catch {
    // broken frontmatter counts as no frontmatter
    return null;
  }
}

export function modifiedTime(filePath: string): Date {
  try {
    return statSync(filePath).mtime;
  } catch {
    return new Date(0);
  }
}

export function inferDate(filePath: string): Date {
  return dateFromFilename(basename(filePath)) ?? dateFromFrontmatter(filePath) ?? modifiedTime(filePath);
}

/** YYYY-MM-DD on the local clock */
export function formatDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}
