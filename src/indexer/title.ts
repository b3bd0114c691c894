/**
 * title extraction — first markdown heading, else the file stem.
 */

import { readFileSync } from "fs";
import { basename, extname } from "path";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function fileStem(filePath: string): string {
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length) || name;
}

export function headingFromText(text: string): string | null {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.startsWith("#")) continue;
    return line.replace(/^#+\s*/, "").trim();
  }
  return null;
}

export function extractTitle(filePath: string): string {
  let text: string;
  try {
    text = utf8.decode(readFileSync(filePath));
  } catch {
    return fileStem(filePath);
  }

  const heading = headingFromText(text);
  return heading || fileStem(filePath);
}
