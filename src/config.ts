/**
 * configuration system — zero-config with sensible defaults.
 * searches: ./notes-index.config.json, ~/.config/notes-index/config.json
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { type } from "arktype";
import { DEFAULT_MARKERS, LabelModeSchema, type LabelMode, type SectionMarkers } from "./schema.js";

const MarkersSchema = type({
  "start?": "string > 0",
  "end?": "string > 0",
});

const ConfigSchema = type({
  "source?": "string",
  "dest?": "string",
  "count?": "number.integer >= 0",
  "label?": LabelModeSchema,
  "ignore?": "string[]",
  "markers?": MarkersSchema,
});

export type Config = typeof ConfigSchema.infer;

export interface ResolvedConfig {
  source: string;
  dest: string;
  count: number;
  label: LabelMode;
  ignore: string[];
  markers: SectionMarkers;
}

export const CONFIG_FILENAME = "notes-index.config.json";

export const DEFAULT_CONFIG: ResolvedConfig = {
  source: ".",
  dest: "README.md",
  count: 3,
  label: "filename",
  ignore: [".git"],
  markers: DEFAULT_MARKERS,
};

function findConfigFile(cwd: string): string | null {
  const cwdConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(cwdConfig)) return cwdConfig;

  const homeConfig = join(homedir(), ".config", "notes-index", "config.json");
  if (existsSync(homeConfig)) return homeConfig;

  return null;
}

export function loadConfig(cwd: string = process.cwd()): ResolvedConfig {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  try {
    const text = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(text);
    const validated = ConfigSchema(parsed);

    if (validated instanceof type.errors) {
      console.warn(`config validation failed: ${validated.summary}, using defaults`);
      return DEFAULT_CONFIG;
    }

    return {
      source: validated.source ?? DEFAULT_CONFIG.source,
      dest: validated.dest ?? DEFAULT_CONFIG.dest,
      count: validated.count ?? DEFAULT_CONFIG.count,
      label: validated.label ?? DEFAULT_CONFIG.label,
      ignore: validated.ignore ?? DEFAULT_CONFIG.ignore,
      markers: {
        start: validated.markers?.start ?? DEFAULT_CONFIG.markers.start,
        end: validated.markers?.end ?? DEFAULT_CONFIG.markers.end,
      },
    };
  } catch (e) {
    console.warn(`failed to load config: ${e instanceof Error ? e.message : String(e)}, using defaults`);
    return DEFAULT_CONFIG;
  }
}

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}
