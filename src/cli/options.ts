/**
 * shared option parsing for update/list.
 * flags override the loaded config; invalid values are rejected here rather
 * than falling back to defaults.
 */

import { parseArgs } from "util";
import { ok, err, Result } from "neverthrow";
import { type } from "arktype";
import { LabelModeSchema, LABEL_MODES, type OptionsError } from "../schema.js";
import type { ResolvedConfig } from "../config.js";

const CountSchema = type("string.integer.parse").to("number >= 0");

export const USAGE =
  `usage: notes-index [update|list] [--source <dir>] [--dest <file>] [--count <n>] ` +
  `[--label <${LABEL_MODES.join("|")}>] [--ignore <prefix>...] [--dry-run]`;

export interface CliOptions extends ResolvedConfig {
  dryRun: boolean;
}

const parseFlags = Result.fromThrowable(
  (args: string[]) =>
    parseArgs({
      args,
      options: {
        source: { type: "string", short: "s" },
        dest: { type: "string", short: "d" },
        count: { type: "string", short: "n" },
        label: { type: "string", short: "l" },
        ignore: { type: "string", short: "i", multiple: true },
        "dry-run": { type: "boolean", default: false },
      },
      strict: true,
    }),
  (e): OptionsError => ({ _tag: "options.invalid", message: e instanceof Error ? e.message : String(e) }),
);

export function parseCliOptions(args: string[], config: ResolvedConfig): Result<CliOptions, OptionsError> {
  const parsed = parseFlags(args);
  if (parsed.isErr()) return err(parsed.error);
  const { values } = parsed.value;

  let count = config.count;
  if (values.count !== undefined) {
    const validated = CountSchema(values.count);
    if (validated instanceof type.errors) {
      return err({ _tag: "options.invalid", message: `invalid --count: ${validated.summary}` });
    }
    count = validated;
  }

  let label = config.label;
  if (values.label !== undefined) {
    const validated = LabelModeSchema(values.label);
    if (validated instanceof type.errors) {
      return err({
        _tag: "options.invalid",
        message: `invalid --label "${values.label}", expected one of: ${LABEL_MODES.join(", ")}`,
      });
    }
    label = validated;
  }

  return ok({
    source: values.source ?? config.source,
    dest: values.dest ?? config.dest,
    count,
    label,
    ignore: values.ignore ?? config.ignore,
    markers: config.markers,
    dryRun: values["dry-run"] ?? false,
  });
}
