/**
 * notes-index update — regenerate the notes section of the destination file.
 */

import { loadConfig } from "../config.js";
import { renderList } from "../section/render.js";
import { replaceSection, wrapInSection } from "../section/replace.js";
import { parseCliOptions, USAGE } from "./options.js";
import { scan } from "./scan.js";

export async function run(args: string[]) {
  const parsed = parseCliOptions(args, loadConfig());
  if (parsed.isErr()) {
    console.error(`error: ${parsed.error.message}`);
    console.error(USAGE);
    process.exit(1);
  }

  const opts = parsed.value;
  const { discovered, records, destPath } = scan(opts);

  if (discovered === 0) {
    console.log(`no markdown files found in ${opts.source}`);
    return;
  }

  const body = renderList(records, opts.label);

  if (opts.dryRun) {
    console.log(wrapInSection(body, opts.markers));
    return;
  }

  const result = replaceSection(destPath, body, opts.markers);
  if (result.isErr()) {
    console.error(`error: ${result.error.message}`);
    process.exit(1);
  }

  console.log(result.value ? `updated ${opts.dest}` : `no change to ${opts.dest}`);
}
