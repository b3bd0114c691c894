/**
 * notes-index list — print the index without touching the destination.
 */

import { loadConfig } from "../config.js";
import { formatDate } from "../indexer/index.js";
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
  const { discovered, records } = scan(opts);

  if (discovered === 0) {
    console.log(`no markdown files found in ${opts.source}`);
    return;
  }

  console.log(`showing ${records.length} of ${discovered} notes:\n`);

  for (const record of records) {
    console.log(`${formatDate(record.date)}  ${record.title}  (${record.path})`);
  }
}
