#!/usr/bin/env node
/**
 * CLI entrypoint — routes commands to handlers.
 * a bare invocation (or one starting with a flag) runs `update`.
 */

import { USAGE } from "./options.js";

const COMMANDS = ["update", "list"] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function main() {
  const argv = process.argv.slice(2);
  const first = argv[0];

  let command: Command = "update";
  let args = argv;

  if (first !== undefined && !first.startsWith("-")) {
    if (!isCommand(first)) {
      console.error(USAGE);
      console.error(`commands: ${COMMANDS.join(", ")}`);
      process.exit(1);
    }
    command = first;
    args = argv.slice(1);
  }

  try {
    switch (command) {
      case "update":
        await (await import("./update.js")).run(args);
        break;
      case "list":
        await (await import("./list.js")).run(args);
        break;
    }
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
