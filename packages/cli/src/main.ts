#!/usr/bin/env -S node --import tsx
// Must stay the first import: it fills process.env before the logger is created.
import { dotEnv } from "./env";

import { createLogger } from "@archive-sweep/shared";

import { fetchCommand } from "./commands/fetch";

type CommandResult = void | Promise<void>;

function printHelp(): void {
  console.log("archive-sweep CLI");
  console.log("");
  console.log("Commands:");
  console.log("  fetch <submissions|comments> [flags]   (fetch --help for flags)");
  console.log("  help");
  console.log("");
  console.log("Defaults come from SWEEP_* environment variables (see .env.example).");
}

async function main(): Promise<void> {
  if (dotEnv.ignored.length > 0) {
    createLogger({ component: "cli" }).debug(
      { files: dotEnv.files, ignored: dotEnv.ignored },
      "ignoring dotenv keys archive-sweep does not read",
    );
  }

  let [cmd, ...rest] = process.argv.slice(2);
  // npm forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  let result: CommandResult;
  switch (cmd) {
    case "fetch":
      result = fetchCommand(rest);
      break;
    default:
      printHelp();
      result = undefined;
      break;
  }

  await result;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
