#!/usr/bin/env node

import ansis from "ansis";
import { runCommand } from "./execution/command";

async function main(): Promise<void> {
  process.exitCode = await runCommand(process.argv.slice(2));
}

main().catch((error) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
