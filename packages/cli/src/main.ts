#!/usr/bin/env tsx
// keyrelay entry point

import pc from "picocolors";
import { cli, joinNegativeNumbers } from "./index.js";

try {
  cli.parse(joinNegativeNumbers(process.argv), { run: false });
  await cli.runMatchedCommand();
} catch (error) {
  console.error(pc.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
}
