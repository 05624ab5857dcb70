// keyrelay CLI: chat and text-to-image calls through the token proxy
// Usage: keyrelay chat|image

import { cac } from "cac";
import pc from "picocolors";
import { registerChatCommand } from "./commands/chat.js";
import { registerImageCommand } from "./commands/image.js";

const VERSION = "0.1.0";

export const cli = cac("keyrelay");

// Global options
cli.option("--verbose, -v", "Enable verbose output");

registerChatCommand(cli);
registerImageCommand(cli);

cli.help();
cli.version(VERSION);

cli.on("command:*", () => {
  console.error(pc.red("Unknown command: %s"), cli.args.join(" "));
  console.log(`Run ${pc.cyan("keyrelay --help")} to see available commands.`);
  process.exit(1);
});

export * from "./commands/index.js";
