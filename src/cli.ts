#!/usr/bin/env node

import { Command } from "commander";
import { setVerbose } from "./lib/logger";
import { registerHistoryCommand } from "./commands/history";
import { registerListenCommand } from "./commands/listen";
import { registerRelatedCommand } from "./commands/related";

const program = new Command();

program
  .name("ytradio")
  .description("Radio mode and play history for mpv, powered by yt-dlp")
  .version("0.1.0")
  .option("--verbose", "Print debug output to stderr")
  .hook("preAction", (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      setVerbose(true);
    }
  });

registerRelatedCommand(program);
registerListenCommand(program);
registerHistoryCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
