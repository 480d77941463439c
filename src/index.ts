#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { runDaemonCommand } from "./cli/commands/run";
import { startCommand } from "./cli/commands/start";
import { VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan("tierback")} ${color.dim(`v${VERSION}`)} - Tiered backup daemon`);

  p.note(
    `${color.cyan("start")}       Start the backup daemon in the background (default)
${color.cyan("run")}         Run the backup daemon in the foreground`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
--version       Show version`,
    "Options",
  );

  p.note(
    `tierback                                   ${color.dim("# Start if not already running")}
tierback start -c ./tierback.config.yaml   ${color.dim("# Start with a specific config")}
tierback run -v                            ${color.dim("# Foreground with debug logging")}
kill -TERM <pid>                           ${color.dim("# Final backup, then stop")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("tierback <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const [command, ...commandArgs] = args;

  switch (command) {
    case undefined:
      return startCommand([]);

    case "start":
      return startCommand(commandArgs);

    case "run":
      return runDaemonCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      // Bare options mean `start`
      if (command.startsWith("-")) {
        return startCommand(args);
      }
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("tierback --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
