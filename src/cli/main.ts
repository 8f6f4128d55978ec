import * as p from "@clack/prompts";
import color from "picocolors";
import { listCommand } from "./commands/list";
import { runCommand } from "./commands/run";
import { startCommand } from "./commands/start";
import { LOGO, VERSION } from "./ui";

function printHelp(): void {
  console.log(color.bold(color.green(LOGO)));
  p.intro(`${color.green("seedsweep")} ${color.dim(`v${VERSION}`)} - Ratio-based torrent retention for qBittorrent`);

  p.note(
    `${color.cyan("run")}         Remove torrents below the projected ratio target
${color.cyan("list")}        Show the decision for every torrent without removing
${color.cyan("start")}       Run the retention pass on a cron schedule`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `seedsweep run --dry-run                ${color.dim("# Preview removals")}
seedsweep run --age 100 --ratio 10     ${color.dim("# Default policy, explicitly")}
seedsweep list -a remove               ${color.dim("# Torrents below the target")}
seedsweep start --cron "0 4 * * *"     ${color.dim("# Daily pass at 04:00")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("seedsweep <command> --help")} for command details`);
}

/**
 * Dispatch a command line (without the node and script arguments) and
 * return the exit code
 */
export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "run":
      return runCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "start":
      return startCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("seedsweep --help")} for usage information.`);
      return 1;
  }
}
