#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { cleanCommand } from "./cli/commands/clean";
import { scanCommand } from "./cli/commands/scan";
import { LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("ebs-janitor")} ${color.dim(`v${VERSION}`)} - Unattached EBS volume cleanup`);

  p.note(
    `${color.cyan("clean")}       Find idle unattached volumes, confirm and remove them
${color.cyan("scan")}        List the volumes clean would remove`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `ebs-janitor scan -r eu-west-1                ${color.dim("# Preview one region")}
ebs-janitor clean -r eu-west-1               ${color.dim("# Clean one region")}
ebs-janitor clean --scrape-org --role Ops    ${color.dim("# Every account of the organization")}
ebs-janitor clean -y -o removed.json         ${color.dim("# No prompt, keep a report")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("ebs-janitor <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`ebs-janitor v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "clean":
      return cleanCommand(commandArgs);

    case "scan":
      return scanCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("ebs-janitor --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
