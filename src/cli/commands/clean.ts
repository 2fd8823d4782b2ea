import { parseArgs } from "node:util";
import { formatAwsError } from "../../aws/errors";
import { ConfigError, extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config";
import { type CleanupResult, runCleanup } from "../../core";
import { formatGiB, setLogLevel } from "../../utils";
import { color, formatSummary, ui } from "../ui";
import { type CommandDeps, createDefaultProvider } from "./deps";

export async function cleanCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = await resolveConfig(values.config, extractInlineOptions(values));

    ui.intro("ebs-janitor clean");

    const provider = (deps.createProvider ?? createDefaultProvider)(config);
    const result = await runCleanup(config, {
      provider,
      confirm: deps.confirm ?? ui.confirmRemoval,
      sleep: deps.sleep,
      now: deps.now,
    });

    printResult(result, config.report);

    if (result.totals.removed === 0) {
      ui.outro("Nothing removed");
    } else {
      ui.outro("Cleanup complete!");
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(`Invalid configuration: ${error.message}`);
      return 1;
    }
    ui.error(`Cleanup failed: ${formatAwsError(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printResult(result: CleanupResult, reportPath: string | undefined): void {
  const { totals } = result;

  const removedRegions = result.regions.filter((region) => region.removed.length > 0);
  if (removedRegions.length > 0) {
    ui.step("Removed:");
    for (const region of removedRegions) {
      for (const record of region.removed) {
        ui.message(
          `  ${color.dim("•")} ${record.volume_id} ${color.dim(`(${formatGiB(record.size)} ${record.volume_type}, ${region.accountId}/${region.region})`)}`,
        );
      }
    }
  }

  for (const region of result.regions) {
    if (region.status === "unauthorized") {
      ui.warn(`Not authorized in Account ${region.accountId} Region ${region.region}`);
    }
  }
  if (result.skippedAccounts.length > 0) {
    ui.warn(`Access denied, skipped accounts: ${result.skippedAccounts.join(", ")}`);
  }

  ui.note(
    formatSummary([
      { label: "Accounts", value: totals.accounts },
      { label: "Regions", value: totals.regions },
      { label: "Scanned", value: totals.scanned },
      { label: "Candidates", value: totals.candidates },
      { label: "Removed", value: totals.removed },
      { label: "Reclaimed", value: formatGiB(totals.removedGiB) },
      { label: "Report", value: reportPath },
    ]),
    "Cleanup Summary",
  );
}

function printHelp(): void {
  console.log(`
${color.bold("ebs-janitor clean")} - Remove unattached, idle EBS volumes

${color.dim("USAGE:")}
  ebs-janitor clean [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>               Path to config file (default: ./ebs-janitor.config.yaml)
  -v, --verbose                     Verbose output
  -h, --help                        Show this help message

${color.dim("CREDENTIALS:")}
  -k, --access-key-id <id>          AWS access key id (default: SDK credential chain)
  -s, --secret-access-key <key>     AWS secret access key
      --role <name>                 IAM role to assume in each target account

${color.dim("TARGETS:")}
      --account <id>                Account to clean (repeatable)
      --scrape-org                  Clean every account of the organization (requires --role)
  -r, --region <name>               Region to clean (repeatable, default: all regions)

${color.dim("FILTERING:")}
  -a, --age <days>                  Lookback window and age of volumes without metrics (default: 14)
  -t, --tag <key:regex>             Only volumes whose tag matches (repeatable, all must match)
  -i, --ignore-metrics              Skip the idle-time check
      --idle-threshold <seconds>    Minimum idle seconds per hour (default: 299)

${color.dim("EXECUTION:")}
  -y, --yes                         Don't ask for confirmation
  -p, --pool-size <n>               Parallel API calls per region (default: 10)
  -o, --report <path>               Write a JSON removal report

${color.dim("EXAMPLES:")}
  ebs-janitor clean -r eu-west-1                     # Clean one region, with confirmation
  ebs-janitor clean -t "team:^infra$" -a 30          # Only infra volumes idle for 30 days
  ebs-janitor clean --scrape-org --role Janitor -y   # Whole organization, no prompts
  ebs-janitor clean -o reports/removed.json          # Keep an audit report
`);
}
