import { parseArgs } from "node:util";
import { formatAwsError } from "../../aws/errors";
import { ConfigError, extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config";
import { type CleanupResult, describeVerdict, type RegionSummary, runCleanup } from "../../core";
import { formatAge, formatGiB, setLogLevel } from "../../utils";
import { color, formatSummary, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";
import { type CommandDeps, createDefaultProvider } from "./deps";

export interface ScanRow {
  account_id: string;
  region: string;
  volume_id: string;
  volume_type: string;
  size: number;
  create_time: string;
  reason: string;
}

export function toScanRows(regions: readonly RegionSummary[], ageDays: number): ScanRow[] {
  return regions.flatMap((region) =>
    region.candidates.map(({ volume, verdict }) => ({
      account_id: region.accountId,
      region: region.region,
      volume_id: volume.volumeId,
      volume_type: volume.volumeType,
      size: volume.size,
      create_time: volume.createTime.toISOString(),
      reason: describeVerdict(verdict, ageDays),
    })),
  );
}

export async function scanCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      format: { type: "string", default: "table" },
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

  if (values.format !== "table" && values.format !== "json") {
    ui.error(`Unknown format: ${values.format}`);
    return 1;
  }

  if (values.verbose) {
    setLogLevel("debug");
  } else if (values.format === "json") {
    // stdout carries the JSON document only
    setLogLevel("warn");
  }

  try {
    const config = await resolveConfig(values.config, extractInlineOptions(values));
    const provider = (deps.createProvider ?? createDefaultProvider)(config);

    if (values.format === "table") {
      ui.intro("ebs-janitor scan");
    }

    const result = await runCleanup(
      config,
      {
        provider,
        confirm: async () => false,
        sleep: deps.sleep,
        now: deps.now,
      },
      { dryRun: true },
    );
    const rows = toScanRows(result.regions, config.filter.ageDays);

    if (values.format === "json") {
      console.log(JSON.stringify(rows, null, 2));
      return 0;
    }

    if (rows.length === 0) {
      ui.info("No removable volumes found");
    } else {
      printTable(rows, deps.now?.() ?? new Date());
    }
    printSummary(result);

    ui.outro(`${rows.length} volume(s) would be removed`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(`Invalid configuration: ${error.message}`);
      return 1;
    }
    ui.error(`Scan failed: ${formatAwsError(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(rows: ScanRow[], now: Date): void {
  const widths = [
    TABLE_WIDTHS.account,
    TABLE_WIDTHS.region,
    TABLE_WIDTHS.volumeId,
    TABLE_WIDTHS.volumeType,
    TABLE_WIDTHS.size,
    TABLE_WIDTHS.age,
    TABLE_WIDTHS.reason,
  ];

  console.log();
  console.log(
    color.bold(formatTableRow(["Account", "Region", "Volume", "Type", "Size", "Age", "Reason"], widths)),
  );
  console.log(formatTableSeparator(widths));

  for (const row of rows) {
    console.log(
      formatTableRow(
        [
          row.account_id,
          row.region,
          row.volume_id,
          row.volume_type,
          formatGiB(row.size),
          formatAge(new Date(row.create_time), now),
          row.reason,
        ],
        widths,
      ),
    );
  }
  console.log();
}

function printSummary(result: CleanupResult): void {
  const skipped = result.regions.filter(
    (region) => region.status === "unauthorized" || region.status === "account_denied",
  );
  const candidateGiB = result.regions.reduce(
    (sum, region) => sum + region.candidates.reduce((acc, c) => acc + c.volume.size, 0),
    0,
  );

  ui.note(
    formatSummary([
      { label: "Accounts", value: result.totals.accounts },
      { label: "Regions", value: result.totals.regions },
      { label: "Skipped regions", value: skipped.length > 0 ? skipped.length : null },
      { label: "Scanned", value: result.totals.scanned },
      { label: "Candidates", value: result.totals.candidates },
      { label: "Reclaimable", value: formatGiB(candidateGiB) },
    ]),
    "Scan Summary",
  );
}

function printHelp(): void {
  console.log(`
${color.bold("ebs-janitor scan")} - List removable EBS volumes without deleting anything

${color.dim("USAGE:")}
  ebs-janitor scan [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./ebs-janitor.config.yaml)
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  Every targeting and filtering option of ${color.cyan("ebs-janitor clean")} is accepted.

${color.dim("EXAMPLES:")}
  ebs-janitor scan -r us-east-1 -r eu-west-1    # Preview two regions
  ebs-janitor scan --format json > idle.json    # Machine-readable output
  ebs-janitor scan -i -t "env:^dev"             # Ignore metrics, dev volumes only
`);
}
