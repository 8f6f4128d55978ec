import { parseArgs } from "node:util";
import { currentEpochSeconds, evaluateSnapshot, policyFromConfig } from "../../core";
import { QbitClient } from "../../qbittorrent";
import type { RetentionAction, RetentionDecision } from "../../types";
import {
  color,
  formatAction,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  truncate,
  ui,
} from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "./shared";

const ACTIONS: readonly RetentionAction[] = ["too_young", "keep", "remove"];

function isRetentionAction(value: string): value is RetentionAction {
  return ACTIONS.some((action) => action === value);
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      action: { type: "string", short: "a" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.action !== undefined && !isRetentionAction(values.action)) {
    ui.error(`Unknown action: ${values.action}`);
    ui.info(`Available actions: ${ACTIONS.join(", ")}`);
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const policy = policyFromConfig(config, true);

    const client = new QbitClient(config.client);
    await client.login(true);
    const torrents = await client.listTorrents();

    let decisions = evaluateSnapshot(torrents, policy, currentEpochSeconds());
    if (values.action) {
      const wanted = values.action;
      decisions = decisions.filter((d) => d.action === wanted);
    }

    if (values.format === "json") {
      console.log(JSON.stringify(decisions.map(toJson), null, 2));
      return 0;
    }

    ui.intro("seedsweep list");

    if (decisions.length === 0) {
      ui.info("No torrents found");
      ui.outro("Done");
      return 0;
    }

    printTable(decisions, config.safety.dryRun);

    const removable = decisions.filter((d) => d.action === "remove").length;
    ui.outro(`${decisions.length} torrent(s), ${removable} below the ratio target`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${(error as Error).message}`);
    if (values.debug) {
      console.error(error);
    }
    return 1;
  }
}

function toJson(decision: RetentionDecision) {
  return {
    hash: decision.item.hash,
    name: decision.item.name,
    action: decision.action,
    ageDays: decision.ageDays,
    ratio: decision.item.ratio ?? null,
    projectedRatio: decision.projectedRatio ?? null,
    rationale: decision.rationale,
  };
}

function printTable(decisions: RetentionDecision[], simulate: boolean): void {
  const widths = [
    TABLE_WIDTHS.action,
    TABLE_WIDTHS.hash,
    TABLE_WIDTHS.ageDays,
    TABLE_WIDTHS.ratio,
    TABLE_WIDTHS.projected,
    TABLE_WIDTHS.name,
  ];
  const headers = ["Action", "Hash", "Age (d)", "Ratio", "Projected", "Name"];

  ui.step("Torrents:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const decision of decisions) {
    console.log(
      formatTableRow(
        [
          formatAction(decision.action, simulate),
          decision.item.hash.slice(0, TABLE_WIDTHS.hash),
          String(decision.ageDays),
          decision.item.ratio?.toFixed(2) ?? "-",
          decision.projectedRatio?.toFixed(2) ?? "-",
          truncate(decision.item.name, TABLE_WIDTHS.name),
        ],
        widths,
      ),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("seedsweep list")} - Show the retention decision for every torrent (never removes)

${color.dim("USAGE:")}
  seedsweep list [OPTIONS]

${COMMON_HELP}
  -a, --action <action>   Only show too_young, keep or remove
      --format <format>   Output format: table, json (default: table)

${color.dim("EXAMPLES:")}
  seedsweep list                       # All torrents with their decision
  seedsweep list -a remove             # Only torrents below the target
  seedsweep list --format json         # Machine-readable output
`);
}
