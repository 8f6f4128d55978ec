import { parseArgs } from "node:util";
import { runPass } from "../../core";
import { color, formatSummary, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "./shared";

export async function runCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: COMMON_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.intro("seedsweep run");

    const result = await runPass(config);
    const simulate = config.safety.dryRun;

    ui.note(
      formatSummary([
        { label: "Checked", value: result.checked },
        { label: "Too young", value: result.tooYoung },
        { label: "Kept", value: result.kept },
        simulate
          ? { label: "Would remove", value: result.wouldRemove }
          : { label: "Removed", value: result.removed },
      ]),
      "Retention Summary",
    );

    if (simulate) {
      ui.warn("[DRY RUN] No torrents were removed.");
    }

    ui.outro("Retention pass complete!");
    return 0;
  } catch (error) {
    ui.error(`Run failed: ${(error as Error).message}`);
    if (values.debug) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("seedsweep run")} - Remove torrents whose projected one-year ratio is too low

${color.dim("USAGE:")}
  seedsweep run [OPTIONS]

${COMMON_HELP}

${color.dim("POLICY:")}
  A torrent older than --age days has its current ratio extrapolated to one
  year: projected = ratio * 365 days / age. When the projection is below
  --ratio the torrent is removed together with its files. Torrents without a
  ratio are kept.

${color.dim("EXAMPLES:")}
  seedsweep run --dry-run                          # Preview removals
  seedsweep run --age 60 --ratio 5                 # Stricter policy
  seedsweep run --endpoint http://nas:8080 -d      # Remote client, debug logs
`);
}
