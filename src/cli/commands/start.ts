import { parseArgs } from "node:util";
import { runPass, Scheduler } from "../../core";
import type { ScheduleConfig } from "../../types";
import { color, formatSummary, ui } from "../ui";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "./shared";

type StartValues = Record<string, unknown> & {
  cron?: string;
  timezone?: string;
  debug?: boolean;
};

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      cron: { type: "string" },
      timezone: { type: "string" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const scheduler = await createScheduler(values);
  if (!scheduler) {
    return 1;
  }

  scheduler.start();
  const next = scheduler.getStatus().nextRun;
  ui.success(`Scheduler is running${next ? `, next pass ${next.toLocaleString()}` : ""}`);
  ui.info("Press Ctrl+C to stop");

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      ui.cancel("Shutting down...");
      scheduler.stop();
      resolve();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

  return 0;
}

async function createScheduler(values: StartValues): Promise<Scheduler | null> {
  try {
    const config = await loadCommandConfig(values);

    const cron = values.cron ?? config.schedule?.cron;
    if (!cron) {
      ui.error("No schedule configured");
      ui.info("Set schedule.cron in the config file or pass --cron");
      return null;
    }

    const schedule: ScheduleConfig = {
      cron,
      timezone: values.timezone ?? config.schedule?.timezone,
    };

    const scheduler = new Scheduler(schedule, () => runPass(config));

    ui.intro("seedsweep scheduler");
    ui.note(
      formatSummary([
        { label: "Schedule", value: schedule.cron },
        { label: "Timezone", value: schedule.timezone },
        { label: "Endpoint", value: config.client.endpoint },
        { label: "Policy", value: `age > ${config.policy.ageDays}d, ratio >= ${config.policy.ratio}` },
        { label: "Dry run", value: config.safety.dryRun ? "yes" : "no" },
      ]),
      "Configuration",
    );

    return scheduler;
  } catch (error) {
    ui.error(`Failed to start: ${(error as Error).message}`);
    if (values.debug) {
      console.error(error);
    }
    return null;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("seedsweep start")} - Run a retention pass on a cron schedule

${color.dim("USAGE:")}
  seedsweep start [OPTIONS]

${COMMON_HELP}
      --cron <expr>       Cron expression (overrides schedule.cron)
      --timezone <tz>     IANA timezone for the cron expression

${color.dim("NOTES:")}
  Every pass logs in again, takes a fresh snapshot and is independent of the
  previous one. A failed pass is logged and the next one still runs.

${color.dim("EXAMPLES:")}
  seedsweep start --cron "0 4 * * *"                # Daily at 04:00
  seedsweep start -c /config/seedsweep.config.yaml  # Schedule from config
`);
}
