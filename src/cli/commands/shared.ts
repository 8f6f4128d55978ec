/**
 * Options shared by every command that talks to qBittorrent
 */

import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config";
import type { SeedsweepConfig } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { color } from "../ui";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  debug: { type: "boolean" as const, short: "d", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export const COMMON_HELP = `${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./seedsweep.config.yaml)
      --age <days>        Minimum age before a torrent is considered (default: 100)
      --ratio <n>         Minimum projected one-year ratio (default: 10)
      --endpoint <url>    qBittorrent WebUI address (default: http://127.0.0.1:8080)
      --username <name>   WebUI username (default: admin, env QBIT_USERNAME)
      --password <pass>   WebUI password (default: adminadmin, env QBIT_PASSWORD)
      --dry-run           Report what would be removed without removing it
  -d, --debug             Debug logging
  -h, --help              Show this help message`;

/**
 * Apply --debug and merge defaults, config file, environment and flags
 */
export async function loadCommandConfig(values: Record<string, unknown>): Promise<SeedsweepConfig> {
  if (values.debug === true) {
    setLogLevel("debug");
  }

  return resolveConfig({
    configPath: typeof values.config === "string" ? values.config : undefined,
    inline: extractInlineOptions(values),
  });
}
