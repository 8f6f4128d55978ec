/**
 * A complete retention pass against the configured client
 */

import { QbitClient } from "../qbittorrent/client";
import type {
  ClientConfig,
  RetentionPolicy,
  RetentionRunResult,
  SeedsweepConfig,
  TorrentService,
} from "../types";
import { logger } from "../utils/logger";
import { type Reporter, runRetention } from "./retention/orchestrator";

export interface PassOptions {
  /** Force simulation regardless of `safety.dryRun` */
  simulate?: boolean;
  now?: number;
  reporter?: Reporter;
  createService?: (client: ClientConfig) => TorrentService;
}

function createQbitClient(client: ClientConfig): TorrentService {
  return new QbitClient(client);
}

export function policyFromConfig(config: SeedsweepConfig, simulate?: boolean): RetentionPolicy {
  return {
    ageThresholdDays: config.policy.ageDays,
    ratioThreshold: config.policy.ratio,
    simulate: simulate ?? config.safety.dryRun,
  };
}

/**
 * Log in (always re-authenticating), snapshot, evaluate and remove.
 */
export async function runPass(
  config: SeedsweepConfig,
  options: PassOptions = {},
): Promise<RetentionRunResult> {
  const reporter = options.reporter ?? logger;
  const policy = policyFromConfig(config, options.simulate);
  const createService = options.createService ?? createQbitClient;
  const service = createService(config.client);

  reporter.info(
    `Retention pass: age > ${policy.ageThresholdDays}d, projected ratio >= ${policy.ratioThreshold}${policy.simulate ? " (dry run)" : ""}`,
  );

  await service.login(true);

  return runRetention(service, policy, { now: options.now, reporter });
}
