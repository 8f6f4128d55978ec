/**
 * Retention pass orchestration
 */

import { RemovalError } from "../../qbittorrent/errors";
import type {
  RetentionDecision,
  RetentionPolicy,
  RetentionRunResult,
  TorrentService,
} from "../../types";
import { logger } from "../../utils/logger";
import { evaluateSnapshot } from "./evaluator";

/**
 * Where a pass reports its per-torrent outcome. The module logger fits.
 */
export interface Reporter {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RetentionRunOptions {
  /** Reference time in epoch seconds; defaults to the wall clock, read once */
  now?: number;
  reporter?: Reporter;
}

export function currentEpochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function formatRatio(value: number | undefined): string {
  return value === undefined ? "n/a" : value.toFixed(2);
}

/**
 * One-line description of a decision, as written to the log.
 */
export function describeDecision(decision: RetentionDecision, simulate: boolean): string {
  const { item, ageDays, projectedRatio, action } = decision;
  const subject = `${item.name} (hash=${item.hash})`;

  if (action === "too_young") {
    return `Torrent too new: ${subject}, age_days=${ageDays}`;
  }

  const details = `predicted_ratio=${formatRatio(projectedRatio)}, age_days=${ageDays}, current_ratio=${formatRatio(item.ratio)}`;

  if (action === "keep") {
    return `Keeping torrent: ${subject}, ${details}`;
  }

  return simulate
    ? `Dry run - would remove torrent: ${subject}, ${details}`
    : `Removing torrent with files: ${subject}, ${details}`;
}

/**
 * Run one retention pass: snapshot, evaluate, and remove what falls short.
 * The service must already be logged in.
 */
export async function runRetention(
  service: TorrentService,
  policy: RetentionPolicy,
  options: RetentionRunOptions = {},
): Promise<RetentionRunResult> {
  const reporter = options.reporter ?? logger;
  const referenceTime = options.now ?? currentEpochSeconds();

  const torrents = await service.listTorrents();
  reporter.info(`Evaluating ${torrents.length} torrent(s)`);

  const decisions = evaluateSnapshot(torrents, policy, referenceTime);

  const result: RetentionRunResult = {
    referenceTime,
    decisions,
    checked: decisions.length,
    tooYoung: 0,
    kept: 0,
    removed: 0,
    wouldRemove: 0,
    removedHashes: [],
  };

  const requested = new Set<string>();

  for (const decision of decisions) {
    const line = describeDecision(decision, policy.simulate);

    switch (decision.action) {
      case "too_young":
        result.tooYoung++;
        reporter.debug(line);
        break;

      case "keep":
        result.kept++;
        reporter.debug(line);
        break;

      case "remove": {
        reporter.info(line);
        if (policy.simulate) {
          result.wouldRemove++;
          break;
        }

        const { hash } = decision.item;
        if (requested.has(hash)) {
          reporter.debug(`Removal already requested for hash=${hash}`);
          break;
        }
        requested.add(hash);

        try {
          await service.deleteTorrents([hash], true);
        } catch (error) {
          reporter.error(`Removal failed for ${decision.item.name} (hash=${hash})`);
          throw new RemovalError(hash, error);
        }
        result.removed++;
        result.removedHashes.push(hash);
        break;
      }
    }
  }

  return result;
}
