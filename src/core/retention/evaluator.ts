/**
 * Ratio projection and per-torrent retention decisions.
 *
 * A torrent's current ratio is extrapolated linearly to a one-year horizon:
 * whatever it earned over its observed age, it is assumed to keep earning at the
 * same rate. This over-penalizes torrents that are still ramping up and
 * under-penalizes ones whose demand is fading. Changing the model changes which
 * torrents get removed, so it stays linear.
 */

import type {
  RetentionDecision,
  RetentionPolicy,
  TorrentItem,
} from "../../types";

export const SECONDS_PER_DAY = 24 * 60 * 60;
export const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY;

/**
 * Project a ratio observed after `ageSeconds` onto a full year.
 * Callers must pass a positive age.
 */
export function projectRatio(ratio: number, ageSeconds: number): number {
  return ratio * (SECONDS_PER_YEAR / ageSeconds);
}

/**
 * Decide what to do with one torrent. Pure: `referenceTime` (epoch seconds) is
 * the single "now" of the whole run.
 */
export function evaluateItem(
  item: TorrentItem,
  policy: RetentionPolicy,
  referenceTime: number,
): RetentionDecision {
  const addedOn = item.addedOn ?? 0;
  const ageSeconds = Math.max(0, referenceTime - addedOn);
  const ageDays = Math.floor(ageSeconds / SECONDS_PER_DAY);
  const ageThresholdSeconds = policy.ageThresholdDays * SECONDS_PER_DAY;

  // <= keeps ageSeconds strictly positive below, even with a 0-day threshold
  if (ageSeconds <= ageThresholdSeconds) {
    return {
      item,
      ageSeconds,
      ageDays,
      action: "too_young",
      rationale: `age ${ageDays}d is within the ${policy.ageThresholdDays}d minimum age`,
    };
  }

  if (item.ratio === undefined) {
    return {
      item,
      ageSeconds,
      ageDays,
      action: "keep",
      rationale: "no ratio reported yet, nothing to project",
    };
  }

  const ratio = Math.max(0, item.ratio);
  const projectedRatio = projectRatio(ratio, ageSeconds);

  if (projectedRatio < policy.ratioThreshold) {
    return {
      item,
      ageSeconds,
      ageDays,
      projectedRatio,
      action: "remove",
      rationale: `projected ratio ${projectedRatio.toFixed(2)} is below ${policy.ratioThreshold}`,
    };
  }

  return {
    item,
    ageSeconds,
    ageDays,
    projectedRatio,
    action: "keep",
    rationale: `projected ratio ${projectedRatio.toFixed(2)} meets ${policy.ratioThreshold}`,
  };
}

/**
 * Evaluate a whole snapshot against one reference time, preserving order.
 */
export function evaluateSnapshot(
  items: readonly TorrentItem[],
  policy: RetentionPolicy,
  referenceTime: number,
): RetentionDecision[] {
  return items.map((item) => evaluateItem(item, policy, referenceTime));
}
