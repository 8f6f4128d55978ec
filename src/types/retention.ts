/**
 * Retention policy type definitions
 */

import type { TorrentItem } from "./torrent";

export interface RetentionPolicy {
  /** Torrents this young (or younger) are never considered */
  ageThresholdDays: number;
  /** Minimum acceptable projected one-year ratio */
  ratioThreshold: number;
  /** Report decisions without removing anything */
  simulate: boolean;
}

export type RetentionAction = "too_young" | "keep" | "remove";

export interface RetentionDecision {
  item: TorrentItem;
  ageSeconds: number;
  ageDays: number;
  projectedRatio?: number;
  action: RetentionAction;
  rationale: string;
}

export interface RetentionRunResult {
  referenceTime: number;
  decisions: RetentionDecision[];
  checked: number;
  tooYoung: number;
  kept: number;
  removed: number;
  wouldRemove: number;
  removedHashes: string[];
}
