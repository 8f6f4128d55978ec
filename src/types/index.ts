/**
 * Centralized type exports for seedsweep
 */

// Config types
export type {
  ClientConfig,
  PolicyConfig,
  SafetyConfig,
  ScheduleConfig,
  SeedsweepConfig,
} from "./config";
// Retention types
export type {
  RetentionAction,
  RetentionDecision,
  RetentionPolicy,
  RetentionRunResult,
} from "./retention";
// Torrent types
export type { RawTorrentInfo, TorrentItem, TorrentService } from "./torrent";
