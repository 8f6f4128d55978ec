/**
 * Configuration type definitions for seedsweep
 */

export interface ClientConfig {
  /** qBittorrent WebUI base URL, e.g. http://127.0.0.1:8080 */
  endpoint: string;
  username: string;
  password: string;
}

export interface PolicyConfig {
  ageDays: number;
  ratio: number;
}

export interface SafetyConfig {
  dryRun: boolean;
}

export interface ScheduleConfig {
  cron: string;
  timezone?: string;
}

export interface SeedsweepConfig {
  version: string;
  client: ClientConfig;
  policy: PolicyConfig;
  safety: SafetyConfig;
  schedule?: ScheduleConfig;
}
