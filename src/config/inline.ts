/**
 * Command-line overrides of the configuration
 */

import type { PartialConfig } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Overrides that can be passed as CLI flags
 */
export interface InlineConfigOptions {
  /** Minimum age in days before a torrent is considered */
  ageDays?: number;
  /** Minimum projected one-year ratio */
  ratio?: number;
  endpoint?: string;
  username?: string;
  password?: string;
  /** Report without removing */
  dryRun?: boolean;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  age: { type: "string" as const },
  ratio: { type: "string" as const },
  endpoint: { type: "string" as const },
  username: { type: "string" as const },
  password: { type: "string" as const },
  "dry-run": { type: "boolean" as const },
} as const;

function parseNumberFlag(flag: string, raw: unknown, integer: boolean): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `--${flag} must be a non-negative ${integer ? "integer" : "number"}, got "${String(raw)}"`,
    );
  }
  return value;
}

function optionalString(raw: unknown): string | undefined {
  return typeof raw === "string" ? raw : undefined;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  return {
    ageDays: parseNumberFlag("age", values.age, true),
    ratio: parseNumberFlag("ratio", values.ratio, false),
    endpoint: optionalString(values.endpoint),
    username: optionalString(values.username),
    password: optionalString(values.password),
    dryRun: typeof values["dry-run"] === "boolean" ? values["dry-run"] : undefined,
  };
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): PartialConfig {
  const config: PartialConfig = {};

  if (options.endpoint !== undefined || options.username !== undefined || options.password !== undefined) {
    config.client = {
      endpoint: options.endpoint,
      username: options.username,
      password: options.password,
    };
  }

  if (options.ageDays !== undefined || options.ratio !== undefined) {
    config.policy = { ageDays: options.ageDays, ratio: options.ratio };
  }

  if (options.dryRun) {
    config.safety = { dryRun: true };
  }

  return config;
}
