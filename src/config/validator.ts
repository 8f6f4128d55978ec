/**
 * Configuration validation
 */

import type { SeedsweepConfig } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Section = Record<string, unknown>;
type Validator = (config: Section) => void;

function section(config: Section, key: string): Section {
  const value = config[key];
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError(`Config must have a '${key}' section`);
  }
  return value as Section;
}

/**
 * Validate a qBittorrent WebUI address. Only http(s) is accepted.
 */
export function validateEndpoint(endpoint: unknown): URL {
  if (typeof endpoint !== "string" || endpoint.trim() === "") {
    throw new ConfigError("client.endpoint must be a non-empty string");
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigError(`client.endpoint is not a valid URL: "${endpoint}"`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(
      `client.endpoint must use http or https, got "${url.protocol.replace(/:$/, "")}"`,
    );
  }

  return url;
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  client: (c) => {
    const client = section(c, "client");
    validateEndpoint(client.endpoint);
    if (typeof client.username !== "string") {
      throw new ConfigError("client.username must be a string");
    }
    if (typeof client.password !== "string") {
      throw new ConfigError("client.password must be a string");
    }
  },

  policy: (c) => {
    const policy = section(c, "policy");
    if (
      typeof policy.ageDays !== "number" ||
      !Number.isInteger(policy.ageDays) ||
      policy.ageDays < 0
    ) {
      throw new ConfigError("policy.ageDays must be a non-negative integer");
    }
    if (
      typeof policy.ratio !== "number" ||
      !Number.isFinite(policy.ratio) ||
      policy.ratio < 0
    ) {
      throw new ConfigError("policy.ratio must be a non-negative number");
    }
  },

  safety: (c) => {
    const safety = section(c, "safety");
    if (typeof safety.dryRun !== "boolean") {
      throw new ConfigError("safety.dryRun must be a boolean");
    }
  },

  schedule: (c) => {
    if (c.schedule === undefined) {
      return; // Only needed by the scheduler
    }
    const schedule = section(c, "schedule");
    if (!schedule.cron || typeof schedule.cron !== "string") {
      throw new ConfigError("schedule.cron must be a string");
    }
    const fields = schedule.cron.trim().split(/\s+/);
    if (fields.length !== 5) {
      throw new ConfigError(
        `schedule.cron must have 5 fields, got ${fields.length}: "${schedule.cron}"`,
      );
    }
    if (schedule.timezone !== undefined && typeof schedule.timezone !== "string") {
      throw new ConfigError("schedule.timezone must be a string");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is SeedsweepConfig {
  if (!config || typeof config !== "object") {
    throw new ConfigError("Config must be an object");
  }

  const c = config as Section;

  for (const validate of Object.values(validators)) {
    validate(c);
  }
}
