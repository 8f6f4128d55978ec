/**
 * Default configuration values
 */

import type { SeedsweepConfig } from "../types";

export const DEFAULT_CONFIG: SeedsweepConfig = {
  version: "1.0",
  client: {
    endpoint: "http://127.0.0.1:8080",
    username: "admin",
    password: "adminadmin",
  },
  policy: {
    ageDays: 100,
    ratio: 10,
  },
  safety: {
    dryRun: false,
  },
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type PartialConfig = DeepPartial<SeedsweepConfig>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Undefined source
 * values never override.
 */
export function deepMerge<T extends object>(target: T, source: DeepPartial<T>): T {
  const result = { ...target } as Record<string, unknown>;

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}
