/**
 * Environment overrides
 */

import type { PartialConfig } from "./defaults";

export const ENV_VARS = {
  endpoint: "QBIT_ENDPOINT",
  username: "QBIT_USERNAME",
  password: "QBIT_PASSWORD",
} as const;

/**
 * Client settings taken from the environment. Empty variables are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value ? value : undefined;
  };

  const client = {
    endpoint: pick(ENV_VARS.endpoint),
    username: pick(ENV_VARS.username),
    password: pick(ENV_VARS.password),
  };

  if (Object.values(client).every((value) => value === undefined)) {
    return {};
  }
  return { client };
}
