/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { SeedsweepConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, type PartialConfig } from "./defaults";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { configFromEnv } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "seedsweep.config.yaml",
  "seedsweep.config.yml",
  "seedsweep.config.json",
] as const;

/**
 * Load, merge with defaults and validate a config file
 */
export async function loadConfig(configPath: string): Promise<SeedsweepConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, "utf8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${(e as Error).message}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  const merged = deepMerge<object>(DEFAULT_CONFIG, parsed);
  validateConfig(merged);
  return merged;
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function isRunningInDocker(): boolean {
  return existsSync("/.dockerenv");
}

/**
 * Find a config file in the given directory, or in /config inside Docker
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];
  if (isRunningInDocker()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Load an explicit config file, or the one found in standard locations.
 * Without either, the defaults apply.
 */
export async function findAndLoadConfig(configPath?: string): Promise<SeedsweepConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return loadConfig(found);
}

export interface ResolveConfigOptions {
  configPath?: string;
  inline?: InlineConfigOptions;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then config file, then environment, then CLI flags.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<SeedsweepConfig> {
  const base = await findAndLoadConfig(options.configPath);

  const overrides: PartialConfig[] = [
    configFromEnv(options.env),
    buildInlineConfig(options.inline ?? {}),
  ];
  const config = overrides.reduce<SeedsweepConfig>(
    (acc, override) => deepMerge(acc, override),
    base,
  );

  validateConfig(config);
  return config;
}
