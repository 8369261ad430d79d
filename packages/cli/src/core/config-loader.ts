/**
 * Loads ~/.sdkpath/config.yaml and layers command-line overrides on top.
 */

import { parse as yamlParse, YAMLParseError } from "yaml";
import { sdkPathConfigSchema, type SdkPathConfig } from "@sdkpath/core";
import { CONFIG_PATH, readFileIfExists } from "./fs-helpers.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read and validate the config file. A missing or empty file yields the
 * defaults; anything else invalid throws ConfigError.
 */
export function loadConfig(
  configPath: string = CONFIG_PATH,
  overrides: Partial<SdkPathConfig> = {},
): SdkPathConfig {
  const content = readFileIfExists(configPath);

  let raw: unknown = {};
  if (content !== null) {
    try {
      raw = yamlParse(content) ?? {};
    } catch (error) {
      if (error instanceof YAMLParseError) {
        throw new ConfigError(`Invalid YAML in ${configPath}: ${error.message}`, configPath);
      }
      throw error;
    }
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${configPath} must contain a mapping of settings`, configPath);
  }

  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = sdkPathConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".") || "(root)";
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid settings in ${configPath}: ${issues.join("; ")}`, configPath, issues);
  }

  return parsed.data;
}
