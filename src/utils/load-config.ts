/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("lang-json-converter", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/lang-json-converter or ~/.config/lang-json-converter
 * - macOS: ~/Library/Preferences/lang-json-converter
 * - Windows: %APPDATA%\lang-json-converter
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file can't be read, isn't JSON, or doesn't match the schema
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Load user configuration from OS-specific directory
 */
async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge two objects
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom config that fails to load is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
