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
  ConfigError,
  EnrichConfig,
  PartialEnrichConfig,
} from "../types";
import { EnrichConfigSchema, PartialEnrichConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("catalog-enricher", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/catalog-enricher or ~/.config/catalog-enricher
 * - macOS: ~/Library/Preferences/catalog-enricher
 * - Windows: %APPDATA%\catalog-enricher
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<EnrichConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return EnrichConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialEnrichConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialEnrichConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: EnrichConfig,
  override: PartialEnrichConfig,
): EnrichConfig {
  return {
    document: { ...base.document, ...override.document },
    source: { ...base.source, ...override.source },
    translation: {
      ...base.translation,
      ...override.translation,
      delay: { ...base.translation.delay, ...override.translation?.delay },
    },
    images: { ...base.images, ...override.images },
    retry: { ...base.retry, ...override.retry },
    checkpoint: { ...base.checkpoint, ...override.checkpoint },
    stats: { ...base.stats, ...override.stats },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: EnrichConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
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
