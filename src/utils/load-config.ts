import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { deepFreeze } from "./freeze";
import type {
  ConversionConfig,
  ConfigError,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("cobol-migrate", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

async function loadPartialConfig(path: string): Promise<PartialConversionConfig> {
  const content = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Merge an override onto a full configuration, section by section.
 * Arrays replace rather than concatenate.
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    generator: {
      ...base.generator,
      ...override.generator,
      templates: {
        ...base.generator.templates,
        ...override.generator?.templates,
      },
    },
    validation: { ...base.validation, ...override.validation },
    ids: { ...base.ids, ...override.ids },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: Readonly<ConversionConfig>;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: overrides > custom path > user config > default config
 *
 * The returned configuration is frozen; one job never sees another
 * job's changes.
 */
export async function loadConfig(
  custom?: string,
  overrides?: PartialConversionConfig,
): Promise<LoadConfigResult> {
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

  if (overrides) {
    config = mergeConfig(config, overrides);
  }

  return { config: deepFreeze(config), errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
