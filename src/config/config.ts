/**
 * Config loading
 *
 * The config file is optional. Its path comes from --config, then
 * SBOM_REFERRER_CONFIG; without either, defaults apply.
 */

import type { Environment, FileSystem } from "#/core";
import { ENV_CONFIG_PATH, ENV_LOG_LEVEL } from "#/constants";
import { LogLevelSchema, ReferrerConfigSchema, type LogLevel, type ReferrerConfig } from "#/schemas";
import { safeParseYaml } from "#/friendly-errors";
import { ConfigError } from "./errors";

export function getDefaultConfig(): ReferrerConfig {
  return ReferrerConfigSchema.parse({});
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError with the YAML or schema issues as details
 */
export function parseConfig(content: string, filepath?: string): ReferrerConfig {
  const result = safeParseYaml(content, ReferrerConfigSchema, filepath);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }
  return result.data;
}

/**
 * Load the config file, or defaults when no path is given
 *
 * @param explicitPath - Path from --config; takes precedence over the environment
 * @throws ConfigError when the file is missing or invalid
 */
export function loadConfig(fs: FileSystem, env: Environment, explicitPath?: string): ReferrerConfig {
  const path = explicitPath ?? env.get(ENV_CONFIG_PATH);
  if (!path) {
    return getDefaultConfig();
  }

  if (!fs.exists(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  return parseConfig(fs.readFile(path), path);
}

/**
 * Effective log level: --debug, then SBOM_REFERRER_LOG_LEVEL, then config
 */
export function resolveLogLevel(config: ReferrerConfig, env: Environment, debug = false): LogLevel {
  if (debug) {
    return "debug";
  }

  const fromEnv = env.get(ENV_LOG_LEVEL);
  if (fromEnv) {
    const parsed = LogLevelSchema.safeParse(fromEnv.toLowerCase());
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${ENV_LOG_LEVEL}: "${fromEnv}"`, [
        `Expected one of: ${LogLevelSchema.options.join(", ")}`,
      ]);
    }
    return parsed.data;
  }

  return config.logLevel;
}
