/**
 * Invalid or missing configuration (config file, Docker config, environment)
 */
export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}
