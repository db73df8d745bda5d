/**
 * Registry factory
 *
 * Single decision point for creating the registry the referrer pipeline talks to.
 */

import type { CredentialProvider, HttpClient, Logger } from "#/core";
import type { ReferrerRegistry } from "#/referrer";
import type { ReferrerConfig } from "#/schemas";
import { resolveRegistry } from "./resolver";
import { OciReferrerRegistry } from "./clients/oci";

export interface ReferrerRegistryOptions {
  config: ReferrerConfig | null;
  credentials?: CredentialProvider;
  http: HttpClient;
  logger: Logger;
}

/**
 * Create a registry that resolves each host's scheme and credentials on first use
 */
export function createReferrerRegistry(options: ReferrerRegistryOptions): ReferrerRegistry {
  const { config, credentials, http, logger } = options;
  return new OciReferrerRegistry(
    (host) => resolveRegistry(host, config, credentials),
    http,
    logger
  );
}
