/**
 * Registry types
 *
 * The referrer pipeline only knows the ReferrerRegistry interface; the
 * OCI Distribution client behind it is picked by the factory.
 */

import type { RegistryCredentials } from "#/core";

export type RegistryScheme = "https" | "http";

/**
 * Normalized registry connection settings.
 * Created by resolver from config and credentials, used by factory to create clients.
 */
export interface ResolvedRegistry {
  host: string;
  scheme: RegistryScheme;
  credentials?: RegistryCredentials;
}
