/**
 * Registry module
 *
 * Resolves registry hosts to connection settings and publishes referrers
 * over the OCI Distribution API.
 */

// Types
export * from "./registry.types";

// Errors
export * from "./errors";

// Resolver (scheme, credentials)
export * from "./resolver";

// Factory (client creation)
export { createReferrerRegistry, type ReferrerRegistryOptions } from "./factory";

// Clients (direct access if needed)
export { OciReferrerRegistry, referrersTag, type RegistryResolver } from "./clients/oci";
