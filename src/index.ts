/**
 * sbom-referrer
 *
 * Attach SBOM documents to the container images they describe, as OCI
 * referrers. Portable, testable, dependency-injected.
 */

// Core interfaces
export * from "#/core";

// Schemas (Zod validation)
export * from "#/schemas";

// Friendly parse errors
export * from "#/friendly-errors";

// SBOM format detection and decoding
export * from "#/sbom";

// Package URLs
export * from "#/purl";

// Image digest references
export * from "#/reference";

// OCI Distribution Spec
export * from "#/oci";

// Referrer building and the put pipeline
export * from "#/referrer";

// Registry (resolution, clients)
export * from "#/registry";

// Config file and credentials
export * from "#/config";
export * from "#/auth";

// Logging
export * from "#/logger";

// Commands
export * from "#/commands";
