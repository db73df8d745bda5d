/**
 * Registry resolver
 *
 * Normalizes a registry host plus config to ResolvedRegistry.
 * Parse once, never parse again - downstream code only sees ResolvedRegistry.
 */

import type { CredentialProvider, RegistryCredentials } from "#/core";
import type { ReferrerConfig, RegistryEntry } from "#/schemas";
import type { RegistryScheme, ResolvedRegistry } from "./registry.types";

/**
 * Strip the port from a registry host ("[::1]:5000" → "[::1]", "localhost:5000" → "localhost")
 */
export function hostname(host: string): string {
  if (host.startsWith("[")) {
    const end = host.indexOf("]");
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.lastIndexOf(":");
  return colon === -1 ? host : host.slice(0, colon);
}

/**
 * Registries on the local machine or a .local name are reached over plain HTTP
 */
export function isLocalRegistry(host: string): boolean {
  const name = hostname(host).toLowerCase();
  return (
    name === "localhost" ||
    name === "[::1]" ||
    /^127(\.\d{1,3}){3}$/.test(name) ||
    name.endsWith(".local")
  );
}

export function getScheme(host: string, entry?: RegistryEntry): RegistryScheme {
  return entry?.insecure || isLocalRegistry(host) ? "http" : "https";
}

function credentialsFromEntry(entry: RegistryEntry | undefined): RegistryCredentials | undefined {
  if (entry?.username !== undefined && entry.password !== undefined) {
    return { kind: "basic", username: entry.username, password: entry.password };
  }
  if (entry?.token) {
    return { kind: "token", token: entry.token };
  }
  return undefined;
}

/**
 * Resolve a registry host to connection settings
 *
 * Credential priority:
 * 1. Config entry (username/password, then token)
 * 2. CredentialProvider (environment variables, Docker config)
 * 3. Anonymous
 */
export function resolveRegistry(
  host: string,
  config: ReferrerConfig | null,
  credentials?: CredentialProvider
): ResolvedRegistry {
  const entry = config?.registries[host];

  const resolved = credentialsFromEntry(entry) ?? credentials?.getRegistryCredentials(host);

  return {
    host,
    scheme: getScheme(host, entry),
    ...(resolved ? { credentials: resolved } : {}),
  };
}
