/**
 * Credential discovery
 *
 * Order per registry host:
 * 1. SBOM_REFERRER_USERNAME + SBOM_REFERRER_PASSWORD, or SBOM_REFERRER_TOKEN
 * 2. Docker config ($DOCKER_CONFIG/config.json or ~/.docker/config.json)
 *
 * Config file entries take precedence over both; see resolveRegistry.
 * Docker credential helpers (credsStore, credHelpers) are never executed.
 */

import { join } from "path";
import type { CredentialProvider, Environment, FileSystem, RegistryCredentials } from "#/core";
import {
  DEFAULT_REGISTRY_HOST,
  DOCKER_HUB_ALIAS,
  DOCKER_HUB_AUTH_KEY,
  ENV_DOCKER_CONFIG,
  ENV_PASSWORD,
  ENV_TOKEN,
  ENV_USERNAME,
} from "#/constants";
import { DockerConfigSchema, type DockerAuthEntry, type DockerConfig } from "#/schemas";
import { safeParseJson } from "#/friendly-errors";
import { ConfigError } from "#/config";

export interface CredentialSources {
  fs: FileSystem;
  env: Environment;
}

export function getDockerConfigPath(env: Environment): string {
  const dir = env.get(ENV_DOCKER_CONFIG) || join(env.homeDir(), ".docker");
  return join(dir, "config.json");
}

/**
 * Registry host an `auths` key refers to
 *
 * @example
 * normalizeAuthKey("https://ghcr.io/v2/") → "ghcr.io"
 * normalizeAuthKey("https://index.docker.io/v1/") → "index.docker.io"
 */
export function normalizeAuthKey(key: string): string {
  const withoutScheme = key.replace(/^[a-z]+:\/\//i, "");
  const slash = withoutScheme.indexOf("/");
  const host = slash === -1 ? withoutScheme : withoutScheme.slice(0, slash);
  return host.toLowerCase();
}

function isDockerHub(host: string): boolean {
  return host === DEFAULT_REGISTRY_HOST || host === DOCKER_HUB_ALIAS;
}

function credentialsFromEnv(env: Environment): RegistryCredentials | undefined {
  const username = env.get(ENV_USERNAME);
  const password = env.get(ENV_PASSWORD);
  if (username && password) {
    return { kind: "basic", username, password };
  }

  const token = env.get(ENV_TOKEN);
  if (token) {
    return { kind: "token", token };
  }

  return undefined;
}

function credentialsFromAuthEntry(entry: DockerAuthEntry): RegistryCredentials | undefined {
  if (entry.username && entry.password) {
    return { kind: "basic", username: entry.username, password: entry.password };
  }

  if (entry.auth) {
    const decoded = Buffer.from(entry.auth, "base64").toString("utf-8");
    const colon = decoded.indexOf(":");
    if (colon > 0) {
      return {
        kind: "basic",
        username: decoded.slice(0, colon),
        password: decoded.slice(colon + 1),
      };
    }
  }

  return undefined;
}

/**
 * Find the `auths` entry for a host
 *
 * An exact key wins over a normalized one; Docker Hub also matches the
 * legacy `https://index.docker.io/v1/` key.
 */
export function findDockerAuthEntry(config: DockerConfig, host: string): DockerAuthEntry | undefined {
  const exact = config.auths[host];
  if (exact) {
    return exact;
  }

  const wanted = host.toLowerCase();
  if (isDockerHub(wanted)) {
    const hub = config.auths[DOCKER_HUB_AUTH_KEY];
    if (hub) {
      return hub;
    }
  }

  for (const [key, entry] of Object.entries(config.auths)) {
    const keyHost = normalizeAuthKey(key);
    if (keyHost === wanted || (isDockerHub(keyHost) && isDockerHub(wanted))) {
      return entry;
    }
  }

  return undefined;
}

/**
 * Read the Docker config file, or undefined when there is none
 *
 * @throws ConfigError when the file exists but is not a valid Docker config
 */
export function loadDockerConfig(sources: CredentialSources): DockerConfig | undefined {
  const path = getDockerConfigPath(sources.env);
  if (!sources.fs.exists(path)) {
    return undefined;
  }

  const result = safeParseJson(sources.fs.readFile(path), DockerConfigSchema, `Docker config ${path}`);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }
  return result.data;
}

/**
 * Create a CredentialProvider backed by the environment and the Docker config
 *
 * The Docker config is read once, on the first lookup that needs it.
 */
export function createCredentialProvider(sources: CredentialSources): CredentialProvider {
  let dockerConfig: DockerConfig | undefined;
  let dockerConfigLoaded = false;

  return {
    getRegistryCredentials(host: string): RegistryCredentials | undefined {
      const fromEnv = credentialsFromEnv(sources.env);
      if (fromEnv) {
        return fromEnv;
      }

      if (!dockerConfigLoaded) {
        dockerConfig = loadDockerConfig(sources);
        dockerConfigLoaded = true;
      }

      const entry = dockerConfig ? findDockerAuthEntry(dockerConfig, host) : undefined;
      return entry ? credentialsFromAuthEntry(entry) : undefined;
    },
  };
}
