/**
 * Global constants for sbom-referrer
 */

export const USER_AGENT = "sbom-referrer";

// Docker Hub is addressed by its canonical registry host; "docker.io" is an alias
export const DEFAULT_REGISTRY_HOST = "index.docker.io";
export const DOCKER_HUB_ALIAS = "docker.io";
export const DOCKER_HUB_AUTH_KEY = "https://index.docker.io/v1/";
export const DOCKER_HUB_OFFICIAL_NAMESPACE = "library";

// Environment variables
export const ENV_CONFIG_PATH = "SBOM_REFERRER_CONFIG";
export const ENV_LOG_LEVEL = "SBOM_REFERRER_LOG_LEVEL";
export const ENV_USERNAME = "SBOM_REFERRER_USERNAME";
export const ENV_PASSWORD = "SBOM_REFERRER_PASSWORD";
export const ENV_TOKEN = "SBOM_REFERRER_TOKEN";
export const ENV_DOCKER_CONFIG = "DOCKER_CONFIG";

// Digest: <algorithm>:<hex>, only sha256 and sha512 are accepted
export const DIGEST_REGEX = /^(sha256:[a-f0-9]{64}|sha512:[a-f0-9]{128})$/;

// Repository path component (lowercase alphanumerics joined by separators)
export const REPOSITORY_COMPONENT_REGEX = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

// Registry host with optional port; IPv6 literals in brackets
export const REGISTRY_HOST_REGEX = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9.-]*[a-zA-Z0-9])?|\[[0-9a-fA-F:]+\])(?::[0-9]+)?$/;
