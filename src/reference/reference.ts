/**
 * Digest reference parsing
 *
 * Parse once, never parse again - downstream code only sees DigestReference.
 */

import {
  DEFAULT_REGISTRY_HOST,
  DIGEST_REGEX,
  DOCKER_HUB_ALIAS,
  DOCKER_HUB_OFFICIAL_NAMESPACE,
  REGISTRY_HOST_REGEX,
  REPOSITORY_COMPONENT_REGEX,
} from "#/constants";
import { ImageReferenceError, type DigestReference } from "./reference.types";

const MAX_REPOSITORY_LENGTH = 255;

export function isValidDigest(digest: string): boolean {
  return DIGEST_REGEX.test(digest);
}

/**
 * The first path component is a registry host only if it looks like one:
 * it contains a dot or a port, or is "localhost".
 */
function looksLikeRegistry(component: string): boolean {
  return component.includes(".") || component.includes(":") || component === "localhost";
}

function splitRegistry(name: string): { registry: string; repository: string } {
  const slashIndex = name.indexOf("/");
  const first = slashIndex === -1 ? "" : name.slice(0, slashIndex);

  if (first && looksLikeRegistry(first)) {
    const registry = first === DOCKER_HUB_ALIAS ? DEFAULT_REGISTRY_HOST : first;
    return { registry, repository: name.slice(slashIndex + 1) };
  }

  return { registry: DEFAULT_REGISTRY_HOST, repository: name };
}

/**
 * Drop a trailing ":tag" from the last path component, if any
 */
function stripTag(repository: string): string {
  const lastSlash = repository.lastIndexOf("/");
  const colonIndex = repository.indexOf(":", lastSlash + 1);
  return colonIndex === -1 ? repository : repository.slice(0, colonIndex);
}

/**
 * Parse a digest reference (`registry/repository@sha256:...`)
 *
 * Follows the usual container-image rules:
 * - No registry component → Docker Hub (`index.docker.io`)
 * - `docker.io` → `index.docker.io`
 * - Single-component Docker Hub repositories get the `library/` prefix
 * - A tag next to the digest is dropped (`repo:tag@sha256:...`)
 *
 * @example
 * parseDigestReference("ghcr.io/org/app@sha256:abc...") → { registry: "ghcr.io", repository: "org/app", digest: "sha256:abc..." }
 * parseDigestReference("alpine@sha256:abc...") → { registry: "index.docker.io", repository: "library/alpine", digest: "sha256:abc..." }
 *
 * @throws ImageReferenceError on malformed input
 */
export function parseDigestReference(input: string): DigestReference {
  const atIndex = input.lastIndexOf("@");
  if (atIndex === -1) {
    throw new ImageReferenceError(`Invalid reference "${input}": a digest reference must contain "@"`);
  }

  const name = input.slice(0, atIndex);
  const digest = input.slice(atIndex + 1);

  if (!isValidDigest(digest)) {
    throw new ImageReferenceError(`Invalid reference "${input}": invalid digest "${digest}"`);
  }

  const split = splitRegistry(name);
  const registry = split.registry;
  let repository = stripTag(split.repository);

  if (!REGISTRY_HOST_REGEX.test(registry)) {
    throw new ImageReferenceError(`Invalid reference "${input}": invalid registry "${registry}"`);
  }

  if (!repository) {
    throw new ImageReferenceError(`Invalid reference "${input}": repository is empty`);
  }

  if (registry === DEFAULT_REGISTRY_HOST && !repository.includes("/")) {
    repository = `${DOCKER_HUB_OFFICIAL_NAMESPACE}/${repository}`;
  }

  const invalidComponent = repository
    .split("/")
    .find((component) => !REPOSITORY_COMPONENT_REGEX.test(component));
  if (invalidComponent !== undefined) {
    throw new ImageReferenceError(
      `Invalid reference "${input}": repository must be lowercase alphanumerics separated by ".", "_", "__" or "-"`
    );
  }

  if (repository.length > MAX_REPOSITORY_LENGTH) {
    throw new ImageReferenceError(`Invalid reference "${input}": repository is longer than ${MAX_REPOSITORY_LENGTH} characters`);
  }

  return { registry, repository, digest };
}

/**
 * Format a digest reference back to its string form
 */
export function formatDigestReference(ref: DigestReference): string {
  return `${ref.registry}/${ref.repository}@${ref.digest}`;
}
