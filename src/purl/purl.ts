/**
 * Package URL parsing
 *
 * Parses `pkg:type/namespace/name@version?qualifiers#subpath` identifiers.
 * Components are percent-decoded; qualifier keys are lowercased.
 *
 * @see https://github.com/package-url/purl-spec/blob/master/PURL-SPECIFICATION.rst
 */

export interface PackageUrl {
  type: string;
  namespace?: string;
  name: string;
  version?: string;
  qualifiers: Record<string, string>;
  subpath?: string;
}

export class PackageUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PackageUrlError";
  }
}

const PURL_SCHEME = "pkg";
const PURL_TYPE_REGEX = /^[a-zA-Z.+-][a-zA-Z0-9.+-]*$/;

function decode(component: string, purl: string): string {
  try {
    return decodeURIComponent(component);
  } catch {
    throw new PackageUrlError(`Invalid percent-encoding in package URL: ${purl}`);
  }
}

/**
 * Split on the last occurrence of a separator.
 * Returns [before, after] or [input, undefined] when absent.
 */
function splitLast(input: string, separator: string): [string, string | undefined] {
  const index = input.lastIndexOf(separator);
  if (index === -1) {
    return [input, undefined];
  }
  return [input.slice(0, index), input.slice(index + separator.length)];
}

function parseQualifiers(raw: string, purl: string): Record<string, string> {
  const qualifiers: Record<string, string> = {};

  for (const pair of raw.split("&")) {
    if (!pair) continue;

    const equalsIndex = pair.indexOf("=");
    if (equalsIndex <= 0) {
      throw new PackageUrlError(`Invalid qualifier "${pair}" in package URL: ${purl}`);
    }

    const key = pair.slice(0, equalsIndex).toLowerCase();
    const value = decode(pair.slice(equalsIndex + 1), purl);

    // Empty values are the same as an absent qualifier
    if (value && !(key in qualifiers)) {
      qualifiers[key] = value;
    }
  }

  return qualifiers;
}

/**
 * Parse a package URL string
 *
 * @example
 * parsePackageUrl("pkg:oci/alpine@sha256%3Aabc?repository_url=index.docker.io%2Flibrary%2Falpine")
 * → { type: "oci", name: "alpine", version: "sha256:abc", qualifiers: { repository_url: "index.docker.io/library/alpine" } }
 *
 * @throws PackageUrlError when the string is not a package URL
 */
export function parsePackageUrl(purl: string): PackageUrl {
  if (!purl.trim()) {
    throw new PackageUrlError("Package URL is empty");
  }

  const [beforeSubpath, rawSubpath] = splitLast(purl, "#");
  const [beforeQualifiers, rawQualifiers] = splitLast(beforeSubpath, "?");

  const colonIndex = beforeQualifiers.indexOf(":");
  const scheme = colonIndex === -1 ? "" : beforeQualifiers.slice(0, colonIndex);
  if (scheme.toLowerCase() !== PURL_SCHEME) {
    throw new PackageUrlError(`Package URL must start with "pkg:": ${purl}`);
  }

  // Slashes after the scheme are not significant
  const remainder = beforeQualifiers.slice(colonIndex + 1).replace(/^\/+/, "").replace(/\/+$/, "");

  const slashIndex = remainder.indexOf("/");
  if (slashIndex === -1) {
    throw new PackageUrlError(`Package URL is missing a type or name: ${purl}`);
  }

  const type = remainder.slice(0, slashIndex).toLowerCase();
  if (!PURL_TYPE_REGEX.test(type)) {
    throw new PackageUrlError(`Invalid package URL type "${type}": ${purl}`);
  }

  const [path, rawVersion] = splitLast(remainder.slice(slashIndex + 1), "@");
  const [rawNamespace, rawName] = splitLast(path, "/");
  const name = decode(rawName ?? rawNamespace, purl);
  if (!name) {
    throw new PackageUrlError(`Package URL is missing a name: ${purl}`);
  }

  const namespace = rawName === undefined
    ? undefined
    : rawNamespace
        .split("/")
        .filter((segment) => segment.length > 0)
        .map((segment) => decode(segment, purl))
        .join("/") || undefined;

  const subpath = rawSubpath === undefined
    ? undefined
    : rawSubpath
        .split("/")
        .filter((segment) => segment.length > 0 && segment !== "." && segment !== "..")
        .map((segment) => decode(segment, purl))
        .join("/") || undefined;

  return {
    type,
    namespace,
    name,
    version: rawVersion ? decode(rawVersion, purl) : undefined,
    qualifiers: rawQualifiers ? parseQualifiers(rawQualifiers, purl) : {},
    subpath,
  };
}
