/**
 * Target resolution strategies, one per SBOM dialect
 *
 * Pure functions: they only read the decoded document.
 */

import { parsePackageUrl, PackageUrlError, type PackageUrl } from "#/purl";
import { parseDigestReference, ImageReferenceError } from "#/reference";
import type { CycloneDxBom, SpdxDocument } from "#/schemas";
import type { TargetReference } from "./referrer.types";
import {
  MissingPackageUrlError,
  InvalidPackageUrlError,
  MissingQualifierError,
  InvalidReferenceError,
  RootPackageNotFoundError,
  PackageManagerRefNotFoundError,
} from "./errors";

export const REPOSITORY_URL_QUALIFIER = "repository_url";
const VERSION_QUALIFIER = "version";

// SPDX 2.2 spells the category with a hyphen, 2.3 with an underscore
const PACKAGE_MANAGER_CATEGORIES = ["PACKAGE-MANAGER", "PACKAGE_MANAGER"];

/**
 * Resolve a package URL to the image it points at
 *
 * The registry and repository come from the `repository_url` qualifier,
 * the digest from the package version (or the `version` qualifier when the
 * purl has no `@version`).
 *
 * @example
 * resolvePackageUrl("pkg:oci/app@sha256%3Aabc...?repository_url=ghcr.io%2Forg%2Fapp")
 * → { registry: "ghcr.io", repository: "org/app", digest: "sha256:abc..." }
 */
export function resolvePackageUrl(purl: string): TargetReference {
  let parsed: PackageUrl;
  try {
    parsed = parsePackageUrl(purl);
  } catch (err) {
    if (err instanceof PackageUrlError) {
      throw new InvalidPackageUrlError(err.message);
    }
    throw err;
  }

  const repositoryUrl = parsed.qualifiers[REPOSITORY_URL_QUALIFIER];
  if (!repositoryUrl) {
    throw new MissingQualifierError(REPOSITORY_URL_QUALIFIER, purl);
  }

  const digest = parsed.version ?? parsed.qualifiers[VERSION_QUALIFIER];
  if (!digest) {
    throw new InvalidReferenceError(`package URL has no version to use as the image digest: ${purl}`);
  }

  try {
    return parseDigestReference(`${repositoryUrl}@${digest}`);
  } catch (err) {
    if (err instanceof ImageReferenceError) {
      throw new InvalidReferenceError(err.message);
    }
    throw err;
  }
}

/**
 * CycloneDX: the primary component (`metadata.component`) identifies the image.
 * Its `bom-ref` is used when it is a package URL, otherwise its `purl`.
 */
export function resolveCycloneDx(bom: CycloneDxBom): TargetReference {
  const component = bom.metadata?.component;
  const bomRef = component?.["bom-ref"];
  const purl = bomRef?.startsWith("pkg:") ? bomRef : component?.purl;

  if (!purl) {
    throw new MissingPackageUrlError("not found: metadata.component has no package URL (bom-ref or purl)");
  }

  return resolvePackageUrl(purl);
}

/**
 * SPDX: the root package shares the document's name; its PACKAGE-MANAGER
 * external reference carries the image's package URL.
 * First match in document order wins.
 */
export function resolveSpdx(document: SpdxDocument): TargetReference {
  const rootPackages = document.packages.filter((pkg) => pkg.name === document.name);
  if (rootPackages.length === 0) {
    throw new RootPackageNotFoundError(document.name);
  }

  for (const pkg of rootPackages) {
    const ref = pkg.externalRefs.find((externalRef) =>
      PACKAGE_MANAGER_CATEGORIES.includes(externalRef.referenceCategory)
    );
    if (ref) {
      return resolvePackageUrl(ref.referenceLocator);
    }
  }

  throw new PackageManagerRefNotFoundError(document.name);
}
