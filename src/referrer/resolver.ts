/**
 * Repository reference resolver
 *
 * Finds the image (registry, repository, digest) a decoded SBOM was
 * generated for, using the strategy registered for its dialect.
 */

import type { DecodedSbom, SbomDialect, SbomDocumentMap } from "#/sbom";
import type { TargetReference } from "./referrer.types";
import { REFERRER_DIALECTS } from "./dialects";

function resolveWith<D extends SbomDialect>(dialect: D, document: SbomDocumentMap[D]): TargetReference {
  return REFERRER_DIALECTS[dialect].resolve(document);
}

/**
 * @throws ResolutionError when the SBOM lacks the expected provenance metadata
 */
export function resolveTargetReference(sbom: DecodedSbom): TargetReference {
  return resolveWith(sbom.dialect, sbom.document);
}
