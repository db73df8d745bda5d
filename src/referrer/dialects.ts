/**
 * SBOM dialects a referrer can be built from
 *
 * Closed table: each dialect pairs its resolution strategy with the
 * media type and description that end up in the manifest.
 */

import { OCI_MEDIA_TYPES } from "#/oci";
import { isSbomDialect, UnsupportedFormatError, type SbomFormat } from "#/sbom";
import type { ArtifactConstants, DialectProfile, DialectTable } from "./referrer.types";
import { resolveCycloneDx, resolveSpdx } from "./strategies";

// @see https://github.com/opencontainers/image-spec/blob/main/annotations.md#pre-defined-annotation-keys
export const ANNOTATION_DESCRIPTION = "org.opencontainers.artifact.description";

// @see https://www.iana.org/assignments/media-types/media-types.xhtml
export const MEDIA_TYPE_CYCLONEDX = "application/vnd.cyclonedx+json";
export const MEDIA_TYPE_SPDX = "application/spdx+json";

export const ARTIFACT_CONSTANTS: ArtifactConstants = Object.freeze({
  descriptionAnnotation: ANNOTATION_DESCRIPTION,
  layerMediaType: OCI_MEDIA_TYPES.layer,
});

export const REFERRER_DIALECTS: DialectTable = {
  "cyclonedx-json": {
    dialect: "cyclonedx-json",
    mediaType: MEDIA_TYPE_CYCLONEDX,
    description: "CycloneDX JSON SBOM",
    resolve: resolveCycloneDx,
  },
  "spdx-json": {
    dialect: "spdx-json",
    mediaType: MEDIA_TYPE_SPDX,
    description: "SPDX JSON SBOM",
    resolve: resolveSpdx,
  },
};

/**
 * Look up the dialect for a detected SBOM format
 *
 * @throws UnsupportedFormatError for formats that are detected but not supported
 */
export function getReferrerDialect(format: SbomFormat): DialectProfile {
  if (!isSbomDialect(format)) {
    throw new UnsupportedFormatError(`unsupported format: ${format}`);
  }
  const { dialect, mediaType, description } = REFERRER_DIALECTS[format];
  return { dialect, mediaType, description };
}
