/**
 * SBOM types
 *
 * Detection recognizes more formats than the referrer pipeline supports,
 * so unsupported inputs can be reported by name.
 */

import type { CycloneDxBom, SpdxDocument } from "#/schemas";

export const SBOM_FORMATS = ["cyclonedx-json", "cyclonedx-xml", "spdx-json", "spdx-tv"] as const;
export type SbomFormat = (typeof SBOM_FORMATS)[number];

/**
 * Formats that can be decoded and turned into a referrer
 */
export const SBOM_DIALECTS = ["cyclonedx-json", "spdx-json"] as const;
export type SbomDialect = (typeof SBOM_DIALECTS)[number];

/**
 * Decoded document type per dialect
 */
export interface SbomDocumentMap {
  "cyclonedx-json": CycloneDxBom;
  "spdx-json": SpdxDocument;
}

/**
 * A decoded SBOM tagged with its dialect.
 * Without a type argument this is the union over all dialects.
 */
export type DecodedSbom<D extends SbomDialect = SbomDialect> = {
  [K in D]: { dialect: K; document: SbomDocumentMap[K] };
}[D];

export function isSbomDialect(format: SbomFormat): format is SbomDialect {
  return (SBOM_DIALECTS as readonly string[]).includes(format);
}
