/**
 * Referrer module
 *
 * Resolves the image an SBOM describes, builds the referrer manifest that
 * points at it, and derives where the referrer is stored.
 */

export * from "./referrer.types";
export * from "./errors";
export {
  REFERRER_DIALECTS,
  ARTIFACT_CONSTANTS,
  ANNOTATION_DESCRIPTION,
  MEDIA_TYPE_CYCLONEDX,
  MEDIA_TYPE_SPDX,
  getReferrerDialect,
} from "./dialects";
export { resolvePackageUrl, resolveCycloneDx, resolveSpdx, REPOSITORY_URL_QUALIFIER } from "./strategies";
export { resolveTargetReference } from "./resolver";
export { buildReferrerManifest } from "./builder";
export { serializeManifest } from "./serialize";
export { deriveReferrerTag } from "./tag";
export { putReferrer, type PutReferrerDeps, type PutReferrerResult } from "./pipeline";
