/**
 * Referrer pipeline
 *
 * detect → decode → resolve target → look up target descriptor →
 * build manifest → derive tag → push.
 *
 * Every stage throws on failure, so nothing is pushed unless all of the
 * earlier stages succeeded. Registry errors propagate unchanged.
 */

import type { Logger } from "#/core";
import type { OciDescriptor } from "#/oci";
import { formatDigestReference } from "#/reference";
import { detectFormat, decodeSbom, type SbomDialect } from "#/sbom";
import type { ManifestDraft, ReferrerRegistry, ReferrerTag, TargetReference } from "./referrer.types";
import { getReferrerDialect } from "./dialects";
import { resolveTargetReference } from "./resolver";
import { buildReferrerManifest } from "./builder";
import { deriveReferrerTag } from "./tag";

export interface PutReferrerDeps {
  registry: ReferrerRegistry;
  logger: Logger;
}

export interface PutReferrerResult {
  dialect: SbomDialect;
  target: TargetReference;
  targetDescriptor: OciDescriptor;
  draft: ManifestDraft;
  tag: ReferrerTag;
}

/**
 * Build a referrer from SBOM bytes and push it next to the image it describes
 */
export async function putReferrer(sbomBytes: Uint8Array, deps: PutReferrerDeps): Promise<PutReferrerResult> {
  const { registry, logger } = deps;

  const format = detectFormat(sbomBytes);
  const profile = getReferrerDialect(format);
  logger.debug(`Detected SBOM format: ${format}`);

  const sbom = decodeSbom(sbomBytes, profile.dialect);
  const target = resolveTargetReference(sbom);
  logger.debug(`Resolved target image: ${formatDigestReference(target)}`);

  const targetDescriptor = await registry.headDescriptor(target);
  logger.debug(`Target descriptor: ${targetDescriptor.mediaType}, ${targetDescriptor.size} bytes`);

  const draft = buildReferrerManifest(sbomBytes, profile, targetDescriptor);
  const tag = deriveReferrerTag(draft.manifest, target);

  logger.debug(`Pushing referrer to ${tag.reference}`);
  await registry.push(tag, draft);

  return {
    dialect: profile.dialect,
    target,
    targetDescriptor,
    draft,
    tag,
  };
}
