/**
 * Tag deriver
 *
 * A referrer lives in the target's repository, addressed by the digest of
 * its own serialized manifest.
 */

import { computeDigest } from "#/oci";
import type { ReferrerManifest, ReferrerTag, TargetReference } from "./referrer.types";
import { serializeManifest } from "./serialize";
import { DigestError } from "./errors";

/**
 * @throws DigestError when the manifest cannot be serialized
 */
export function deriveReferrerTag(manifest: ReferrerManifest, target: TargetReference): ReferrerTag {
  let serialized: string;
  try {
    serialized = serializeManifest(manifest);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DigestError(`failed to serialize referrer manifest: ${message}`);
  }

  const manifestBytes = Buffer.from(serialized, "utf-8");
  const digest = computeDigest(manifestBytes);

  return {
    reference: `${target.registry}/${target.repository}@${digest}`,
    registry: target.registry,
    repository: target.repository,
    digest,
    manifestBytes,
  };
}
