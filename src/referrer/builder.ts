/**
 * Referrer artifact builder
 *
 * Pure: the manifest depends only on the arguments.
 *
 * Shape of the result:
 * - one layer holding the SBOM bytes, uncompressed and untouched
 * - config media type = the dialect's media type
 * - manifest media type = the target's media type
 * - description annotation = the dialect's description
 * - subject = the target descriptor, verbatim
 */

import { computeDigest, type OciDescriptor } from "#/oci";
import { OciDescriptorSchema } from "#/schemas";
import { formatZodIssues } from "#/friendly-errors";
import type {
  ArtifactConstants,
  BlobContent,
  DialectProfile,
  ManifestDraft,
  ReferrerManifest,
} from "./referrer.types";
import { ARTIFACT_CONSTANTS } from "./dialects";
import { BuildError } from "./errors";

// Zero value of a timestamp in image configs
const ZERO_TIME = "0001-01-01T00:00:00Z";

function createBlob(mediaType: string, data: Uint8Array): BlobContent {
  return Object.freeze({
    descriptor: {
      mediaType,
      size: data.byteLength,
      digest: computeDigest(data),
    },
    data,
  });
}

/**
 * Image config listing the single layer.
 * Field order matches what registries and image tools expect to read.
 */
function createImageConfig(layerDigest: string): Uint8Array {
  const config = {
    architecture: "",
    created: ZERO_TIME,
    history: [{ created: ZERO_TIME }],
    os: "",
    rootfs: { type: "layers", diff_ids: [layerDigest] },
    config: {},
  };
  return Buffer.from(JSON.stringify(config), "utf-8");
}

function copyDescriptor(descriptor: OciDescriptor): OciDescriptor {
  return {
    mediaType: descriptor.mediaType,
    digest: descriptor.digest,
    size: descriptor.size,
    ...(descriptor.annotations ? { annotations: { ...descriptor.annotations } } : {}),
    ...(descriptor.artifactType ? { artifactType: descriptor.artifactType } : {}),
  };
}

function freezeManifest(manifest: ReferrerManifest): ReferrerManifest {
  Object.freeze(manifest.config);
  manifest.layers.forEach((layer) => Object.freeze(layer));
  Object.freeze(manifest.layers);
  Object.freeze(manifest.annotations);
  if (manifest.subject.annotations) {
    Object.freeze(manifest.subject.annotations);
  }
  Object.freeze(manifest.subject);
  return Object.freeze(manifest);
}

/**
 * Build the referrer manifest for an SBOM
 *
 * @param sbomBytes - Raw SBOM, stored as the only layer
 * @param profile - Dialect media type and description
 * @param targetDescriptor - Descriptor of the image the SBOM describes
 * @throws BuildError on empty SBOM bytes or an incomplete target descriptor
 */
export function buildReferrerManifest(
  sbomBytes: Uint8Array,
  profile: DialectProfile,
  targetDescriptor: OciDescriptor,
  constants: ArtifactConstants = ARTIFACT_CONSTANTS
): ManifestDraft {
  if (sbomBytes.byteLength === 0) {
    throw new BuildError("cannot build a referrer from an empty SBOM");
  }

  const checked = OciDescriptorSchema.safeParse(targetDescriptor);
  if (!checked.success) {
    throw new BuildError(`invalid target descriptor: ${formatZodIssues(checked.error).join("; ")}`);
  }

  // copied: the layer digest covers exactly these bytes
  const layer = createBlob(constants.layerMediaType, Uint8Array.from(sbomBytes));
  const config = createBlob(profile.mediaType, createImageConfig(layer.descriptor.digest));

  const manifest = freezeManifest({
    schemaVersion: 2,
    mediaType: targetDescriptor.mediaType,
    config: config.descriptor,
    layers: [layer.descriptor],
    annotations: { [constants.descriptionAnnotation]: profile.description },
    subject: copyDescriptor(targetDescriptor),
  });

  return Object.freeze({ manifest, config, layer });
}
