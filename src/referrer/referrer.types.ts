/**
 * Referrer types
 *
 * A referrer is an OCI manifest whose `subject` points at another manifest,
 * here the image an SBOM was generated for.
 */

import type { OciDescriptor, OciManifest } from "#/oci";
import type { DigestReference } from "#/reference";
import type { SbomDialect, SbomDocumentMap } from "#/sbom";

/**
 * The image an SBOM describes
 */
export type TargetReference = DigestReference;

/**
 * Fixed values a dialect contributes to the referrer manifest
 */
export interface DialectProfile {
  dialect: SbomDialect;
  /** Config media type of the referrer */
  mediaType: string;
  /** Value of the description annotation */
  description: string;
}

/**
 * A dialect profile paired with the strategy that finds the target image
 */
export interface ReferrerDialect<K extends SbomDialect = SbomDialect> extends DialectProfile {
  dialect: K;
  resolve: (document: SbomDocumentMap[K]) => TargetReference;
}

export type DialectTable = { readonly [K in SbomDialect]: ReferrerDialect<K> };

/**
 * Constants of the artifact shape, shared by every dialect
 */
export interface ArtifactConstants {
  /** Annotation key holding the dialect description */
  descriptionAnnotation: string;
  /** Media type of the SBOM layer */
  layerMediaType: string;
}

/**
 * A blob referenced by the manifest, with its content
 */
export interface BlobContent {
  readonly descriptor: OciDescriptor;
  readonly data: Uint8Array;
}

export interface ReferrerManifest extends OciManifest {
  annotations: Record<string, string>;
  subject: OciDescriptor;
}

/**
 * A fully built referrer: manifest plus the blobs it points at.
 * The manifest is frozen; its digest is only valid for this exact content.
 */
export interface ManifestDraft {
  readonly manifest: ReferrerManifest;
  readonly config: BlobContent;
  readonly layer: BlobContent;
}

/**
 * Where a referrer is stored: the target's repository, addressed by the
 * referrer manifest's own digest.
 */
export interface ReferrerTag {
  /** registry/repository@sha256:... */
  readonly reference: string;
  readonly registry: string;
  readonly repository: string;
  readonly digest: string;
  /** The exact bytes the digest was computed over */
  readonly manifestBytes: Uint8Array;
}

/**
 * Registry operations the pipeline depends on
 */
export interface ReferrerRegistry {
  /**
   * @throws NotFoundError when the target manifest does not exist
   */
  headDescriptor(target: TargetReference): Promise<OciDescriptor>;
  /**
   * @throws PushError when any upload fails
   */
  push(tag: ReferrerTag, draft: ManifestDraft): Promise<void>;
}
