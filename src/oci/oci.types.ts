/**
 * OCI Distribution Spec types
 *
 * Types for talking to OCI-compliant registries (GHCR, Docker Hub, Harbor, etc.)
 * Only what referrer publishing needs: descriptor lookup and push.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 * @see https://github.com/opencontainers/image-spec/blob/main/manifest.md
 */

import type { RegistryCredentials } from "#/core";

/**
 * OCI content descriptor
 * References a blob or manifest by digest
 */
export interface OciDescriptor {
  /** Media type of the referenced content */
  mediaType: string;
  /** Digest of the content (e.g., sha256:abc123...) */
  digest: string;
  /** Size in bytes */
  size: number;
  /** Optional annotations */
  annotations?: Record<string, string>;
  /** Artifact type, for manifests that declare one */
  artifactType?: string;
}

/**
 * OCI image manifest (v2)
 */
export interface OciManifest {
  /** Schema version, always 2 for OCI */
  schemaVersion: 2;
  /** Media type of the manifest itself */
  mediaType: string;
  /** Config descriptor */
  config: OciDescriptor;
  /** Layer descriptors (actual content) */
  layers: OciDescriptor[];
  /** Optional annotations */
  annotations?: Record<string, string>;
  /** Manifest this one refers to (referrers API) */
  subject?: OciDescriptor;
}

/**
 * OCI image index
 * Used for the referrers tag schema (`sha256-<hex>` tags listing referrers)
 */
export interface OciIndex {
  schemaVersion: 2;
  mediaType?: string;
  manifests: OciDescriptor[];
  annotations?: Record<string, string>;
}

/**
 * Media types used when talking to registries
 */
export const OCI_MEDIA_TYPES = {
  manifest: "application/vnd.oci.image.manifest.v1+json",
  index: "application/vnd.oci.image.index.v1+json",
  /** Uncompressed layer */
  layer: "application/vnd.oci.image.layer.v1.tar",
  dockerManifest: "application/vnd.docker.distribution.manifest.v2+json",
  dockerManifestList: "application/vnd.docker.distribution.manifest.list.v2+json",
} as const;

/**
 * Accept header for manifest lookups: any image manifest or index
 */
export const MANIFEST_ACCEPT_TYPES = [
  OCI_MEDIA_TYPES.manifest,
  OCI_MEDIA_TYPES.index,
  OCI_MEDIA_TYPES.dockerManifest,
  OCI_MEDIA_TYPES.dockerManifestList,
];

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** Registry host (e.g., ghcr.io, localhost:5000) */
  host: string;
  /** URL scheme, http only for local or explicitly insecure registries */
  scheme: "https" | "http";
  credentials?: RegistryCredentials;
}

/**
 * Result from a manifest HEAD request
 */
export interface HeadManifestResult {
  success: boolean;
  descriptor?: OciDescriptor;
  status?: number;
  error?: string;
}

/**
 * Result from a blob existence check
 */
export interface BlobExistsResult {
  success: boolean;
  exists?: boolean;
  status?: number;
  error?: string;
}

/**
 * Result from pushing a blob or manifest
 */
export interface PushResult {
  success: boolean;
  /** Location header returned by the registry */
  location?: string;
  /** OCI-Subject header: set when the registry indexed the manifest's subject itself */
  subject?: string;
  status?: number;
  error?: string;
}

/**
 * Result from pulling an index by tag
 */
export interface PullIndexResult {
  success: boolean;
  /** Undefined when the tag does not exist */
  index?: OciIndex;
  status?: number;
  error?: string;
}
