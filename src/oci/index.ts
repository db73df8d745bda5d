/**
 * OCI Distribution Spec module
 *
 * Native client for publishing to OCI-compliant registries.
 */

export { OciClient } from "./oci-client";
export { computeDigest } from "./digest";
export type {
  OciDescriptor,
  OciManifest,
  OciIndex,
  OciRegistryConfig,
  HeadManifestResult,
  BlobExistsResult,
  PullIndexResult,
  PushResult,
} from "./oci.types";
export { OCI_MEDIA_TYPES, MANIFEST_ACCEPT_TYPES } from "./oci.types";
