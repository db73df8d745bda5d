/**
 * Canonical manifest serialization
 *
 * Key order is fixed (and annotation keys sorted) so the same manifest
 * always serializes to the same bytes, and so to the same digest.
 */

import type { OciDescriptor, OciManifest } from "#/oci";

function sortRecord(record: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(record).sort()) {
    const value = record[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return sorted;
}

function orderDescriptor(descriptor: OciDescriptor): Record<string, unknown> {
  return {
    mediaType: descriptor.mediaType,
    size: descriptor.size,
    digest: descriptor.digest,
    annotations: descriptor.annotations ? sortRecord(descriptor.annotations) : undefined,
    artifactType: descriptor.artifactType,
  };
}

/**
 * Serialize a manifest to JSON with a fixed key order.
 * Undefined fields are omitted.
 */
export function serializeManifest(manifest: OciManifest): string {
  return JSON.stringify({
    schemaVersion: manifest.schemaVersion,
    mediaType: manifest.mediaType,
    config: orderDescriptor(manifest.config),
    layers: manifest.layers.map(orderDescriptor),
    annotations: manifest.annotations ? sortRecord(manifest.annotations) : undefined,
    subject: manifest.subject ? orderDescriptor(manifest.subject) : undefined,
  });
}
