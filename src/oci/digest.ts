import { createHash } from "crypto";

/**
 * Content digest of a byte sequence, in OCI form (sha256:<hex>)
 */
export function computeDigest(content: Uint8Array | string): string {
  const hash = createHash("sha256").update(content).digest("hex");
  return `sha256:${hash}`;
}
