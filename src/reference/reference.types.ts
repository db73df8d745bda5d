/**
 * Image reference types
 */

/**
 * A digest-addressed image reference, normalized.
 *
 * @example
 * { registry: "index.docker.io", repository: "library/alpine", digest: "sha256:..." }
 */
export interface DigestReference {
  readonly registry: string;
  readonly repository: string;
  readonly digest: string;
}

export class ImageReferenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageReferenceError";
  }
}
