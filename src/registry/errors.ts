export type RegistryErrorCode = "NOT_FOUND" | "PUSH_FAILED" | "REGISTRY_ERROR";

/**
 * A registry request failed
 */
export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  /** HTTP status, when the registry answered */
  readonly status?: number;

  constructor(message: string, status?: number, code: RegistryErrorCode = "REGISTRY_ERROR") {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.status = status;
  }
}

/**
 * The target image manifest does not exist
 */
export class NotFoundError extends RegistryError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * Uploading a blob, the referrer manifest or the fallback index failed
 */
export class PushError extends RegistryError {
  constructor(message: string, status?: number) {
    super(message, status, "PUSH_FAILED");
    this.name = "PushError";
  }
}
