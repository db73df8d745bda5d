export type ResolutionErrorCode =
  | "MISSING_PACKAGE_URL"
  | "INVALID_PACKAGE_URL"
  | "MISSING_QUALIFIER"
  | "INVALID_REFERENCE"
  | "ROOT_PACKAGE_NOT_FOUND"
  | "PACKAGE_MANAGER_REF_NOT_FOUND";

/**
 * The SBOM lacks the provenance metadata needed to find the image it describes
 */
export class ResolutionError extends Error {
  readonly code: ResolutionErrorCode;

  constructor(code: ResolutionErrorCode, message: string) {
    super(message);
    this.name = "ResolutionError";
    this.code = code;
  }
}

export class MissingPackageUrlError extends ResolutionError {
  constructor(message: string) {
    super("MISSING_PACKAGE_URL", message);
    this.name = "MissingPackageUrlError";
  }
}

export class InvalidPackageUrlError extends ResolutionError {
  constructor(message: string) {
    super("INVALID_PACKAGE_URL", message);
    this.name = "InvalidPackageUrlError";
  }
}

export class MissingQualifierError extends ResolutionError {
  readonly qualifier: string;

  constructor(qualifier: string, purl: string) {
    super("MISSING_QUALIFIER", `${qualifier} not found in package URL: ${purl}`);
    this.name = "MissingQualifierError";
    this.qualifier = qualifier;
  }
}

export class InvalidReferenceError extends ResolutionError {
  constructor(message: string) {
    super("INVALID_REFERENCE", message);
    this.name = "InvalidReferenceError";
  }
}

export class RootPackageNotFoundError extends ResolutionError {
  constructor(documentName: string) {
    super("ROOT_PACKAGE_NOT_FOUND", `not found: no package named "${documentName}" (the SPDX document name)`);
    this.name = "RootPackageNotFoundError";
  }
}

export class PackageManagerRefNotFoundError extends ResolutionError {
  constructor(packageName: string) {
    super("PACKAGE_MANAGER_REF_NOT_FOUND", `not found: package "${packageName}" has no PACKAGE-MANAGER external reference`);
    this.name = "PackageManagerRefNotFoundError";
  }
}

export class BuildError extends Error {
  readonly code = "BUILD_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "BuildError";
  }
}

export class DigestError extends Error {
  readonly code = "DIGEST_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "DigestError";
  }
}
