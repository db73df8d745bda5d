export type SbomErrorCode = "UNSUPPORTED_FORMAT" | "DECODE_FAILED";

export class SbomError extends Error {
  readonly code: SbomErrorCode;
  readonly details: string[];

  constructor(code: SbomErrorCode, message: string, details: string[] = []) {
    super(message);
    this.name = "SbomError";
    this.code = code;
    this.details = details;
  }
}

export class UnsupportedFormatError extends SbomError {
  constructor(message: string) {
    super("UNSUPPORTED_FORMAT", message);
    this.name = "UnsupportedFormatError";
  }
}

export class DecodeError extends SbomError {
  constructor(message: string, details: string[] = []) {
    super("DECODE_FAILED", message, details);
    this.name = "DecodeError";
  }
}
