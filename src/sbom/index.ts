/**
 * SBOM module
 *
 * Format detection and decoding for CycloneDX and SPDX documents.
 */

export * from "./sbom.types";
export * from "./errors";
export { detectFormat, decodeText } from "./detect";
export { decodeSbom } from "./decode";
