/**
 * SBOM format detection
 *
 * Sniffs the byte stream without fully validating it. Decoding is a
 * separate step (see decode.ts) that only runs for supported dialects.
 */

import { z } from "zod";
import type { SbomFormat } from "./sbom.types";
import { UnsupportedFormatError } from "./errors";

const CYCLONEDX_XML_NAMESPACE = /xmlns(?::\w+)?="http:\/\/cyclonedx\.org\/schema\/bom\//;
const SPDX_TAG_VALUE_VERSION = /^SPDXVersion:\s*SPDX-/m;

// Just enough shape to tell the JSON dialects apart
const JsonSniffSchema = z.object({
  bomFormat: z.unknown().optional(),
  spdxVersion: z.unknown().optional(),
});

/**
 * Decode SBOM bytes as UTF-8, dropping a leading byte order mark
 */
export function decodeText(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("utf-8").replace(/^\uFEFF/, "");
}

function detectJsonFormat(text: string): SbomFormat | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    // Not JSON, so none of the JSON formats
    return undefined;
  }

  const sniffed = JsonSniffSchema.safeParse(raw);
  if (!sniffed.success) {
    return undefined;
  }

  if (sniffed.data.bomFormat === "CycloneDX") {
    return "cyclonedx-json";
  }
  if (typeof sniffed.data.spdxVersion === "string" && sniffed.data.spdxVersion.startsWith("SPDX-")) {
    return "spdx-json";
  }
  return undefined;
}

/**
 * Detect the SBOM format of a byte stream
 *
 * @throws UnsupportedFormatError when the bytes match no known format
 */
export function detectFormat(bytes: Uint8Array): SbomFormat {
  const text = decodeText(bytes).trimStart();

  let format: SbomFormat | undefined;
  if (text.startsWith("{")) {
    format = detectJsonFormat(text);
  } else if (text.startsWith("<")) {
    format = CYCLONEDX_XML_NAMESPACE.test(text) ? "cyclonedx-xml" : undefined;
  } else if (SPDX_TAG_VALUE_VERSION.test(text)) {
    format = "spdx-tv";
  }

  if (!format) {
    throw new UnsupportedFormatError("failed to detect SBOM format");
  }
  return format;
}
