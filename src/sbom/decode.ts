import type { ZodType, ZodTypeDef } from "zod";
import { safeParseJson } from "#/friendly-errors";
import { CycloneDxBomSchema, SpdxDocumentSchema } from "#/schemas";
import type { DecodedSbom, SbomDialect } from "./sbom.types";
import { decodeText } from "./detect";
import { DecodeError } from "./errors";

function parseDocument<Output, Input>(
  text: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  label: string
): Output {
  const result = safeParseJson(text, schema, label);
  if (!result.success) {
    throw new DecodeError(result.error.message, result.error.details);
  }
  return result.data;
}

/**
 * Decode SBOM bytes of a known dialect into a typed document
 *
 * @throws DecodeError on invalid JSON or a document missing required fields
 */
export function decodeSbom(bytes: Uint8Array, dialect: SbomDialect): DecodedSbom {
  const text = decodeText(bytes);

  switch (dialect) {
    case "cyclonedx-json":
      return { dialect, document: parseDocument(text, CycloneDxBomSchema, "CycloneDX JSON SBOM") };
    case "spdx-json":
      return { dialect, document: parseDocument(text, SpdxDocumentSchema, "SPDX JSON SBOM") };
  }
}
