import { describe, test, expect } from "vitest";
import { resolveTargetReference } from "./resolver";
import { getReferrerDialect, MEDIA_TYPE_CYCLONEDX, MEDIA_TYPE_SPDX } from "./dialects";
import { decodeSbom, UnsupportedFormatError } from "#/sbom";

const DIGEST = `sha256:${"3".repeat(64)}`;
const PURL = `pkg:oci/app@${encodeURIComponent(DIGEST)}?repository_url=registry.example.com/team/app`;

describe("getReferrerDialect", () => {
  test("returns the CycloneDX profile", () => {
    expect(getReferrerDialect("cyclonedx-json")).toEqual({
      dialect: "cyclonedx-json",
      mediaType: MEDIA_TYPE_CYCLONEDX,
      description: "CycloneDX JSON SBOM",
    });
  });

  test("returns the SPDX profile", () => {
    expect(getReferrerDialect("spdx-json")).toEqual({
      dialect: "spdx-json",
      mediaType: MEDIA_TYPE_SPDX,
      description: "SPDX JSON SBOM",
    });
  });

  test.each(["cyclonedx-xml", "spdx-tv"] as const)("rejects detected but unsupported %s", (format) => {
    expect(() => getReferrerDialect(format)).toThrow(UnsupportedFormatError);
    expect(() => getReferrerDialect(format)).toThrow(`unsupported format: ${format}`);
  });
});

describe("resolveTargetReference", () => {
  const expected = { registry: "registry.example.com", repository: "team/app", digest: DIGEST };

  test("dispatches CycloneDX documents", () => {
    const sbom = decodeSbom(
      Buffer.from(JSON.stringify({ bomFormat: "CycloneDX", metadata: { component: { purl: PURL } } })),
      "cyclonedx-json"
    );

    expect(resolveTargetReference(sbom)).toEqual(expected);
  });

  test("dispatches SPDX documents", () => {
    const sbom = decodeSbom(
      Buffer.from(
        JSON.stringify({
          spdxVersion: "SPDX-2.3",
          name: "team/app",
          packages: [
            {
              name: "team/app",
              externalRefs: [{ referenceCategory: "PACKAGE-MANAGER", referenceType: "purl", referenceLocator: PURL }],
            },
          ],
        })
      ),
      "spdx-json"
    );

    expect(resolveTargetReference(sbom)).toEqual(expected);
  });
});
