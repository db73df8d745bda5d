import { describe, test, expect } from "vitest";
import { createHash } from "crypto";
import { buildReferrerManifest } from "./builder";
import { getReferrerDialect, ANNOTATION_DESCRIPTION, MEDIA_TYPE_CYCLONEDX, MEDIA_TYPE_SPDX } from "./dialects";
import { BuildError } from "./errors";
import { OCI_MEDIA_TYPES, type OciDescriptor } from "#/oci";

const sha256 = (data: Uint8Array | string) => `sha256:${createHash("sha256").update(data).digest("hex")}`;

const TARGET: OciDescriptor = {
  mediaType: OCI_MEDIA_TYPES.manifest,
  digest: `sha256:${"4".repeat(64)}`,
  size: 1024,
};

const SBOM = Buffer.from('{"bomFormat":"CycloneDX","specVersion":"1.5"}');

describe("buildReferrerManifest", () => {
  test("stores the SBOM as the only, uncompressed layer", () => {
    const { manifest, layer } = buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), TARGET);

    expect(manifest.layers).toEqual([
      { mediaType: OCI_MEDIA_TYPES.layer, size: SBOM.length, digest: sha256(SBOM) },
    ]);
    expect(Buffer.from(layer.data).equals(SBOM)).toBe(true);
  });

  test("uses the dialect media type for the config and its description as annotation", () => {
    const { manifest } = buildReferrerManifest(SBOM, getReferrerDialect("spdx-json"), TARGET);

    expect(manifest.config.mediaType).toBe(MEDIA_TYPE_SPDX);
    expect(manifest.annotations).toEqual({ [ANNOTATION_DESCRIPTION]: "SPDX JSON SBOM" });
  });

  test("copies the target media type and descriptor", () => {
    const target: OciDescriptor = {
      mediaType: OCI_MEDIA_TYPES.dockerManifest,
      digest: `sha256:${"5".repeat(64)}`,
      size: 527,
      annotations: { "org.example.note": "kept" },
    };

    const { manifest } = buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), target);

    expect(manifest.schemaVersion).toBe(2);
    expect(manifest.mediaType).toBe(OCI_MEDIA_TYPES.dockerManifest);
    expect(manifest.subject).toEqual(target);
    expect(manifest.subject).not.toBe(target);
  });

  test("writes an image config listing the layer digest", () => {
    const { manifest, config } = buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), TARGET);

    const expectedConfig =
      '{"architecture":"","created":"0001-01-01T00:00:00Z","history":[{"created":"0001-01-01T00:00:00Z"}],' +
      `"os":"","rootfs":{"type":"layers","diff_ids":["${sha256(SBOM)}"]},"config":{}}`;

    expect(Buffer.from(config.data).toString("utf-8")).toBe(expectedConfig);
    expect(manifest.config).toEqual({
      mediaType: MEDIA_TYPE_CYCLONEDX,
      size: Buffer.byteLength(expectedConfig),
      digest: sha256(expectedConfig),
    });
  });

  test("is deterministic", () => {
    const profile = getReferrerDialect("cyclonedx-json");

    expect(buildReferrerManifest(SBOM, profile, TARGET).manifest).toEqual(
      buildReferrerManifest(SBOM, profile, TARGET).manifest
    );
  });

  test("takes artifact constants as an argument", () => {
    const { manifest } = buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), TARGET, {
      descriptionAnnotation: "org.example.description",
      layerMediaType: "application/vnd.example.sbom",
    });

    expect(manifest.annotations).toEqual({ "org.example.description": "CycloneDX JSON SBOM" });
    expect(manifest.layers[0]?.mediaType).toBe("application/vnd.example.sbom");
  });

  test("returns a frozen manifest", () => {
    const { manifest } = buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), TARGET);

    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.subject)).toBe(true);
    expect(Object.isFrozen(manifest.layers)).toBe(true);
    expect(Object.isFrozen(manifest.annotations)).toBe(true);
  });

  test("keeps its own copy of the SBOM bytes", () => {
    const sbom = Buffer.from('{"spdxVersion":"SPDX-2.3"}');
    const { layer } = buildReferrerManifest(sbom, getReferrerDialect("spdx-json"), TARGET);

    sbom[0] = 0x20;

    expect(sha256(layer.data)).toBe(layer.descriptor.digest);
    expect(Buffer.from(layer.data).toString()).toBe('{"spdxVersion":"SPDX-2.3"}');
  });

  test("throws BuildError on an empty SBOM", () => {
    const empty = new Uint8Array(0);

    expect(() => buildReferrerManifest(empty, getReferrerDialect("cyclonedx-json"), TARGET)).toThrow(BuildError);
    expect(() => buildReferrerManifest(empty, getReferrerDialect("cyclonedx-json"), TARGET)).toThrow(
      "cannot build a referrer from an empty SBOM"
    );
  });

  test("throws BuildError on an incomplete target descriptor", () => {
    const target: OciDescriptor = { mediaType: "", digest: "sha256:short", size: -1 };

    expect(() => buildReferrerManifest(SBOM, getReferrerDialect("cyclonedx-json"), target)).toThrow(
      /^invalid target descriptor: /
    );
  });
});
