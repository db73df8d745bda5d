import { describe, test, expect } from "vitest";
import { createHash } from "crypto";
import { deriveReferrerTag } from "./tag";
import { serializeManifest } from "./serialize";
import { buildReferrerManifest } from "./builder";
import { getReferrerDialect } from "./dialects";
import { OCI_MEDIA_TYPES, type OciManifest } from "#/oci";

const TARGET_DIGEST = `sha256:${"6".repeat(64)}`;
const TARGET = { registry: "ghcr.io", repository: "example/app", digest: TARGET_DIGEST };

const draft = (profile = getReferrerDialect("spdx-json"), subject = { digest: TARGET_DIGEST, size: 100 }) =>
  buildReferrerManifest(Buffer.from('{"spdxVersion":"SPDX-2.3"}'), profile, {
    mediaType: OCI_MEDIA_TYPES.manifest,
    ...subject,
  });

describe("serializeManifest", () => {
  test("writes keys in a fixed order and sorts annotations", () => {
    const manifest: OciManifest = {
      subject: { size: 3, digest: "sha256:c", mediaType: "m" },
      annotations: { b: "2", a: "1" },
      layers: [{ digest: "sha256:b", size: 2, mediaType: "l" }],
      config: { digest: "sha256:a", mediaType: "c", size: 1 },
      mediaType: "application/vnd.oci.image.manifest.v1+json",
      schemaVersion: 2,
    };

    expect(serializeManifest(manifest)).toBe(
      '{"schemaVersion":2,"mediaType":"application/vnd.oci.image.manifest.v1+json",' +
        '"config":{"mediaType":"c","size":1,"digest":"sha256:a"},' +
        '"layers":[{"mediaType":"l","size":2,"digest":"sha256:b"}],' +
        '"annotations":{"a":"1","b":"2"},' +
        '"subject":{"mediaType":"m","size":3,"digest":"sha256:c"}}'
    );
  });

  test("omits absent optional fields", () => {
    const manifest: OciManifest = {
      schemaVersion: 2,
      mediaType: "m",
      config: { mediaType: "c", size: 1, digest: "sha256:a" },
      layers: [],
    };

    expect(serializeManifest(manifest)).toBe(
      '{"schemaVersion":2,"mediaType":"m","config":{"mediaType":"c","size":1,"digest":"sha256:a"},"layers":[]}'
    );
  });
});

describe("deriveReferrerTag", () => {
  test("addresses the referrer by its manifest digest in the target repository", () => {
    const { manifest } = draft();

    const tag = deriveReferrerTag(manifest, TARGET);

    const bytes = Buffer.from(serializeManifest(manifest));
    const digest = `sha256:${createHash("sha256").update(bytes).digest("hex")}`;
    expect(tag.registry).toBe("ghcr.io");
    expect(tag.repository).toBe("example/app");
    expect(tag.digest).toBe(digest);
    expect(tag.reference).toBe(`ghcr.io/example/app@${digest}`);
    expect(Buffer.from(tag.manifestBytes).equals(bytes)).toBe(true);
  });

  test("never uses the target digest", () => {
    const tag = deriveReferrerTag(draft().manifest, TARGET);

    expect(tag.digest).not.toBe(TARGET_DIGEST);
  });

  test("is stable across builds of the same input", () => {
    expect(deriveReferrerTag(draft().manifest, TARGET).digest).toBe(
      deriveReferrerTag(draft().manifest, TARGET).digest
    );
  });

  test("changes when only the annotation differs", () => {
    const profile = getReferrerDialect("spdx-json");
    const relabeled = { ...profile, description: "SPDX JSON SBOM (rebuilt)" };

    expect(deriveReferrerTag(draft(relabeled).manifest, TARGET).digest).not.toBe(
      deriveReferrerTag(draft(profile).manifest, TARGET).digest
    );
  });

  test("changes when only the subject digest differs", () => {
    const other = { digest: `sha256:${"7".repeat(64)}`, size: 100 };

    expect(deriveReferrerTag(draft(undefined, other).manifest, TARGET).digest).not.toBe(
      deriveReferrerTag(draft().manifest, TARGET).digest
    );
  });

  test("changes when only the subject size differs", () => {
    const other = { digest: TARGET_DIGEST, size: 101 };

    expect(deriveReferrerTag(draft(undefined, other).manifest, TARGET).digest).not.toBe(
      deriveReferrerTag(draft().manifest, TARGET).digest
    );
  });
});
