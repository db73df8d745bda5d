import { describe, test, expect } from "vitest";
import { OciReferrerRegistry, referrersTag } from "./oci";
import { NotFoundError, PushError, RegistryError } from "../errors";
import { buildReferrerManifest, deriveReferrerTag, getReferrerDialect } from "#/referrer";
import { OCI_MEDIA_TYPES } from "#/oci";
import {
  createMockHttpClient,
  createRecordingLogger,
  emptyResponse,
  errorResponse,
  jsonResponse,
  type MockResponse,
} from "#/test-utils/mocks";

const HOST = "registry.example.com";
const BASE = `https://${HOST}/v2/team/app`;
const TARGET_HEX = "a".repeat(64);
const TARGET_DIGEST = `sha256:${TARGET_HEX}`;
const TARGET = { registry: HOST, repository: "team/app", digest: TARGET_DIGEST };
const INDEX_URL = `${BASE}/manifests/sha256-${TARGET_HEX}`;

const draft = buildReferrerManifest(Buffer.from('{"bomFormat":"CycloneDX"}'), getReferrerDialect("cyclonedx-json"), {
  mediaType: OCI_MEDIA_TYPES.manifest,
  digest: TARGET_DIGEST,
  size: 512,
});
const tag = deriveReferrerTag(draft.manifest, TARGET);

const expectedDescriptor = {
  mediaType: OCI_MEDIA_TYPES.manifest,
  size: tag.manifestBytes.length,
  digest: tag.digest,
  annotations: { "org.opencontainers.artifact.description": "CycloneDX JSON SBOM" },
  artifactType: "application/vnd.cyclonedx+json",
};

function createRegistry(responses: Record<string, MockResponse>) {
  const http = createMockHttpClient({
    [`HEAD ${BASE}/blobs/${draft.layer.descriptor.digest}`]: emptyResponse(200),
    [`HEAD ${BASE}/blobs/${draft.config.descriptor.digest}`]: emptyResponse(200),
    ...responses,
  });
  const registry = new OciReferrerRegistry((host) => ({ host, scheme: "https" }), http, createRecordingLogger());
  return { registry, http };
}

describe("referrersTag", () => {
  test("replaces the algorithm separator", () => {
    expect(referrersTag(TARGET_DIGEST)).toBe(`sha256-${TARGET_HEX}`);
  });
});

describe("OciReferrerRegistry", () => {
  describe("headDescriptor", () => {
    test("returns the target descriptor", async () => {
      const { registry } = createRegistry({
        [`HEAD ${BASE}/manifests/${TARGET_DIGEST}`]: emptyResponse(200, {
          "Content-Type": OCI_MEDIA_TYPES.index,
          "Docker-Content-Digest": TARGET_DIGEST,
          "Content-Length": "2048",
        }),
      });

      await expect(registry.headDescriptor(TARGET)).resolves.toEqual({
        mediaType: OCI_MEDIA_TYPES.index,
        digest: TARGET_DIGEST,
        size: 2048,
      });
    });

    test("throws NotFoundError for a missing image", async () => {
      const { registry } = createRegistry({});

      await expect(registry.headDescriptor(TARGET)).rejects.toThrow(NotFoundError);
      await expect(registry.headDescriptor(TARGET)).rejects.toThrow(
        `Manifest not found: ${HOST}/team/app@${TARGET_DIGEST}`
      );
    });

    test("throws RegistryError on other failures", async () => {
      const { registry } = createRegistry({
        [`HEAD ${BASE}/manifests/${TARGET_DIGEST}`]: errorResponse(500, "Internal Server Error"),
      });

      const error = await registry.headDescriptor(TARGET).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RegistryError);
      expect(error).not.toBeInstanceOf(NotFoundError);
      if (!(error instanceof RegistryError)) return;
      expect(error.status).toBe(500);
      expect(error.code).toBe("REGISTRY_ERROR");
    });
  });

  describe("push", () => {
    test("pushes layer, then config, then the manifest by digest", async () => {
      const { registry, http } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201, { "OCI-Subject": TARGET_DIGEST }),
      });

      await registry.push(tag, draft);

      expect(http.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
        `HEAD ${BASE}/blobs/${draft.layer.descriptor.digest}`,
        `HEAD ${BASE}/blobs/${draft.config.descriptor.digest}`,
        `PUT ${BASE}/manifests/${tag.digest}`,
      ]);
      const put = http.calls[2];
      expect(put?.headers["content-type"]).toBe(OCI_MEDIA_TYPES.manifest);
      expect(put?.body?.equals(Buffer.from(tag.manifestBytes))).toBe(true);
    });

    test("creates the referrers tag index when the registry does not index the subject", async () => {
      const { registry, http } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201),
        [`PUT ${INDEX_URL}`]: emptyResponse(201),
      });

      await registry.push(tag, draft);

      const indexPut = http.calls.find((call) => call.method === "PUT" && call.url === INDEX_URL);
      expect(indexPut?.headers["content-type"]).toBe(OCI_MEDIA_TYPES.index);
      expect(JSON.parse(indexPut?.body?.toString() ?? "null")).toEqual({
        schemaVersion: 2,
        mediaType: OCI_MEDIA_TYPES.index,
        manifests: [expectedDescriptor],
      });
    });

    test("appends to an existing referrers tag index", async () => {
      const existing = {
        mediaType: OCI_MEDIA_TYPES.manifest,
        digest: `sha256:${"b".repeat(64)}`,
        size: 300,
        artifactType: "application/spdx+json",
      };
      const { registry, http } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201),
        [`GET ${INDEX_URL}`]: jsonResponse({ schemaVersion: 2, mediaType: OCI_MEDIA_TYPES.index, manifests: [existing] }),
        [`PUT ${INDEX_URL}`]: emptyResponse(201),
      });

      await registry.push(tag, draft);

      const indexPut = http.calls.find((call) => call.method === "PUT" && call.url === INDEX_URL);
      expect(JSON.parse(indexPut?.body?.toString() ?? "null").manifests).toEqual([existing, expectedDescriptor]);
    });

    test("keeps the annotations of an existing referrers tag index", async () => {
      const { registry, http } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201),
        [`GET ${INDEX_URL}`]: jsonResponse({
          schemaVersion: 2,
          mediaType: OCI_MEDIA_TYPES.index,
          manifests: [],
          annotations: { "org.opencontainers.image.created": "2024-01-01T00:00:00Z" },
        }),
        [`PUT ${INDEX_URL}`]: emptyResponse(201),
      });

      await registry.push(tag, draft);

      const indexPut = http.calls.find((call) => call.method === "PUT" && call.url === INDEX_URL);
      expect(JSON.parse(indexPut?.body?.toString() ?? "null")).toEqual({
        schemaVersion: 2,
        mediaType: OCI_MEDIA_TYPES.index,
        manifests: [expectedDescriptor],
        annotations: { "org.opencontainers.image.created": "2024-01-01T00:00:00Z" },
      });
    });

    test("leaves an index that already lists the referrer alone", async () => {
      const { registry, http } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201),
        [`GET ${INDEX_URL}`]: jsonResponse({ schemaVersion: 2, manifests: [expectedDescriptor] }),
      });

      await registry.push(tag, draft);

      expect(http.calls.some((call) => call.method === "PUT" && call.url === INDEX_URL)).toBe(false);
    });

    test("throws PushError when a blob upload fails", async () => {
      const { registry, http } = createRegistry({
        [`HEAD ${BASE}/blobs/${draft.layer.descriptor.digest}`]: emptyResponse(404),
        [`POST ${BASE}/blobs/uploads/`]: errorResponse(403, "Forbidden"),
      });

      await expect(registry.push(tag, draft)).rejects.toThrow(PushError);
      expect(http.calls.some((call) => call.url.includes("/manifests/"))).toBe(false);
    });

    test("throws PushError when the manifest is rejected", async () => {
      const { registry } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: errorResponse(400, "Bad Request"),
      });

      const error = await registry.push(tag, draft).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PushError);
      if (!(error instanceof PushError)) return;
      expect(error.status).toBe(400);
      expect(error.message).toBe(`Failed to push manifest ${HOST}/team/app@${tag.digest}: 400 Bad Request`);
    });

    test("throws PushError when the referrers index cannot be updated", async () => {
      const { registry } = createRegistry({
        [`PUT ${BASE}/manifests/${tag.digest}`]: emptyResponse(201),
        [`PUT ${INDEX_URL}`]: errorResponse(403, "Forbidden"),
      });

      await expect(registry.push(tag, draft)).rejects.toThrow(PushError);
    });
  });
});
