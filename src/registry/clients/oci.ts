/**
 * OCI referrer registry
 *
 * Publishes a referrer through the OCI Distribution API: both blobs, then
 * the manifest by digest. Registries that do not index the subject
 * themselves (no OCI-Subject header on the manifest PUT) get the
 * referrers tag schema: an index at tag `<alg>-<hex>` of the subject.
 */

import type { HttpClient, Logger } from "#/core";
import { OciClient, OCI_MEDIA_TYPES } from "#/oci";
import type { OciDescriptor, OciIndex } from "#/oci";
import type { ManifestDraft, ReferrerRegistry, ReferrerTag, TargetReference } from "#/referrer";
import type { ResolvedRegistry } from "../registry.types";
import { NotFoundError, PushError, RegistryError } from "../errors";

export type RegistryResolver = (host: string) => ResolvedRegistry;

/**
 * Tag under which the referrers tag schema lists referrers of a digest
 *
 * @example
 * referrersTag("sha256:abc...") → "sha256-abc..."
 */
export function referrersTag(digest: string): string {
  return digest.replace(":", "-");
}

export class OciReferrerRegistry implements ReferrerRegistry {
  private resolve: RegistryResolver;
  private http: HttpClient;
  private logger: Logger;
  private clients: Map<string, OciClient> = new Map();

  constructor(resolve: RegistryResolver, http: HttpClient, logger: Logger) {
    this.resolve = resolve;
    this.http = http;
    this.logger = logger;
  }

  /**
   * One client per host, so tokens are reused across requests
   */
  private getClient(host: string): OciClient {
    let client = this.clients.get(host);
    if (!client) {
      const registry = this.resolve(host);
      this.logger.debug(
        `Registry ${registry.host}: ${registry.scheme}, ${registry.credentials ? `${registry.credentials.kind} credentials` : "anonymous"}`
      );
      client = new OciClient(registry, this.http);
      this.clients.set(host, client);
    }
    return client;
  }

  async headDescriptor(target: TargetReference): Promise<OciDescriptor> {
    const client = this.getClient(target.registry);
    const result = await client.headManifest(target.repository, target.digest);

    if (!result.success || !result.descriptor) {
      const message = result.error ?? `Failed to fetch manifest descriptor for ${target.repository}@${target.digest}`;
      if (result.status === 404) {
        throw new NotFoundError(message);
      }
      throw new RegistryError(message, result.status);
    }

    return result.descriptor;
  }

  async push(tag: ReferrerTag, draft: ManifestDraft): Promise<void> {
    const client = this.getClient(tag.registry);

    for (const blob of [draft.layer, draft.config]) {
      const result = await client.pushBlob(tag.repository, blob.descriptor.digest, blob.data);
      if (!result.success) {
        throw new PushError(result.error ?? `Failed to push blob ${blob.descriptor.digest}`, result.status);
      }
      this.logger.debug(`Pushed blob ${blob.descriptor.digest}`);
    }

    const pushed = await client.pushManifest(
      tag.repository,
      tag.digest,
      draft.manifest.mediaType,
      tag.manifestBytes
    );
    if (!pushed.success) {
      throw new PushError(pushed.error ?? `Failed to push manifest ${tag.reference}`, pushed.status);
    }
    this.logger.debug(`Pushed manifest ${tag.reference}`);

    if (pushed.subject) {
      return;
    }

    await this.updateReferrersIndex(client, tag, draft);
  }

  /**
   * Add the referrer to the `<alg>-<hex>` index of its subject, creating it if needed
   */
  private async updateReferrersIndex(client: OciClient, tag: ReferrerTag, draft: ManifestDraft): Promise<void> {
    const { manifest } = draft;
    const indexTag = referrersTag(manifest.subject.digest);

    const pulled = await client.pullIndex(tag.repository, indexTag);
    if (!pulled.success) {
      throw new PushError(pulled.error ?? `Failed to pull referrers index ${indexTag}`, pulled.status);
    }

    const manifests = pulled.index?.manifests ?? [];
    if (manifests.some((descriptor) => descriptor.digest === tag.digest)) {
      this.logger.debug(`Referrers index ${indexTag} already lists ${tag.digest}`);
      return;
    }

    const descriptor: OciDescriptor = {
      mediaType: manifest.mediaType,
      size: tag.manifestBytes.length,
      digest: tag.digest,
      annotations: manifest.annotations,
      artifactType: manifest.config.mediaType,
    };

    const index: OciIndex = {
      schemaVersion: 2,
      mediaType: OCI_MEDIA_TYPES.index,
      manifests: [...manifests, descriptor],
      ...(pulled.index?.annotations ? { annotations: pulled.index.annotations } : {}),
    };

    const result = await client.pushManifest(
      tag.repository,
      indexTag,
      OCI_MEDIA_TYPES.index,
      Buffer.from(JSON.stringify(index))
    );
    if (!result.success) {
      throw new PushError(result.error ?? `Failed to push referrers index ${indexTag}`, result.status);
    }
    this.logger.debug(`Updated referrers index ${tag.repository}:${indexTag}`);
  }
}
