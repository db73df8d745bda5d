/**
 * In-memory OCI registry behind the HttpClient interface
 *
 * Enough of the Distribution API for referrer pushes: manifest HEAD/GET/PUT,
 * blob HEAD and monolithic uploads. Anonymous, no auth challenges.
 */

import { createHash } from "crypto";
import type { HttpClient } from "#/core";
import { toBuffer, toHeaderRecord, type HttpCall } from "./mocks";

interface StoredManifest {
  mediaType: string;
  body: Buffer;
}

export interface FakeRegistryOptions {
  /** Answer manifest PUTs that carry a subject with an OCI-Subject header */
  indexesSubject?: boolean;
}

function digestOf(data: Buffer): string {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

function hasSubject(body: Buffer): boolean {
  try {
    const parsed: unknown = JSON.parse(body.toString("utf-8"));
    return typeof parsed === "object" && parsed !== null && "subject" in parsed;
  } catch {
    return false;
  }
}

export function createFakeRegistry(options: FakeRegistryOptions = {}): HttpClient & {
  calls: HttpCall[];
  blobs: Map<string, Buffer>;
  manifests: Map<string, StoredManifest>;
  putManifest(repository: string, reference: string, mediaType: string, body: string | Buffer): string;
} {
  const calls: HttpCall[] = [];
  const blobs = new Map<string, Buffer>();
  const manifests = new Map<string, StoredManifest>();
  let uploads = 0;

  function putManifest(repository: string, reference: string, mediaType: string, body: string | Buffer): string {
    const bytes = typeof body === "string" ? Buffer.from(body) : body;
    const digest = digestOf(bytes);
    manifests.set(`${repository}@${digest}`, { mediaType, body: bytes });
    manifests.set(`${repository}@${reference}`, { mediaType, body: bytes });
    return digest;
  }

  return {
    calls,
    blobs,
    manifests,
    putManifest,

    async fetch(url: string, init?: RequestInit): Promise<Response> {
      const method = init?.method ?? "GET";
      const headers = new Headers(init?.headers);
      const body = toBuffer(init?.body);
      calls.push({ method, url, headers: toHeaderRecord(init?.headers), body });

      const { pathname, searchParams } = new URL(url);

      const upload = pathname.match(/^\/v2\/(.+)\/blobs\/uploads\/(.*)$/);
      if (upload) {
        const repository = upload[1] ?? "";
        if (method === "POST") {
          uploads += 1;
          return new Response(null, {
            status: 202,
            headers: { Location: `/v2/${repository}/blobs/uploads/${uploads}` },
          });
        }
        const digest = searchParams.get("digest");
        if (method === "PUT" && body && digest === digestOf(body)) {
          blobs.set(`${repository}@${digest}`, body);
          return new Response(null, { status: 201, headers: { Location: `/v2/${repository}/blobs/${digest}` } });
        }
        return new Response(null, { status: 400, statusText: "Bad Request" });
      }

      const blob = pathname.match(/^\/v2\/(.+)\/blobs\/([^/]+)$/);
      if (blob && method === "HEAD") {
        const stored = blobs.get(`${blob[1]}@${blob[2]}`);
        return stored
          ? new Response(null, { status: 200, headers: { "Content-Length": String(stored.length) } })
          : new Response(null, { status: 404, statusText: "Not Found" });
      }

      const manifest = pathname.match(/^\/v2\/(.+)\/manifests\/([^/]+)$/);
      if (manifest) {
        const repository = manifest[1] ?? "";
        const reference = manifest[2] ?? "";

        if (method === "PUT" && body) {
          const digest = putManifest(repository, reference, headers.get("content-type") ?? "", body);
          const responseHeaders: Record<string, string> = { "Docker-Content-Digest": digest };
          if (options.indexesSubject && hasSubject(body)) {
            responseHeaders["OCI-Subject"] = digest;
          }
          return new Response(null, { status: 201, headers: responseHeaders });
        }

        const stored = manifests.get(`${repository}@${reference}`);
        if (!stored) {
          return new Response(null, { status: 404, statusText: "Not Found" });
        }
        const storedHeaders = {
          "Content-Type": stored.mediaType,
          "Docker-Content-Digest": digestOf(stored.body),
          "Content-Length": String(stored.body.length),
        };
        if (method === "HEAD") {
          return new Response(null, { status: 200, headers: storedHeaders });
        }
        if (method === "GET") {
          return new Response(stored.body, { status: 200, headers: storedHeaders });
        }
      }

      return new Response(null, { status: 405, statusText: "Method Not Allowed" });
    },
  };
}
