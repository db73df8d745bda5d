/**
 * OCI Distribution Spec client
 *
 * Native TypeScript implementation of the registry calls needed to
 * publish a referrer: manifest HEAD, blob upload, manifest and index
 * push, and index pull for the referrers tag schema.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import type { HttpClient, RegistryCredentials } from "#/core";
import { USER_AGENT } from "#/constants";
import { OciIndexSchema, TokenResponseSchema } from "#/schemas";
import { formatZodIssues } from "#/friendly-errors";
import type {
  OciRegistryConfig,
  OciIndex,
  HeadManifestResult,
  BlobExistsResult,
  PullIndexResult,
  PushResult,
} from "./oci.types";
import { MANIFEST_ACCEPT_TYPES, OCI_MEDIA_TYPES } from "./oci.types";

// Registries that take a personal access token as password ignore the username
const TOKEN_USERNAME = "USERNAME";

type AuthChallenge =
  | { scheme: "bearer"; realm: string; service?: string; scope?: string }
  | { scheme: "basic" };

interface RequestOptions {
  method: "GET" | "HEAD" | "POST" | "PUT";
  headers: Record<string, string>;
  body?: Uint8Array;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

export class OciClient {
  private host: string;
  private scheme: "https" | "http";
  private credentials?: RegistryCredentials;
  private http: HttpClient;
  private tokenCache: Map<string, string> = new Map();
  // Last Authorization header a challenge was answered with
  private activeAuthorization?: string;

  constructor(config: OciRegistryConfig, http: HttpClient) {
    this.host = config.host;
    this.scheme = config.scheme;
    this.credentials = config.credentials;
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API
   */
  private getHeaders(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
      ...extra,
    };

    if (this.activeAuthorization) {
      headers["Authorization"] = this.activeAuthorization;
    } else if (this.credentials?.kind === "token") {
      headers["Authorization"] = `Bearer ${this.credentials.token}`;
    }

    return headers;
  }

  private getBaseUrl(): string {
    return `${this.scheme}://${this.host}`;
  }

  /**
   * Build OCI registry URL
   * @param name - Repository name (e.g., "myorg/my-image")
   * @param path - API path after the name
   */
  private buildUrl(name: string, path: string): string {
    return `${this.getBaseUrl()}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected formats:
   * - Bearer realm="<url>",service="<service>",scope="<scope>"
   * - Basic realm="<realm>"
   */
  private parseWwwAuthenticate(header: string): AuthChallenge | undefined {
    if (/^basic\b/i.test(header)) {
      return { scheme: "basic" };
    }

    if (!/^bearer\s/i.test(header)) {
      return undefined;
    }

    const params = header.slice("Bearer ".length);
    const realm = params.match(/realm="([^"]+)"/)?.[1];
    const service = params.match(/service="([^"]+)"/)?.[1];
    const scope = params.match(/scope="([^"]+)"/)?.[1];

    if (!realm) {
      return undefined;
    }

    return { scheme: "bearer", realm, service, scope };
  }

  /**
   * Base64 "username:password" for Basic auth, if credentials are known
   */
  private getBasicAuth(): string | undefined {
    if (!this.credentials) {
      return undefined;
    }

    const pair = this.credentials.kind === "basic"
      ? `${this.credentials.username}:${this.credentials.password}`
      : `${TOKEN_USERNAME}:${this.credentials.token}`;

    return Buffer.from(pair).toString("base64");
  }

  /**
   * Exchange credentials for a temporary registry Bearer token
   *
   * OCI registries use an OAuth2-like token exchange:
   * 1. Initial request returns 401 with WWW-Authenticate header
   * 2. Call the token endpoint (Basic auth when credentials are known, anonymous otherwise)
   * 3. Use the returned token for subsequent requests
   */
  private async exchangeToken(
    challenge: Extract<AuthChallenge, { scheme: "bearer" }>
  ): Promise<string | undefined> {
    const cacheKey = `${challenge.service ?? ""}:${challenge.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const tokenUrl = new URL(challenge.realm);
    if (challenge.service) {
      tokenUrl.searchParams.set("service", challenge.service);
    }
    if (challenge.scope) {
      tokenUrl.searchParams.set("scope", challenge.scope);
    }

    const headers: Record<string, string> = { "User-Agent": USER_AGENT };
    const basicAuth = this.getBasicAuth();
    if (basicAuth) {
      headers["Authorization"] = `Basic ${basicAuth}`;
    }

    const response = await this.http.fetch(tokenUrl.toString(), { headers });
    if (!response.ok) {
      return undefined;
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return undefined;
    }

    const exchangedToken = parsed.data.token ?? parsed.data.access_token;
    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Fetch with automatic authentication on 401 responses
   *
   * Answers a Bearer challenge with an exchanged token and a Basic
   * challenge with the known credentials, then retries once. The
   * resulting Authorization header is reused for later requests.
   */
  private async authenticatedFetch(url: string, options: RequestOptions): Promise<Response> {
    const response = await this.http.fetch(url, options);

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    if (!wwwAuthenticate) {
      return response;
    }

    const challenge = this.parseWwwAuthenticate(wwwAuthenticate);
    if (!challenge) {
      return response;
    }

    let authorization: string | undefined;
    if (challenge.scheme === "basic") {
      const basicAuth = this.getBasicAuth();
      authorization = basicAuth ? `Basic ${basicAuth}` : undefined;
    } else {
      const token = await this.exchangeToken(challenge);
      authorization = token ? `Bearer ${token}` : undefined;
    }

    if (!authorization) {
      return response;
    }

    this.activeAuthorization = authorization;

    return this.http.fetch(url, {
      ...options,
      headers: { ...options.headers, Authorization: authorization },
    });
  }

  /**
   * Look up the descriptor of a manifest without downloading it
   *
   * HEAD /v2/<name>/manifests/<reference>
   */
  async headManifest(name: string, reference: string): Promise<HeadManifestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);

      const response = await this.authenticatedFetch(url, {
        method: "HEAD",
        headers: this.getHeaders({ Accept: MANIFEST_ACCEPT_TYPES.join(", ") }),
      });

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            status: 404,
            error: `Manifest not found: ${this.host}/${name}@${reference}`,
          };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to fetch manifest descriptor: ${response.status} ${response.statusText}`,
        };
      }

      const mediaType = response.headers.get("content-type")?.split(";")[0]?.trim();
      const digest = response.headers.get("docker-content-digest") ?? reference;
      const contentLength = response.headers.get("content-length");
      const size = contentLength === null ? Number.NaN : Number(contentLength);

      if (!mediaType || !Number.isInteger(size) || size < 0) {
        return {
          success: false,
          status: response.status,
          error: `Registry returned an incomplete descriptor for ${this.host}/${name}@${reference}`,
        };
      }

      return {
        success: true,
        status: response.status,
        descriptor: { mediaType, digest, size },
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to fetch manifest descriptor: ${describeError(err)}`,
      };
    }
  }

  /**
   * Check whether a blob is already present in the repository
   *
   * HEAD /v2/<name>/blobs/<digest>
   */
  async blobExists(name: string, digest: string): Promise<BlobExistsResult> {
    try {
      const url = this.buildUrl(name, `/blobs/${digest}`);
      const response = await this.authenticatedFetch(url, {
        method: "HEAD",
        headers: this.getHeaders(),
      });

      if (response.ok) {
        return { success: true, exists: true, status: response.status };
      }
      if (response.status === 404) {
        return { success: true, exists: false, status: 404 };
      }
      return {
        success: false,
        status: response.status,
        error: `Failed to check blob ${digest}: ${response.status} ${response.statusText}`,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to check blob ${digest}: ${describeError(err)}`,
      };
    }
  }

  /**
   * Upload a blob unless the registry already has it
   *
   * POST /v2/<name>/blobs/uploads/ then PUT <location>?digest=<digest>
   * (monolithic upload)
   */
  async pushBlob(name: string, digest: string, data: Uint8Array): Promise<PushResult> {
    const existing = await this.blobExists(name, digest);
    if (!existing.success) {
      return { success: false, status: existing.status, error: existing.error };
    }
    if (existing.exists) {
      return { success: true, status: existing.status };
    }

    try {
      const start = await this.authenticatedFetch(this.buildUrl(name, "/blobs/uploads/"), {
        method: "POST",
        headers: this.getHeaders(),
      });

      if (start.status !== 202) {
        return {
          success: false,
          status: start.status,
          error: `Failed to start blob upload: ${start.status} ${start.statusText}`,
        };
      }

      const location = start.headers.get("location");
      if (!location) {
        return {
          success: false,
          status: start.status,
          error: "Registry did not return an upload location",
        };
      }

      const uploadUrl = new URL(location, this.getBaseUrl());
      uploadUrl.searchParams.set("digest", digest);

      const upload = await this.authenticatedFetch(uploadUrl.toString(), {
        method: "PUT",
        headers: this.getHeaders({ "Content-Type": "application/octet-stream" }),
        body: data,
      });

      if (upload.status !== 201) {
        return {
          success: false,
          status: upload.status,
          error: `Failed to upload blob ${digest}: ${upload.status} ${upload.statusText}`,
        };
      }

      return {
        success: true,
        status: upload.status,
        location: upload.headers.get("location") ?? undefined,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to upload blob ${digest}: ${describeError(err)}`,
      };
    }
  }

  /**
   * Push a manifest or index under a tag or digest
   *
   * PUT /v2/<name>/manifests/<reference>
   */
  async pushManifest(
    name: string,
    reference: string,
    mediaType: string,
    body: Uint8Array
  ): Promise<PushResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);
      const response = await this.authenticatedFetch(url, {
        method: "PUT",
        headers: this.getHeaders({ "Content-Type": mediaType }),
        body,
      });

      if (!response.ok) {
        return {
          success: false,
          status: response.status,
          error: `Failed to push manifest ${this.host}/${name}@${reference}: ${response.status} ${response.statusText}`,
        };
      }

      return {
        success: true,
        status: response.status,
        location: response.headers.get("location") ?? undefined,
        subject: response.headers.get("oci-subject") ?? undefined,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to push manifest ${this.host}/${name}@${reference}: ${describeError(err)}`,
      };
    }
  }

  /**
   * Pull an image index by tag
   *
   * GET /v2/<name>/manifests/<tag>
   * A missing tag is not an error: `index` is undefined.
   */
  async pullIndex(name: string, tag: string): Promise<PullIndexResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${tag}`);
      const response = await this.authenticatedFetch(url, {
        method: "GET",
        headers: this.getHeaders({ Accept: OCI_MEDIA_TYPES.index }),
      });

      if (response.status === 404) {
        return { success: true, status: 404 };
      }
      if (!response.ok) {
        return {
          success: false,
          status: response.status,
          error: `Failed to pull index ${name}:${tag}: ${response.status} ${response.statusText}`,
        };
      }

      const parsed = OciIndexSchema.safeParse(await response.json());
      if (!parsed.success) {
        return {
          success: false,
          status: response.status,
          error: `Invalid index at ${name}:${tag}: ${formatZodIssues(parsed.error).join("; ")}`,
        };
      }

      const index: OciIndex = parsed.data;
      return { success: true, status: response.status, index };
    } catch (err) {
      return {
        success: false,
        error: `Failed to pull index ${name}:${tag}: ${describeError(err)}`,
      };
    }
  }
}
