/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type {
  CredentialProvider,
  EngineContext,
  Environment,
  FileSystem,
  HttpClient,
  InputStream,
  Logger,
  LogSink,
  RegistryCredentials,
} from "#/core";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, string | Buffer> } {
  const files = new Map<string, string | Buffer>(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof content === "string" ? content : content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof content === "string" ? Buffer.from(content) : content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

export type MockResponse = Response | Response[] | (() => Response);

/**
 * Recorded HTTP request
 */
export interface HttpCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export function toHeaderRecord(headers: RequestInit["headers"]): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

export function toBuffer(body: RequestInit["body"]): Buffer | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === "string") {
    return Buffer.from(body);
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  throw new Error("Mock HttpClient only records string and Uint8Array bodies");
}

/**
 * Create a mock HttpClient with predefined responses, keyed by "METHOD url".
 * An array answers successive calls in order (the last entry repeats).
 * Unknown requests get a 404.
 */
export function createMockHttpClient(
  responses: Record<string, MockResponse> = {}
): HttpClient & { calls: HttpCall[]; responses: Map<string, MockResponse> } {
  const table = new Map<string, MockResponse>(Object.entries(responses));
  const calls: HttpCall[] = [];
  const counters = new Map<string, number>();

  return {
    calls,
    responses: table,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const method = options?.method ?? "GET";
      calls.push({
        method,
        url,
        headers: toHeaderRecord(options?.headers),
        body: toBuffer(options?.body),
      });

      const key = `${method} ${url}`;
      const entry = table.get(key);

      if (!entry) {
        return new Response(null, { status: 404, statusText: "Not Found" });
      }

      if (Array.isArray(entry)) {
        const count = counters.get(key) ?? 0;
        counters.set(key, count + 1);
        const response = entry[Math.min(count, entry.length - 1)];
        if (!response) {
          throw new Error(`No mock response left for ${key}`);
        }
        return response;
      }

      return typeof entry === "function" ? entry() : entry;
    },
  };
}

/**
 * Create a mock Environment
 */
export function createMockEnvironment(
  vars: Record<string, string> = {},
  home = "/home/test"
): Environment {
  return {
    get(name: string): string | undefined {
      return vars[name];
    },
    homeDir(): string {
      return home;
    },
  };
}

/**
 * Create a mock InputStream returning fixed content
 */
export function createMockInputStream(content: string | Buffer = ""): InputStream {
  return {
    async readAll(): Promise<Buffer> {
      return typeof content === "string" ? Buffer.from(content) : content;
    },
  };
}

/**
 * Create a LogSink that keeps every line
 */
export function createRecordingSink(): LogSink & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    log(message: string): void {
      lines.push(message);
    },
    error(message: string): void {
      errors.push(message);
    },
  };
}

/**
 * Create a Logger that records "<level>: <message>" entries
 */
export function createRecordingLogger(): Logger & { entries: string[] } {
  const entries: string[] = [];
  return {
    entries,
    debug: (message) => entries.push(`debug: ${message}`),
    info: (message) => entries.push(`info: ${message}`),
    warn: (message) => entries.push(`warn: ${message}`),
    error: (message) => entries.push(`error: ${message}`),
  };
}

/**
 * Create a mock CredentialProvider
 */
export function createMockCredentialProvider(
  credentials: Record<string, RegistryCredentials> = {}
): CredentialProvider {
  return {
    getRegistryCredentials(host: string): RegistryCredentials | undefined {
      return credentials[host];
    },
  };
}

/**
 * Create an EngineContext from mocks, overriding any part
 */
export function createMockContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    fs: createMockFileSystem(),
    http: createMockHttpClient(),
    env: createMockEnvironment(),
    stdin: createMockInputStream(),
    output: createRecordingSink(),
    ...overrides,
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(
  data: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(
  status: number,
  statusText: string,
  headers: Record<string, string> = {}
): Response {
  return new Response(null, { status, statusText, headers });
}

/**
 * Helper to create a bodiless response (HEAD answers, 201/202 upload steps)
 */
export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}
