/**
 * Node.js implementations of the core I/O interfaces
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import type {
  EngineContext,
  Environment,
  FileSystem,
  HttpClient,
  InputStream,
} from "#/core";
import { consoleSink } from "#/logger";

export const nodeFileSystem: FileSystem = {
  readFile: (path) => readFileSync(path, "utf-8"),
  readFileBinary: (path) => readFileSync(path),
  exists: (path) => existsSync(path),
};

export const nodeHttpClient: HttpClient = {
  fetch: (url, options) => fetch(url, options),
};

export const nodeEnvironment: Environment = {
  get: (name) => process.env[name],
  homeDir: () => homedir(),
};

export const nodeStdin: InputStream = {
  async readAll(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  },
};

export function createNodeContext(): EngineContext {
  return {
    fs: nodeFileSystem,
    http: nodeHttpClient,
    env: nodeEnvironment,
    stdin: nodeStdin,
    output: consoleSink,
  };
}
