/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  exists(path: string): boolean;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Process environment lookup. Kept behind an interface so credential
 * and config discovery can be tested without touching process.env.
 */
export interface Environment {
  get(name: string): string | undefined;
  homeDir(): string;
}

/**
 * Registry credentials, either a username/password pair or a bare token
 */
export type RegistryCredentials =
  | { kind: "basic"; username: string; password: string }
  | { kind: "token"; token: string };

/**
 * Looks up credentials for a registry host (environment, Docker config)
 */
export interface CredentialProvider {
  getRegistryCredentials(host: string): RegistryCredentials | undefined;
}

/**
 * Source of the SBOM bytes when no file path is given
 */
export interface InputStream {
  readAll(): Promise<Buffer>;
}

/**
 * Where log lines end up (console in production)
 */
export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  env: Environment;
  stdin: InputStream;
  output: LogSink;
}
