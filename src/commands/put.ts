/**
 * put: read an SBOM and push it as a referrer of the image it describes
 */

import type { EngineContext } from "#/core";
import { loadConfig, resolveLogLevel } from "#/config";
import { createCredentialProvider } from "#/auth";
import { createLogger } from "#/logger";
import { createReferrerRegistry } from "#/registry";
import { putReferrer, type PutReferrerResult } from "#/referrer";

export interface PutOptions {
  /** SBOM file path; stdin when absent */
  file?: string;
  /** Config file path */
  config?: string;
  debug?: boolean;
}

async function readSbom(options: PutOptions, ctx: EngineContext): Promise<Buffer> {
  if (options.file) {
    if (!ctx.fs.exists(options.file)) {
      throw new Error(`SBOM file not found: ${options.file}`);
    }
    return ctx.fs.readFileBinary(options.file);
  }
  return ctx.stdin.readAll();
}

export async function putCommand(options: PutOptions, ctx: EngineContext): Promise<PutReferrerResult> {
  const config = loadConfig(ctx.fs, ctx.env, options.config);
  const logger = createLogger(resolveLogLevel(config, ctx.env, options.debug), ctx.output);

  const sbomBytes = await readSbom(options, ctx);
  logger.debug(`Read ${sbomBytes.length} bytes from ${options.file ?? "stdin"}`);

  const registry = createReferrerRegistry({
    config,
    credentials: createCredentialProvider(ctx),
    http: ctx.http,
    logger,
  });

  return putReferrer(sbomBytes, { registry, logger });
}
