#!/usr/bin/env node
/**
 * sbom-referrer CLI
 * Commands: put
 */

import { Command } from "commander";
import chalk from "chalk";
import { putCommand, type PutOptions } from "#/commands";
import { createNodeContext } from "#/node";

function hasDetails(error: Error): error is Error & { details: string[] } {
  return "details" in error && Array.isArray(error.details);
}

function reportError(error: unknown): void {
  if (!(error instanceof Error)) {
    console.error(chalk.red(`[ERROR] ${String(error)}`));
    return;
  }

  console.error(chalk.red(`[ERROR] ${error.message}`));
  if (hasDetails(error)) {
    for (const detail of error.details) {
      console.error(chalk.red(`  - ${detail}`));
    }
  }
}

const program = new Command();

program
  .name("sbom-referrer")
  .description("Push an SBOM to an OCI registry as a referrer of the image it describes")
  .version("0.1.0");

program
  .command("put")
  .description("Put SBOM as a referrer of the image it was generated for")
  .option("-f, --file <path>", "SBOM file path (default: stdin)")
  .option("--config <path>", "Config file path (default: $SBOM_REFERRER_CONFIG)")
  .option("--debug", "Enable debug logging")
  .addHelpText(
    "after",
    `
Examples:
  syft ghcr.io/example/app@sha256:<digest> -o cyclonedx-json | sbom-referrer put
  sbom-referrer put -f sbom.spdx.json --debug`
  )
  .action(async (options: PutOptions) => {
    try {
      await putCommand(options, createNodeContext());
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

await program.parseAsync();
