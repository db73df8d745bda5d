/**
 * Friendly Errors
 *
 * Parse YAML or JSON content and validate it against a Zod schema,
 * returning human-readable errors instead of throwing.
 *
 * USAGE: use this for every user-supplied document (config files, SBOMs,
 * Docker config.json) so error messages stay consistent.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, ReferrerConfigSchema, "config.yaml");
 * if (!result.success) {
 *   throw new ConfigError(result.error.message, result.error.details);
 * }
 * const config = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "json" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only, the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

function validate<Output, Input>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  message: string
): ParseResult<Output> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  // An empty file parses to null; treat it as an empty mapping
  return validate(raw ?? {}, schema, `Invalid configuration${fileContext}`);
}

/**
 * Parse JSON content and validate against a Zod schema.
 *
 * @param label - What is being parsed, used in messages (e.g. "CycloneDX SBOM")
 */
export function safeParseJson<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  label: string
): ParseResult<Output> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "json",
        message: `Invalid JSON in ${label}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return validate(raw, schema, `Invalid ${label}`);
}
