import { z } from "zod";
import { DIGEST_REGEX } from "#/constants";

// Log levels, lowest first
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const LogLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// Content digest (sha256:<64 hex> or sha512:<128 hex>)
export const DigestSchema = z.string().regex(DIGEST_REGEX, {
  message: "Invalid digest. Expected sha256:<64 hex> or sha512:<128 hex>",
});

// OCI content descriptor
export const OciDescriptorSchema = z.object({
  mediaType: z.string().min(1),
  digest: DigestSchema,
  size: z.number().int().nonnegative(),
  annotations: z.record(z.string(), z.string()).optional(),
  artifactType: z.string().optional(),
});

// OCI image index (referrers tag schema); unknown descriptor fields are kept
export const OciIndexSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  manifests: z.array(OciDescriptorSchema.passthrough()).default([]),
  annotations: z.record(z.string(), z.string()).optional(),
});

// CycloneDX JSON: only the fields the resolver reads are checked
export const CycloneDxComponentSchema = z
  .object({
    type: z.string().optional(),
    name: z.string().optional(),
    "bom-ref": z.string().optional(),
    purl: z.string().optional(),
  })
  .passthrough();

export const CycloneDxBomSchema = z
  .object({
    bomFormat: z.literal("CycloneDX"),
    specVersion: z.string().optional(),
    metadata: z
      .object({
        component: CycloneDxComponentSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type CycloneDxBom = z.infer<typeof CycloneDxBomSchema>;

// SPDX JSON (2.2 / 2.3)
export const SpdxExternalRefSchema = z
  .object({
    referenceCategory: z.string(),
    referenceType: z.string().optional(),
    referenceLocator: z.string(),
  })
  .passthrough();
export type SpdxExternalRef = z.infer<typeof SpdxExternalRefSchema>;

export const SpdxPackageSchema = z
  .object({
    name: z.string(),
    SPDXID: z.string().optional(),
    externalRefs: z.array(SpdxExternalRefSchema).default([]),
  })
  .passthrough();
export type SpdxPackage = z.infer<typeof SpdxPackageSchema>;

export const SpdxDocumentSchema = z
  .object({
    spdxVersion: z.string().startsWith("SPDX-"),
    name: z.string(),
    packages: z.array(SpdxPackageSchema).default([]),
  })
  .passthrough();
export type SpdxDocument = z.infer<typeof SpdxDocumentSchema>;

// Per-registry settings in the config file, keyed by registry host
export const RegistryEntrySchema = z
  .object({
    username: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(), // Can also be set via env vars
    insecure: z.boolean().default(false), // Plain HTTP
  })
  .refine((entry) => (entry.username === undefined) === (entry.password === undefined), {
    message: "username and password must be set together",
  });
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

// Config file (--config or SBOM_REFERRER_CONFIG)
export const ReferrerConfigSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  registries: z.record(z.string().min(1), RegistryEntrySchema).default({}),
});
export type ReferrerConfig = z.infer<typeof ReferrerConfigSchema>;

// Docker CLI config.json (only the auth section)
export const DockerAuthEntrySchema = z
  .object({
    auth: z.string().optional(), // base64("username:password")
    username: z.string().optional(),
    password: z.string().optional(),
  })
  .passthrough();
export type DockerAuthEntry = z.infer<typeof DockerAuthEntrySchema>;

export const DockerConfigSchema = z
  .object({
    auths: z.record(z.string(), DockerAuthEntrySchema).default({}),
    credsStore: z.string().optional(),
    credHelpers: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();
export type DockerConfig = z.infer<typeof DockerConfigSchema>;

// Registry token endpoint response (either field name is allowed)
export const TokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
});
