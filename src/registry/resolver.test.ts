import { describe, test, expect } from "vitest";
import { hostname, isLocalRegistry, getScheme, resolveRegistry } from "./resolver";
import { createMockCredentialProvider } from "#/test-utils/mocks";
import { ReferrerConfigSchema, type ReferrerConfig } from "#/schemas";

const config = (registries: Record<string, unknown>): ReferrerConfig => ReferrerConfigSchema.parse({ registries });

describe("hostname", () => {
  test.each([
    ["ghcr.io", "ghcr.io"],
    ["localhost:5000", "localhost"],
    ["[::1]:5000", "[::1]"],
    ["[::1]", "[::1]"],
  ])("%s → %s", (host, expected) => {
    expect(hostname(host)).toBe(expected);
  });
});

describe("isLocalRegistry", () => {
  test.each(["localhost", "localhost:5000", "127.0.0.1:5000", "[::1]:5000", "registry.local", "REGISTRY.LOCAL:80"])(
    "%s is local",
    (host) => {
      expect(isLocalRegistry(host)).toBe(true);
    }
  );

  test.each(["ghcr.io", "index.docker.io", "local.example.com", "10.0.0.1:5000"])("%s is not local", (host) => {
    expect(isLocalRegistry(host)).toBe(false);
  });
});

describe("getScheme", () => {
  test("uses https for remote registries", () => {
    expect(getScheme("ghcr.io")).toBe("https");
  });

  test("uses http for local registries", () => {
    expect(getScheme("localhost:5000")).toBe("http");
  });

  test("uses http for registries marked insecure", () => {
    const entry = config({ "registry.example.com": { insecure: true } }).registries["registry.example.com"];

    expect(getScheme("registry.example.com", entry)).toBe("http");
  });
});

describe("resolveRegistry", () => {
  test("returns an anonymous https registry without config", () => {
    expect(resolveRegistry("ghcr.io", null)).toEqual({ host: "ghcr.io", scheme: "https" });
  });

  test("uses username and password from config", () => {
    const result = resolveRegistry(
      "registry.example.com",
      config({ "registry.example.com": { username: "ci", password: "test-secret" } })
    );

    expect(result.credentials).toEqual({ kind: "basic", username: "ci", password: "test-secret" });
  });

  test("uses a token from config", () => {
    const result = resolveRegistry("registry.example.com", config({ "registry.example.com": { token: "cfg-token" } }));

    expect(result.credentials).toEqual({ kind: "token", token: "cfg-token" });
  });

  test("prefers config credentials over the credential provider", () => {
    const provider = createMockCredentialProvider({ "registry.example.com": { kind: "token", token: "env-token" } });

    const result = resolveRegistry(
      "registry.example.com",
      config({ "registry.example.com": { token: "cfg-token" } }),
      provider
    );

    expect(result.credentials).toEqual({ kind: "token", token: "cfg-token" });
  });

  test("falls back to the credential provider", () => {
    const provider = createMockCredentialProvider({ "ghcr.io": { kind: "token", token: "env-token" } });

    const result = resolveRegistry("ghcr.io", config({ "ghcr.io": { insecure: false } }), provider);

    expect(result).toEqual({ host: "ghcr.io", scheme: "https", credentials: { kind: "token", token: "env-token" } });
  });

  test("ignores entries of other hosts", () => {
    const result = resolveRegistry("ghcr.io", config({ "registry.example.com": { token: "cfg-token" } }));

    expect(result.credentials).toBeUndefined();
  });
});
