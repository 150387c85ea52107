import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import {
  getConfigSummary,
  loadConfig,
  toClientOptions,
  validateRequiredEnv,
} from "./config.js";

describe("loadConfig", () => {
  it("reads account variables from the environment", () => {
    const config = loadConfig(
      { account: "reseller" },
      {
        OPENPROVIDER_RESELLER_USERNAME: "test-user",
        OPENPROVIDER_RESELLER_PASSWORD: "test-secret",
        OPENPROVIDER_TIMEOUT: "5000",
      }
    );

    expect(config).toEqual({
      account: "reseller",
      url: undefined,
      username: "test-user",
      password: "test-secret",
      passwordHash: undefined,
      timeout: 5000,
      rejectUnauthorized: true,
    });
  });

  it("lets flags win over the environment", () => {
    const config = loadConfig(
      { username: "flag-user", password: "flag-secret", insecure: true },
      {
        OPENPROVIDER_USERNAME: "env-user",
        OPENPROVIDER_PASSWORD_HASH: "env-hash",
      }
    );

    expect(config.username).toBe("flag-user");
    expect(config.password).toBe("flag-secret");
    expect(config.passwordHash).toBeUndefined();
    expect(config.rejectUnauthorized).toBe(false);
  });

  it("loads variables from an env file", () => {
    const dir = mkdtempSync(join(tmpdir(), "openprovider-config-"));
    const file = join(dir, "test.env");
    writeFileSync(
      file,
      '# credentials\nOPENPROVIDER_USERNAME="file-user"\nOPENPROVIDER_PASSWORD_HASH=file-hash\n'
    );
    const env: Record<string, string | undefined> = {};

    const config = loadConfig({ config: file }, env);

    expect(env.OPENPROVIDER_USERNAME).toBe("file-user");
    expect(config.username).toBe("file-user");
    expect(config.passwordHash).toBe("file-hash");
    expect(config.password).toBeUndefined();
  });

  it("reports an unreadable env file", () => {
    expect(() => loadConfig({ config: "/nonexistent/test.env" }, {})).toThrow(
      /^Failed to load config file \/nonexistent\/test\.env: /
    );
  });
});

describe("validateRequiredEnv", () => {
  it("names the missing settings", () => {
    const error = validateRequiredEnv(loadConfig({ account: "reseller" }, {}));

    expect(error?.message).toBe(
      "Missing openprovider username, password for account reseller.\n" +
        "Set via environment variables (OPENPROVIDER_RESELLER_USERNAME, " +
        "OPENPROVIDER_RESELLER_PASSWORD or OPENPROVIDER_RESELLER_PASSWORD_HASH) or CLI flags."
    );
  });

  it("rejects a malformed timeout", () => {
    const config = loadConfig(
      { username: "test-user", password: "test-secret", timeout: "soon" },
      {}
    );

    expect(validateRequiredEnv(config)?.message).toBe(
      "The timeout must be a non-negative integer."
    );
  });

  it("accepts complete settings", () => {
    const config = loadConfig({ username: "test-user", password: "test-secret" }, {});

    expect(validateRequiredEnv(config)).toBeNull();
    expect(toClientOptions(config)).toEqual({
      username: "test-user",
      password: "test-secret",
      passwordHash: undefined,
      url: undefined,
      timeout: 60000,
      rejectUnauthorized: true,
    });
  });
});

describe("getConfigSummary", () => {
  it("masks secrets", () => {
    const summary = getConfigSummary(
      loadConfig({ username: "test-user", passwordHash: "test-hash" }, {})
    );

    expect(summary).toEqual({
      account: "(default)",
      url: "(default)",
      username: "test-user",
      password: "(not set)",
      passwordHash: "***",
      timeout: 60000,
      rejectUnauthorized: true,
    });
  });
});
