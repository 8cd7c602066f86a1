// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/tests/settings.test`
 * Purpose: Unit tests for settings precedence, aliases, and validation.
 * Scope: Pure resolution; env file contents and process env are passed in explicitly.
 * @internal
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ConfigError } from "@usage-metrics/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadEnvFile } from "../src/bootstrap/env-file";
import {
  precedenceTable,
  resolveSettings,
  type SettingsInput,
} from "../src/bootstrap/settings";

const REQUIRED: SettingsInput = {
  appId: "12345",
  privateKey: "keys/app.pem",
  installationId: "42",
  enterprise: "acme",
};

function resolve(
  cli: SettingsInput,
  envFile: Record<string, string> | null = null,
  env: Record<string, string | undefined> = {}
) {
  return resolveSettings({ cli, envFile, env });
}

describe("resolveSettings", () => {
  it("resolves required settings from flags and fills defaults", () => {
    const settings = resolve(REQUIRED);

    expect(settings).toEqual({
      apiBase: "https://api.github.com",
      appId: "12345",
      privateKeyPath: "keys/app.pem",
      installationId: 42,
      scope: { kind: "enterprise", slug: "acme" },
      output: undefined,
      chartOutput: undefined,
      concurrency: 4,
      origins: {
        appId: "cli",
        privateKey: "cli",
        installationId: "cli",
        enterprise: "cli",
        apiBase: "default",
        concurrency: "default",
      },
    });
  });

  it("lets the env file win over flags, and flags win over the environment", () => {
    const settings = resolve(
      { ...REQUIRED, appId: "111" },
      { APP_ID: "222" },
      { APP_ID: "333", INSTALLATION_ID: "77", API_BASE: "https://ghe.example.test/api/v3" }
    );

    expect(settings.appId).toBe("222");
    expect(settings.installationId).toBe(42);
    expect(settings.apiBase).toBe("https://ghe.example.test/api/v3");
    expect(settings.origins).toMatchObject({
      appId: "test.env",
      installationId: "cli",
      apiBase: "environment",
    });
  });

  it("accepts the legacy env key aliases", () => {
    const settings = resolve(
      {},
      {
        AppID: "12345",
        PemPath: "keys/app.pem",
        InstallationID: "42",
        ORG: "acme-labs",
      }
    );

    expect(settings.appId).toBe("12345");
    expect(settings.privateKeyPath).toBe("keys/app.pem");
    expect(settings.installationId).toBe(42);
    expect(settings.scope).toEqual({ kind: "organization", slug: "acme-labs" });
  });

  it("lets a flag win over an env file alias but not over the canonical key", () => {
    const settings = resolve(
      { ...REQUIRED, appId: "999", installationId: "42" },
      { AppID: "12345", INSTALLATION_ID: "77", InstallationID: "88" }
    );

    expect(settings.appId).toBe("999");
    expect(settings.installationId).toBe(77);
    expect(settings.origins).toMatchObject({
      appId: "cli",
      installationId: "test.env",
    });
  });

  it("falls back to an env file alias when no flag is given", () => {
    const settings = resolve(
      { ...REQUIRED, appId: undefined },
      { AppID: "12345" },
      { APP_ID: "333" }
    );

    expect(settings.appId).toBe("12345");
    expect(settings.origins.appId).toBe("test.env (alias)");
  });

  it("skips blank values and trims the ones it keeps", () => {
    const settings = resolve(
      { ...REQUIRED, appId: "  12345  " },
      { APP_ID: "   " }
    );

    expect(settings.appId).toBe("12345");
    expect(settings.origins.appId).toBe("cli");
  });

  it("lists every missing required setting", () => {
    const error = (() => {
      try {
        resolve({ installationId: "42" });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message:
        "Missing required settings: --app-id, --private-key, --enterprise (or --org). Provide args or set them in test.env.",
      issues: ["--app-id", "--private-key", "--enterprise (or --org)"],
    });
  });

  it("names the env file it was told to read", () => {
    expect(() =>
      resolveSettings({ cli: {}, envFile: null, envFileName: "ci.env", env: {} })
    ).toThrow(/set them in ci\.env\.$/);
  });

  it("rejects setting both an enterprise and an organization", () => {
    expect(() => resolve({ ...REQUIRED, org: "acme-labs" })).toThrow(
      "Set either --enterprise or --org, not both."
    );
  });

  it("reports invalid values by flag", () => {
    expect(() =>
      resolve({
        ...REQUIRED,
        installationId: "forty-two",
        apiBase: "api.github.com",
        concurrency: "32",
      })
    ).toThrow(
      [
        "Invalid settings:",
        "  --api-base: must be a valid URL",
        "  --installation-id: Expected number, received nan",
        "  --concurrency: must be at most 16",
      ].join("\n")
    );
  });

  it("rejects a non-positive installation id", () => {
    expect(() => resolve({ ...REQUIRED, installationId: "0" })).toThrow(
      "  --installation-id: must be positive"
    );
  });

  it("reads the process environment when no env is given", () => {
    process.env.ENTERPRISE = "from-process-env";
    try {
      const settings = resolveSettings({
        cli: { appId: "1", privateKey: "k.pem", installationId: "2" },
        envFile: null,
      });
      expect(settings.scope).toEqual({
        kind: "enterprise",
        slug: "from-process-env",
      });
    } finally {
      delete process.env.ENTERPRISE;
    }
  });
});

describe("precedenceTable", () => {
  it("orders env file, flags, environment, defaults", () => {
    const names = precedenceTable({
      cli: {},
      envFile: {},
      envFileName: "local.env",
      env: {},
    }).map((source) => source.name);

    expect(names).toEqual([
      "local.env",
      "cli",
      "local.env (alias)",
      "environment",
      "default",
    ]);
  });

  it("leaves out an env file that does not exist", () => {
    const names = precedenceTable({ cli: {}, envFile: null, env: {} }).map(
      (source) => source.name
    );

    expect(names).toEqual(["cli", "environment", "default"]);
  });
});

describe("loadEnvFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "usage-metrics-env-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses dotenv syntax without touching process.env", async () => {
    const envPath = path.join(dir, "test.env");
    await writeFile(
      envPath,
      '# App credentials\nAppID=12345\nPemPath="keys/app.pem"\nENTERPRISE=acme\n'
    );

    expect(loadEnvFile(envPath)).toEqual({
      AppID: "12345",
      PemPath: "keys/app.pem",
      ENTERPRISE: "acme",
    });
    expect(process.env.AppID).toBeUndefined();
  });

  it("returns null for a missing file", () => {
    expect(loadEnvFile(path.join(dir, "absent.env"))).toBeNull();
  });
});
