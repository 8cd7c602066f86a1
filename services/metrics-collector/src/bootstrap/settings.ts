// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/bootstrap/settings`
 * Purpose: Resolve collector settings from an explicit precedence table, then validate with Zod.
 * Scope: Pure resolution over already-read sources (env file contents, CLI flags, process env). No network.
 * Invariants:
 * - Precedence: env file canonical key (only when the file exists) → CLI flag → env file alias keys → process env → default.
 *   First non-empty wins.
 * - Env keys keep the legacy aliases (APP_ID|AppID, PRIVATE_KEY|PemPath|PRIVATE_KEY_PATH, ...).
 * - Missing required settings fail fast with ConfigError before any network call.
 * - Exactly one of enterprise / org.
 * Side-effects: none
 * Links: ./env-file.ts, ../cli.ts
 * @internal
 */

import { ConfigError, type ReportScope } from "@usage-metrics/core";
import { z } from "zod";

import { DEFAULT_API_BASE } from "../adapters/github/github-client.js";
import { DEFAULT_SHARD_CONCURRENCY } from "../adapters/reports/shard-fetcher.js";
import { DEFAULT_ENV_FILE } from "./env-file.js";

/** Raw string inputs, one per setting. CLI flags arrive in this shape. */
export interface SettingsInput {
  appId?: string | undefined;
  privateKey?: string | undefined;
  installationId?: string | undefined;
  enterprise?: string | undefined;
  org?: string | undefined;
  apiBase?: string | undefined;
  output?: string | undefined;
  chartOutput?: string | undefined;
  concurrency?: string | undefined;
}

export type SettingName = keyof SettingsInput;

interface SettingSpec {
  readonly flag: string;
  /** Env keys in lookup order (first is canonical) */
  readonly envKeys: readonly string[];
  readonly fallback?: string;
}

export const SETTING_TABLE: Readonly<Record<SettingName, SettingSpec>> = {
  appId: { flag: "--app-id", envKeys: ["APP_ID", "AppID"] },
  privateKey: {
    flag: "--private-key",
    envKeys: ["PRIVATE_KEY", "PemPath", "PRIVATE_KEY_PATH"],
  },
  installationId: {
    flag: "--installation-id",
    envKeys: ["INSTALLATION_ID", "InstallationID"],
  },
  enterprise: { flag: "--enterprise", envKeys: ["ENTERPRISE"] },
  org: { flag: "--org", envKeys: ["ORG"] },
  apiBase: {
    flag: "--api-base",
    envKeys: ["API_BASE"],
    fallback: DEFAULT_API_BASE,
  },
  output: { flag: "--output", envKeys: ["OUTPUT"] },
  chartOutput: { flag: "--chart-output", envKeys: ["CHART_OUTPUT"] },
  concurrency: {
    flag: "--concurrency",
    envKeys: ["SHARD_CONCURRENCY"],
    fallback: String(DEFAULT_SHARD_CONCURRENCY),
  },
};

const SETTING_NAMES = [
  "appId",
  "privateKey",
  "installationId",
  "enterprise",
  "org",
  "apiBase",
  "output",
  "chartOutput",
  "concurrency",
] as const satisfies readonly SettingName[];

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

export interface SettingSource {
  readonly name: string;
  lookup(setting: SettingName): string | undefined;
}

function firstNonEmpty(
  values: readonly (string | undefined)[]
): string | undefined {
  return values.find(
    (value): value is string => value !== undefined && value.trim() !== ""
  );
}

type EnvKeyPick = (spec: SettingSpec) => readonly string[];

const allKeys: EnvKeyPick = (spec) => spec.envKeys;
const canonicalKey: EnvKeyPick = (spec) => spec.envKeys.slice(0, 1);
const aliasKeys: EnvKeyPick = (spec) => spec.envKeys.slice(1);

function envSource(
  name: string,
  values: Readonly<Record<string, string | undefined>>,
  keys: EnvKeyPick = allKeys
): SettingSource {
  return {
    name,
    lookup: (setting) =>
      firstNonEmpty(keys(SETTING_TABLE[setting]).map((key) => values[key])),
  };
}

function cliSource(flags: SettingsInput): SettingSource {
  return {
    name: "cli",
    lookup: (setting) => firstNonEmpty([flags[setting]]),
  };
}

const defaultsSource: SettingSource = {
  name: "default",
  lookup: (setting) => SETTING_TABLE[setting].fallback,
};

export interface SettingsSources {
  readonly cli: SettingsInput;
  /** Parsed env file, or null when the file does not exist */
  readonly envFile: Readonly<Record<string, string>> | null;
  readonly envFileName?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Sources in precedence order. A flag beats an env file alias but not the
 * canonical env file key, so `AppID=` in the file yields to `--app-id`.
 */
export function precedenceTable(sources: SettingsSources): SettingSource[] {
  const ordered: SettingSource[] = [];
  const envFileName = sources.envFileName ?? DEFAULT_ENV_FILE;
  if (sources.envFile) {
    ordered.push(envSource(envFileName, sources.envFile, canonicalKey));
  }
  ordered.push(cliSource(sources.cli));
  if (sources.envFile) {
    ordered.push(
      envSource(`${envFileName} (alias)`, sources.envFile, aliasKeys)
    );
  }
  ordered.push(envSource("environment", sources.env ?? process.env));
  ordered.push(defaultsSource);
  return ordered;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const ResolvedSchema = z.object({
  apiBase: z.string().url("must be a valid URL"),
  appId: z.string().min(1),
  privateKey: z.string().min(1),
  installationId: z.coerce
    .number()
    .int("must be an integer")
    .positive("must be positive"),
  output: z.string().min(1).optional(),
  chartOutput: z.string().min(1).optional(),
  concurrency: z.coerce
    .number()
    .int("must be an integer")
    .min(1, "must be at least 1")
    .max(16, "must be at most 16"),
});

export interface CollectorSettings {
  readonly apiBase: string;
  readonly appId: string;
  /** Path to the PEM file, read by the caller */
  readonly privateKeyPath: string;
  readonly installationId: number;
  readonly scope: ReportScope;
  readonly output?: string | undefined;
  readonly chartOutput?: string | undefined;
  readonly concurrency: number;
  /** Which source supplied each resolved setting */
  readonly origins: Readonly<Partial<Record<SettingName, string>>>;
}

function flagFor(pathKey: PropertyKey | undefined): string {
  const name = SETTING_NAMES.find((setting) => setting === pathKey);
  return name ? SETTING_TABLE[name].flag : String(pathKey ?? "settings");
}

export function resolveSettings(sources: SettingsSources): CollectorSettings {
  const table = precedenceTable(sources);
  const values: Partial<Record<SettingName, string>> = {};
  const origins: Partial<Record<SettingName, string>> = {};

  for (const setting of SETTING_NAMES) {
    for (const source of table) {
      const value = source.lookup(setting);
      if (value !== undefined && value.trim() !== "") {
        values[setting] = value.trim();
        origins[setting] = source.name;
        break;
      }
    }
  }

  const envFileName = sources.envFileName ?? DEFAULT_ENV_FILE;
  const { enterprise, org } = values;
  if (enterprise && org) {
    throw new ConfigError(
      `Set either ${SETTING_TABLE.enterprise.flag} or ${SETTING_TABLE.org.flag}, not both.`,
      [SETTING_TABLE.enterprise.flag, SETTING_TABLE.org.flag]
    );
  }
  const scope: ReportScope | null = enterprise
    ? { kind: "enterprise", slug: enterprise }
    : org
      ? { kind: "organization", slug: org }
      : null;

  const missing: string[] = [];
  for (const setting of ["appId", "privateKey", "installationId"] as const) {
    if (!values[setting]) missing.push(SETTING_TABLE[setting].flag);
  }
  if (!scope) {
    missing.push(
      `${SETTING_TABLE.enterprise.flag} (or ${SETTING_TABLE.org.flag})`
    );
  }
  if (!scope || missing.length > 0) {
    throw new ConfigError(
      `Missing required settings: ${missing.join(", ")}. Provide args or set them in ${envFileName}.`,
      missing
    );
  }

  const parsed = ResolvedSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${flagFor(issue.path[0])}: ${issue.message}`
    );
    throw new ConfigError(
      `Invalid settings:\n${issues.map((issue) => `  ${issue}`).join("\n")}`,
      issues
    );
  }

  return {
    apiBase: parsed.data.apiBase,
    appId: parsed.data.appId,
    privateKeyPath: parsed.data.privateKey,
    installationId: parsed.data.installationId,
    scope,
    output: parsed.data.output,
    chartOutput: parsed.data.chartOutput,
    concurrency: parsed.data.concurrency,
    origins,
  };
}
