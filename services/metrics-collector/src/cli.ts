// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/cli`
 * Purpose: Command-line surface of the collector (flags only, no resolution).
 * Scope: Parses argv into raw SettingsInput plus the env file path. Precedence and validation live in bootstrap/settings.
 * Invariants:
 * - Every flag is optional here; missing required values are reported by resolveSettings.
 * - Parsing never exits the process: commander errors are thrown as CommanderError.
 * Side-effects: writes help/version text to stdout when requested
 * Links: ./bootstrap/settings.ts
 * @public
 */

import { Command } from "commander";

import { DEFAULT_ENV_FILE } from "./bootstrap/env-file.js";
import type { SettingsInput } from "./bootstrap/settings.js";

export interface CliArgs {
  readonly settings: SettingsInput;
  readonly envFile: string;
}

interface CliOptions extends SettingsInput {
  envFile: string;
}

export function buildCommand(): Command {
  return new Command("usage-metrics")
    .description(
      "Download the latest 28-day Copilot usage report for a GitHub enterprise or organization and chart pull request activity"
    )
    .option("--app-id <id>", "GitHub App ID (env: APP_ID, AppID)")
    .option(
      "--private-key <path>",
      "Path to the GitHub App private key PEM (env: PRIVATE_KEY, PemPath, PRIVATE_KEY_PATH)"
    )
    .option(
      "--installation-id <id>",
      "GitHub App installation ID (env: INSTALLATION_ID, InstallationID)"
    )
    .option("--enterprise <slug>", "Enterprise slug (env: ENTERPRISE)")
    .option("--org <login>", "Organization login (env: ORG)")
    .option("--api-base <url>", "GitHub REST API base URL (env: API_BASE)")
    .option(
      "--output <path>",
      "Where to write the report JSON (default: metrics-YYYY-MM-DD.json)"
    )
    .option(
      "--chart-output <path>",
      "Where to write the summary chart (default: pr-summary-YYYY-MM-DD.svg)"
    )
    .option(
      "--concurrency <n>",
      "Parallel shard downloads, 1-16 (env: SHARD_CONCURRENCY)"
    )
    .option(
      "--env-file <path>",
      "Dotenv file whose values take precedence over flags",
      DEFAULT_ENV_FILE
    )
    .exitOverride();
}

/** Parse user arguments (argv without the node binary and script path). */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const command = buildCommand();
  command.parse([...argv], { from: "user" });
  const { envFile, ...settings } = command.opts<CliOptions>();
  return { settings, envFile };
}
