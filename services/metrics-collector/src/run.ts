// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/run`
 * Purpose: One collector run: resolve settings, collect the report, write JSON, render the chart.
 * Scope: Everything main does except process exit handling, so tests can drive a full run.
 * Invariants:
 * - Settings and the PEM file are validated before any network call.
 * - The JSON document is written before the chart; an empty series still leaves the JSON on disk.
 * Side-effects: IO (env file, PEM file, output files), HTTP (via the container)
 * Links: ./main.ts, ./pipeline/collect-usage-report.ts
 * @public
 */

import { readFile } from "node:fs/promises";

import { ConfigError } from "@usage-metrics/core";

import {
  type ContainerOverrides,
  createContainer,
} from "./bootstrap/container.js";
import { loadEnvFile } from "./bootstrap/env-file.js";
import { resolveSettings } from "./bootstrap/settings.js";
import type { CliArgs } from "./cli.js";
import type { Logger } from "./observability/logger.js";
import {
  buildReportPayload,
  defaultChartPath,
  defaultReportPath,
  writeReport,
} from "./output/report-writer.js";
import { collectUsageReport } from "./pipeline/collect-usage-report.js";

export interface RunOptions {
  readonly logger: Logger;
  /** Process environment to resolve against; defaults to process.env */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly overrides?: ContainerOverrides;
}

export interface RunSummary {
  readonly reportPath: string;
  readonly chartPath: string;
  readonly shards: number;
  readonly days: number;
}

export async function readPrivateKey(keyPath: string): Promise<string> {
  try {
    return await readFile(keyPath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Cannot read private key file ${keyPath}: ${reason}`,
      ["--private-key"],
      { cause: error }
    );
  }
}

export async function runCollector(
  args: CliArgs,
  options: RunOptions
): Promise<RunSummary> {
  const { logger } = options;
  const settings = resolveSettings({
    cli: args.settings,
    envFile: loadEnvFile(args.envFile),
    envFileName: args.envFile,
    ...(options.env && { env: options.env }),
  });
  logger.debug({ origins: settings.origins }, "Settings resolved");

  const privateKey = await readPrivateKey(settings.privateKeyPath);
  const container = createContainer(settings, logger, options.overrides);

  const { manifest, shards, series } = await collectUsageReport(container, {
    identity: { appId: settings.appId, privateKey },
    installationId: settings.installationId,
    scope: settings.scope,
  });

  const reportPath = settings.output ?? defaultReportPath(container.clock);
  await writeReport(reportPath, buildReportPayload(manifest, shards));
  logger.info({ reportPath, shards: shards.length }, "Report JSON written");

  const chartPath = settings.chartOutput ?? defaultChartPath(container.clock);
  await container.chart.render(series, chartPath);

  return { reportPath, chartPath, shards: shards.length, days: series.length };
}
