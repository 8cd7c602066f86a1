// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/output/report-writer`
 * Purpose: Persist the manifest and raw shards as one JSON document, and name dated output files.
 * Scope: File output only. Chart rendering lives in adapters/chart.
 * Invariants:
 * - Document shape is `{ report_links, reports }`; shards are written untouched, in manifest order.
 * - Default file names carry the UTC date of the run.
 * Side-effects: IO (writes the output file)
 * @internal
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type {
  Clock,
  RawReportShard,
  ReportManifest,
  UsageReportPayload,
} from "@usage-metrics/core";

/** UTC calendar date of the clock reading, YYYY-MM-DD. */
export function runDate(clock: Clock): string {
  return new Date(clock.now()).toISOString().slice(0, 10);
}

export function defaultReportPath(clock: Clock): string {
  return `metrics-${runDate(clock)}.json`;
}

export function defaultChartPath(clock: Clock): string {
  return `pr-summary-${runDate(clock)}.svg`;
}

export function buildReportPayload(
  manifest: ReportManifest,
  shards: readonly RawReportShard[]
): UsageReportPayload {
  return { report_links: manifest, reports: shards };
}

export function serializeReport(payload: UsageReportPayload): string {
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export async function writeReport(
  outputPath: string,
  payload: UsageReportPayload
): Promise<void> {
  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await writeFile(outputPath, serializeReport(payload), "utf-8");
}
