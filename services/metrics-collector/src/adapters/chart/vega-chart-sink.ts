// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/chart/vega-chart-sink`
 * Purpose: ChartSink that renders the pull request summary to an SVG file.
 * Scope: Compiles the Vega-Lite spec, renders headless (no canvas), writes the SVG.
 * Invariants:
 * - Empty series → NoDataError from toChartRows, and nothing is written.
 * - The view is finalized after rendering.
 * Side-effects: IO (writes outputPath)
 * Links: ./summary-chart-spec.ts
 * @internal
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  type ChartSink,
  type TimeSeries,
  toChartRows,
} from "@usage-metrics/core";
import { parse, View } from "vega";
import { compile } from "vega-lite";

import type { Logger } from "../../observability/logger.js";
import { buildSummaryChartSpec } from "./summary-chart-spec.js";

export async function renderSummarySvg(series: TimeSeries): Promise<string> {
  const spec = buildSummaryChartSpec(toChartRows(series));
  const view = new View(parse(compile(spec).spec), { renderer: "none" });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export class VegaChartSink implements ChartSink {
  constructor(private readonly logger?: Logger) {}

  async render(series: TimeSeries, outputPath: string): Promise<void> {
    const svg = await renderSummarySvg(series);
    await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    await writeFile(outputPath, svg, "utf-8");
    this.logger?.info(
      { outputPath, days: series.length },
      "Pull request summary chart written"
    );
  }
}
