// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/chart/summary-chart-spec`
 * Purpose: Vega-Lite spec for the pull request summary: review panel over creation panel.
 * Scope: Pure spec construction from ChartRow[]. Rendering lives in ./vega-chart-sink.ts.
 * Invariants:
 * - Two grouped bar panels (Human vs Copilot) share one day axis, in series order.
 * - Data is long-format: one value per (day, panel, series).
 * Side-effects: none
 * @internal
 */

import type { ChartRow } from "@usage-metrics/core";
import type { TopLevelSpec } from "vega-lite";

export const HUMAN_SERIES = "Human";
export const REVIEW_SERIES = "CCR";
export const CREATION_SERIES = "CCA";

const HUMAN_COLOR = "#1f77b4";
const COPILOT_COLOR = "#ff7f0e";

export interface ChartDatum {
  readonly day: string;
  readonly panel: "review" | "creation";
  readonly series: string;
  readonly count: number;
}

export function toChartData(rows: readonly ChartRow[]): ChartDatum[] {
  return rows.flatMap((row): ChartDatum[] => [
    { day: row.day, panel: "review", series: HUMAN_SERIES, count: row.reviewedByHuman },
    { day: row.day, panel: "review", series: REVIEW_SERIES, count: row.reviewedByCopilot },
    { day: row.day, panel: "creation", series: HUMAN_SERIES, count: row.createdByHuman },
    { day: row.day, panel: "creation", series: CREATION_SERIES, count: row.createdByCopilot },
  ]);
}

export function buildSummaryChartSpec(rows: readonly ChartRow[]): TopLevelSpec {
  const days = rows.map((row) => row.day);

  return {
    $schema: "https://vega.github.io/schema/vega-lite/v5.json",
    data: { values: toChartData(rows) },
    vconcat: [
      {
        title: "CCR Summary",
        width: 900,
        height: 260,
        transform: [{ filter: { field: "panel", equal: "review" } }],
        mark: { type: "bar" },
        encoding: {
          x: {
            field: "day",
            type: "ordinal",
            sort: days,
            title: null,
            axis: { labels: false, ticks: false },
          },
          xOffset: {
            field: "series",
            type: "nominal",
            sort: [HUMAN_SERIES, REVIEW_SERIES],
          },
          y: {
            field: "count",
            type: "quantitative",
            title: "PRs",
            axis: { gridOpacity: 0.3 },
          },
          color: {
            field: "series",
            type: "nominal",
            scale: {
              domain: [HUMAN_SERIES, REVIEW_SERIES],
              range: [HUMAN_COLOR, COPILOT_COLOR],
            },
            legend: { orient: "top-left", title: null },
          },
        },
      },
      {
        title: "CCA Summary",
        width: 900,
        height: 260,
        transform: [{ filter: { field: "panel", equal: "creation" } }],
        mark: { type: "bar" },
        encoding: {
          x: {
            field: "day",
            type: "ordinal",
            sort: days,
            title: null,
            axis: { labelAngle: -45, labelAlign: "right" },
          },
          xOffset: {
            field: "series",
            type: "nominal",
            sort: [HUMAN_SERIES, CREATION_SERIES],
          },
          y: {
            field: "count",
            type: "quantitative",
            title: "PRs",
            axis: { gridOpacity: 0.3 },
          },
          color: {
            field: "series",
            type: "nominal",
            scale: {
              domain: [HUMAN_SERIES, CREATION_SERIES],
              range: [HUMAN_COLOR, COPILOT_COLOR],
            },
            legend: { orient: "top-left", title: null },
          },
        },
      },
    ],
    resolve: { scale: { x: "shared", color: "independent" } },
  };
}
