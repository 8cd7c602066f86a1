// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/tests/chart.test`
 * Purpose: Unit tests for the pull request summary chart spec and SVG rendering.
 * Scope: Renders headless with vega into a temp directory.
 * @internal
 */

import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { type DailyAggregate, NoDataError, toChartRows } from "@usage-metrics/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  buildSummaryChartSpec,
  toChartData,
} from "../src/adapters/chart/summary-chart-spec";
import {
  renderSummarySvg,
  VegaChartSink,
} from "../src/adapters/chart/vega-chart-sink";

const SERIES: DailyAggregate[] = [
  {
    day: "2024-01-01",
    total_reviewed: 7,
    total_created: 3,
    total_created_by_copilot: 1,
    total_reviewed_by_copilot: 3,
  },
  {
    day: "2024-01-02",
    total_reviewed: 2,
    total_created: 4,
    total_created_by_copilot: 4,
    total_reviewed_by_copilot: 0,
  },
];

describe("toChartData", () => {
  it("emits one value per day, panel and series", () => {
    expect(toChartData(toChartRows(SERIES.slice(0, 1)))).toEqual([
      { day: "2024-01-01", panel: "review", series: "Human", count: 4 },
      { day: "2024-01-01", panel: "review", series: "CCR", count: 3 },
      { day: "2024-01-01", panel: "creation", series: "Human", count: 2 },
      { day: "2024-01-01", panel: "creation", series: "CCA", count: 1 },
    ]);
  });
});

describe("buildSummaryChartSpec", () => {
  it("stacks the review panel over the creation panel on one day axis", () => {
    const spec = buildSummaryChartSpec(toChartRows(SERIES));

    expect(spec).toMatchObject({
      vconcat: [
        {
          title: "CCR Summary",
          transform: [{ filter: { field: "panel", equal: "review" } }],
          encoding: { x: { sort: ["2024-01-01", "2024-01-02"] } },
        },
        {
          title: "CCA Summary",
          transform: [{ filter: { field: "panel", equal: "creation" } }],
          encoding: { x: { sort: ["2024-01-01", "2024-01-02"] } },
        },
      ],
      resolve: { scale: { x: "shared", color: "independent" } },
    });
  });
});

describe("VegaChartSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "usage-metrics-chart-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("renders both panel titles into an SVG document", async () => {
    const svg = await renderSummarySvg(SERIES);

    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain(">CCR Summary</text>");
    expect(svg).toContain(">CCA Summary</text>");
  });

  it("writes the SVG, creating missing directories", async () => {
    const outputPath = path.join(dir, "charts", "pr-summary.svg");

    await new VegaChartSink().render(SERIES, outputPath);

    const written = await readFile(outputPath, "utf-8");
    expect(written.startsWith("<svg")).toBe(true);
  });

  it("refuses an empty series and writes nothing", async () => {
    const outputPath = path.join(dir, "pr-summary.svg");

    await expect(new VegaChartSink().render([], outputPath)).rejects.toThrow(
      NoDataError
    );
    expect(existsSync(outputPath)).toBe(false);
  });
});
