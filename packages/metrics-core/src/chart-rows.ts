// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/chart-rows`
 * Purpose: Split each day's totals into human vs Copilot contributions for the summary chart.
 * Scope: Pure projection consumed by ChartSink adapters. Does not render anything.
 * Invariants:
 * - An empty series is rejected with NoDataError (never a blank chart).
 * - Human counts are max(total - copilot, 0); never negative.
 * Side-effects: none
 * @public
 */

import { NoDataError } from "./errors";
import type { TimeSeries } from "./model";

export interface ChartRow {
  readonly day: string;
  readonly reviewedByHuman: number;
  /** Copilot code review (CCR) */
  readonly reviewedByCopilot: number;
  readonly createdByHuman: number;
  /** Copilot coding agent (CCA) */
  readonly createdByCopilot: number;
}

export function toChartRows(series: TimeSeries): ChartRow[] {
  if (series.length === 0) {
    throw new NoDataError();
  }
  return series.map((entry) => ({
    day: entry.day,
    reviewedByHuman: Math.max(
      entry.total_reviewed - entry.total_reviewed_by_copilot,
      0
    ),
    reviewedByCopilot: entry.total_reviewed_by_copilot,
    createdByHuman: Math.max(
      entry.total_created - entry.total_created_by_copilot,
      0
    ),
    createdByCopilot: entry.total_created_by_copilot,
  }));
}
