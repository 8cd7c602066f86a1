// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/aggregate`
 * Purpose: Merge per-day pull request counters across report shards into one ordered time series.
 * Scope: Pure aggregation over already-downloaded shards. Does not fetch or persist anything.
 * Invariants:
 * - Exactly one DailyAggregate per distinct day seen across all shards.
 * - Summation is commutative and associative: shard order and record order never change the result.
 * - Output is sorted ascending by the day string (lexical).
 * - Records with an empty or absent `day` are skipped; a numeric day is keyed by its string form.
 * - Missing or null counters contribute 0.
 * - A counter that is neither a number nor a numeric string is a ProtocolError.
 * Side-effects: none
 * Links: ./model.ts, ./chart-rows.ts
 * @public
 */

import { ProtocolError } from "./errors";
import { isRecord } from "./guards";
import {
  type DailyAggregate,
  PULL_REQUEST_COUNTERS,
  type PullRequestCounter,
  type PullRequestCounters,
  type RawReportShard,
  type TimeSeries,
} from "./model";

type CounterTotals = Record<PullRequestCounter, number>;

const SHARD_SOURCE = "report shard";
const INTEGER_STRING = /^\s*-?\d+\s*$/;

function emptyTotals(): CounterTotals {
  return {
    total_reviewed: 0,
    total_created: 0,
    total_created_by_copilot: 0,
    total_reviewed_by_copilot: 0,
  };
}

function toCount(
  value: unknown,
  day: string,
  counter: PullRequestCounter
): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && INTEGER_STRING.test(value)) {
    return Number.parseInt(value, 10);
  }
  throw new ProtocolError(
    SHARD_SOURCE,
    `day ${day}: ${counter} is not an integer`
  );
}

function addInto(
  totalsByDay: Map<string, CounterTotals>,
  day: string,
  counters: PullRequestCounters
): void {
  let bucket = totalsByDay.get(day);
  if (!bucket) {
    bucket = emptyTotals();
    totalsByDay.set(day, bucket);
  }
  for (const counter of PULL_REQUEST_COUNTERS) {
    bucket[counter] += counters[counter];
  }
}

function dayKey(value: unknown): string | null {
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (typeof value === "number" && Number.isFinite(value) && value !== 0) {
    return String(value);
  }
  return null;
}

function readDayRecord(
  record: unknown
): { day: string; counters: PullRequestCounters } | null {
  if (!isRecord(record)) return null;
  const day = dayKey(record.day);
  if (day === null) return null;

  const pullRequests = isRecord(record.pull_requests)
    ? record.pull_requests
    : {};
  const counters = emptyTotals();
  for (const counter of PULL_REQUEST_COUNTERS) {
    counters[counter] = toCount(pullRequests[counter], day, counter);
  }
  return { day, counters };
}

function project(totalsByDay: Map<string, CounterTotals>): TimeSeries {
  return [...totalsByDay.keys()].sort().map((day): DailyAggregate => {
    const totals = totalsByDay.get(day) ?? emptyTotals();
    return { day, ...totals };
  });
}

/**
 * Aggregate `day_totals[].pull_requests` across every shard.
 *
 * @example
 * buildPullRequestTimeSeries([
 *   { day_totals: [{ day: "2024-01-01", pull_requests: { total_reviewed: 5 } }] },
 *   { day_totals: [{ day: "2024-01-01", pull_requests: { total_reviewed: 2 } }] },
 * ])
 * // => [{ day: "2024-01-01", total_reviewed: 7, total_created: 0, ... }]
 */
export function buildPullRequestTimeSeries(
  shards: readonly RawReportShard[]
): TimeSeries {
  const totalsByDay = new Map<string, CounterTotals>();

  for (const shard of shards) {
    const dayTotals = shard.day_totals;
    if (!Array.isArray(dayTotals)) continue;

    for (const record of dayTotals) {
      const parsed = readDayRecord(record);
      if (parsed) addInto(totalsByDay, parsed.day, parsed.counters);
    }
  }

  return project(totalsByDay);
}

/**
 * Sum already-aggregated series day by day.
 * mergeTimeSeries(agg(A), agg(B)) equals agg([...A, ...B]).
 */
export function mergeTimeSeries(...series: readonly TimeSeries[]): TimeSeries {
  const totalsByDay = new Map<string, CounterTotals>();
  for (const entries of series) {
    for (const { day, ...counters } of entries) {
      addInto(totalsByDay, day, counters);
    }
  }
  return project(totalsByDay);
}
