// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core`
 * Purpose: Pure domain types, ports, errors, and aggregation for the usage-report pipeline.
 * Scope: Does not contain adapter deps, I/O, or framework code.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: only types + pure functions here. Implementations in services/.
 * - No imports from services/. Pure domain package.
 * Side-effects: none
 * Links: ./ports.ts, ./aggregate.ts
 * @public
 */

export { buildPullRequestTimeSeries, mergeTimeSeries } from "./aggregate";
export {
  ASSERTION_BACKDATE_SECONDS,
  ASSERTION_LIFETIME_SECONDS,
  type AssertionClaims,
  buildAssertionClaims,
  epochSeconds,
} from "./assertion";
export { type ChartRow, toChartRows } from "./chart-rows";
export {
  AuthExchangeError,
  ConfigError,
  CredentialError,
  isAuthExchangeError,
  isConfigError,
  isCredentialError,
  isNoDataError,
  isProtocolError,
  isShardFetchError,
  isTransportError,
  isUsageMetricsError,
  NoDataError,
  ProtocolError,
  ShardFetchError,
  TransportError,
  type UsageMetricsError,
  type UsageMetricsErrorCode,
} from "./errors";
export { isRecord } from "./guards";
export type {
  AccessToken,
  DailyAggregate,
  Identity,
  PullRequestCounter,
  PullRequestCounters,
  RawReportShard,
  ReportManifest,
  ReportScope,
  SignedAssertion,
  TimeSeries,
  UsageReportPayload,
} from "./model";
export { PULL_REQUEST_COUNTERS } from "./model";
export type {
  AssertionMinter,
  ChartSink,
  Clock,
  ReportFetcher,
  ReportLocator,
  TokenExchanger,
} from "./ports";
