// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/model`
 * Purpose: Domain types for the credential-exchange chain and usage-report aggregation.
 * Scope: Pure types and constants. Does not contain I/O, business logic, or adapter deps.
 * Invariants:
 * - DailyAggregate and the JSON output keep the report's snake_case field names.
 * - TimeSeries is ascending by day (lexical order == chronological for ISO dates).
 * - Identity private key material is never persisted or logged.
 * Side-effects: none
 * Links: ./ports.ts
 * @public
 */

/** GitHub App identity. Supplied by the caller, immutable. */
export interface Identity {
  readonly appId: string;
  /** PEM-encoded private key material */
  readonly privateKey: string;
}

/** Short-lived signed JWT proving the App identity. Single use. */
export interface SignedAssertion {
  readonly token: string;
  /** Epoch seconds, backdated for clock skew */
  readonly issuedAt: number;
  /** Epoch seconds */
  readonly expiresAt: number;
  readonly issuer: string;
}

/** Installation access token. Lifetime is server-side only. */
export interface AccessToken {
  readonly token: string;
}

/** Which report family the locator asks for. */
export type ReportScope =
  | { readonly kind: "enterprise"; readonly slug: string }
  | { readonly kind: "organization"; readonly slug: string };

/**
 * Manifest returned by the "latest report" endpoint.
 * Extra fields (report_start_day, report_end_day, ...) pass through untouched.
 */
export interface ReportManifest {
  readonly download_links: readonly string[];
  readonly [field: string]: unknown;
}

/** One downloaded report shard. Opaque apart from `day_totals`. */
export type RawReportShard = Readonly<Record<string, unknown>>;

export const PULL_REQUEST_COUNTERS = [
  "total_reviewed",
  "total_created",
  "total_created_by_copilot",
  "total_reviewed_by_copilot",
] as const;

export type PullRequestCounter = (typeof PULL_REQUEST_COUNTERS)[number];

export type PullRequestCounters = Readonly<Record<PullRequestCounter, number>>;

export interface DailyAggregate extends PullRequestCounters {
  readonly day: string;
}

export type TimeSeries = readonly DailyAggregate[];

/** Document handed to the persistence layer. */
export interface UsageReportPayload {
  readonly report_links: ReportManifest;
  readonly reports: readonly RawReportShard[];
}
