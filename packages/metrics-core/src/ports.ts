// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/ports`
 * Purpose: Port interfaces for each stage of the credential-exchange and report pipeline.
 * Scope: Pure interfaces. Implementations live in services/metrics-collector/src/adapters/.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: no HTTP, crypto, or rendering deps in this package.
 * - Each stage consumes the previous stage's output only; no shared mutable state.
 * Side-effects: none
 * Links: services/metrics-collector/src/bootstrap/container.ts
 * @public
 */

import type {
  AccessToken,
  Identity,
  RawReportShard,
  ReportManifest,
  ReportScope,
  SignedAssertion,
  TimeSeries,
} from "./model";

/** Time abstraction so assertion windows are testable. */
export interface Clock {
  /** Current time as an ISO 8601 string */
  now(): string;
}

export interface AssertionMinter {
  /** @throws CredentialError when the key is malformed or unsupported */
  mint(identity: Identity): Promise<SignedAssertion>;
}

export interface TokenExchanger {
  exchange(
    assertion: SignedAssertion,
    installationId: number
  ): Promise<AccessToken>;
}

export interface ReportLocator {
  locate(token: AccessToken, scope: ReportScope): Promise<ReportManifest>;
}

export interface ReportFetcher {
  /** Shards in manifest order. Empty manifest resolves to [] without any request. */
  fetchAll(manifest: ReportManifest): Promise<RawReportShard[]>;
}

export interface ChartSink {
  /** @throws NoDataError for an empty series; nothing is written in that case */
  render(series: TimeSeries, outputPath: string): Promise<void>;
}
