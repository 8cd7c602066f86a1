// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/pipeline/collect-usage-report`
 * Purpose: Run the credential chain and report download end to end: assertion → token → manifest → shards → series.
 * Scope: Orchestration over ports only. Does not write files or render charts (see ../main.ts).
 * Invariants:
 * - Stages run strictly in order; a failing stage stops the run with its own typed error.
 * - Nothing after a failed token exchange is attempted.
 * - Returned shards keep manifest order; the series is ascending by day.
 * Side-effects: HTTP (through the injected ports)
 * Links: ../bootstrap/container.ts
 * @public
 */

import {
  type AssertionMinter,
  buildPullRequestTimeSeries,
  type Identity,
  type RawReportShard,
  type ReportFetcher,
  type ReportLocator,
  type ReportManifest,
  type ReportScope,
  type TimeSeries,
  type TokenExchanger,
} from "@usage-metrics/core";

import type { Logger } from "../observability/logger.js";

export interface CollectDeps {
  readonly minter: AssertionMinter;
  readonly exchanger: TokenExchanger;
  readonly locator: ReportLocator;
  readonly fetcher: ReportFetcher;
  readonly logger: Logger;
}

export interface CollectRequest {
  readonly identity: Identity;
  readonly installationId: number;
  readonly scope: ReportScope;
}

export interface CollectResult {
  readonly manifest: ReportManifest;
  readonly shards: RawReportShard[];
  readonly series: TimeSeries;
}

export async function collectUsageReport(
  deps: CollectDeps,
  request: CollectRequest
): Promise<CollectResult> {
  const { logger } = deps;
  const { scope } = request;

  logger.info({ appId: request.identity.appId }, "Signing app assertion");
  const assertion = await deps.minter.mint(request.identity);

  logger.info(
    { installationId: request.installationId },
    "Exchanging assertion for installation token"
  );
  const token = await deps.exchanger.exchange(
    assertion,
    request.installationId
  );

  logger.info(
    { scope: scope.kind, slug: scope.slug },
    "Fetching usage report manifest"
  );
  const manifest = await deps.locator.locate(token, scope);

  logger.info(
    { shards: manifest.download_links.length },
    "Downloading report shards"
  );
  const shards = await deps.fetcher.fetchAll(manifest);

  const series = buildPullRequestTimeSeries(shards);
  logger.info(
    {
      days: series.length,
      firstDay: series[0]?.day,
      lastDay: series.at(-1)?.day,
    },
    "Pull request series aggregated"
  );

  return { manifest, shards, series };
}
