// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/bootstrap/container`
 * Purpose: Composition root that wires concrete adapters to the core port interfaces.
 * Scope: All adapter construction lives here. Returns a container typed against ports.
 * Invariants:
 * - Only file that instantiates adapters; pipeline/ imports ports only.
 * - One Octokit client is shared by the token and manifest calls.
 * - `fetch` and `clock` overrides exist for tests; production uses the globals.
 * Side-effects: none (construction only)
 * Links: packages/metrics-core/src/ports.ts
 * @internal
 */

import type {
  AssertionMinter,
  ChartSink,
  Clock,
  ReportFetcher,
  ReportLocator,
  TokenExchanger,
} from "@usage-metrics/core";

import { VegaChartSink } from "../adapters/chart/vega-chart-sink.js";
import { JoseAssertionMinter } from "../adapters/github/assertion-minter.js";
import { createGitHubClient } from "../adapters/github/github-client.js";
import { GitHubReportLocator } from "../adapters/github/report-locator.js";
import { GitHubTokenExchanger } from "../adapters/github/token-exchanger.js";
import { HttpShardFetcher } from "../adapters/reports/shard-fetcher.js";
import { SystemClock } from "../adapters/time/system-clock.js";
import type { Logger } from "../observability/logger.js";
import type { CollectorSettings } from "./settings.js";

export interface CollectorContainer {
  clock: Clock;
  minter: AssertionMinter;
  exchanger: TokenExchanger;
  locator: ReportLocator;
  fetcher: ReportFetcher;
  chart: ChartSink;
  logger: Logger;
}

export interface ContainerOverrides {
  readonly fetch?: typeof fetch;
  readonly clock?: Clock;
}

export function createContainer(
  settings: Pick<CollectorSettings, "apiBase" | "concurrency">,
  logger: Logger,
  overrides: ContainerOverrides = {}
): CollectorContainer {
  const clock = overrides.clock ?? new SystemClock();
  const client = createGitHubClient({
    apiBase: settings.apiBase,
    logger: logger.child({ component: "octokit" }),
    ...(overrides.fetch && { fetch: overrides.fetch }),
  });

  return {
    clock,
    minter: new JoseAssertionMinter(clock),
    exchanger: new GitHubTokenExchanger(client),
    locator: new GitHubReportLocator(client),
    fetcher: new HttpShardFetcher({
      concurrency: settings.concurrency,
      logger: logger.child({ component: "shard-fetcher" }),
      ...(overrides.fetch && { fetch: overrides.fetch }),
    }),
    chart: new VegaChartSink(logger.child({ component: "chart" })),
    logger,
  };
}
