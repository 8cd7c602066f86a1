// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/github/report-locator`
 * Purpose: Fetch the "latest" Copilot usage-report manifest for an enterprise or organization.
 * Scope: Implements ReportLocator. One GET, bearer = installation token.
 * Invariants:
 * - Reporting period is the REPORT_PERIOD constant, never derived.
 * - Absent or null `download_links` is an empty manifest, not an error.
 * - Every other manifest field passes through untouched.
 * Side-effects: HTTP (GitHub REST API)
 * Links: ./github-request.ts
 * @internal
 */

import {
  type AccessToken,
  ProtocolError,
  type ReportLocator,
  type ReportManifest,
  type ReportScope,
} from "@usage-metrics/core";
import { z } from "zod";

import type { GitHubClient } from "./github-client.js";
import {
  AUTH_REQUEST_TIMEOUT_MS,
  bearerHeaders,
  callGitHub,
  describeIssues,
} from "./github-request.js";

export const REPORT_PERIOD = "28-day";

const ManifestSchema = z
  .object({
    download_links: z.array(z.string().url()).nullish(),
  })
  .passthrough();

interface ManifestRoute {
  readonly route: string;
  readonly params: Record<string, string>;
  /** Route with parameters filled in, for logs and errors */
  readonly label: string;
}

export function manifestRouteFor(scope: ReportScope): ManifestRoute {
  if (scope.kind === "enterprise") {
    const report = `enterprise-${REPORT_PERIOD}`;
    return {
      route: "GET /enterprises/{enterprise}/copilot/metrics/reports/{report}/latest",
      params: { enterprise: scope.slug, report },
      label: `GET /enterprises/${scope.slug}/copilot/metrics/reports/${report}/latest`,
    };
  }
  const report = `organization-${REPORT_PERIOD}`;
  return {
    route: "GET /orgs/{org}/copilot/metrics/reports/{report}/latest",
    params: { org: scope.slug, report },
    label: `GET /orgs/${scope.slug}/copilot/metrics/reports/${report}/latest`,
  };
}

export interface ReportLocatorOptions {
  readonly timeoutMs?: number;
}

export class GitHubReportLocator implements ReportLocator {
  private readonly timeoutMs: number;

  constructor(
    private readonly client: GitHubClient,
    options: ReportLocatorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? AUTH_REQUEST_TIMEOUT_MS;
  }

  async locate(
    token: AccessToken,
    scope: ReportScope
  ): Promise<ReportManifest> {
    const { route, params, label } = manifestRouteFor(scope);
    const data = await callGitHub(label, this.timeoutMs, (signal) =>
      this.client.request(route, {
        ...params,
        headers: bearerHeaders(token.token),
        request: { signal },
      })
    );

    const parsed = ManifestSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError(label, describeIssues(parsed.error));
    }
    return {
      ...parsed.data,
      download_links: parsed.data.download_links ?? [],
    };
  }
}
