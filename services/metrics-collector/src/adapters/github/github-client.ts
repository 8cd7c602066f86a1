// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/github/github-client`
 * Purpose: Octokit factory for the GitHub REST calls (token exchange, report manifest).
 * Scope: Creates configured @octokit/core instances. Single place to change GitHub client defaults.
 * Invariants:
 * - All GitHub API calls go through clients created by this factory.
 * - No retry or throttling plugins: every call is a single attempt.
 * - No client-level auth; each request carries its own bearer header.
 * Side-effects: none (factory only)
 * Links: ./token-exchanger.ts, ./report-locator.ts
 * @internal
 */

import { Octokit } from "@octokit/core";

import type { Logger } from "../../observability/logger.js";

export const DEFAULT_API_BASE = "https://api.github.com";
export const GITHUB_API_VERSION = "2022-11-28";
export const GITHUB_JSON_MEDIA_TYPE = "application/vnd.github+json";

export type GitHubClient = Octokit;

export interface GitHubClientOptions {
  readonly apiBase?: string;
  readonly logger?: Logger;
  /** Injected fetch (tests); defaults to the global */
  readonly fetch?: typeof fetch;
}

export function createGitHubClient(
  options: GitHubClientOptions = {}
): GitHubClient {
  const log = options.logger;
  return new Octokit({
    baseUrl: (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, ""),
    userAgent: "usage-metrics-collector",
    request: options.fetch ? { fetch: options.fetch } : {},
    ...(log && {
      log: {
        debug: (message: string) => log.debug(message),
        info: (message: string) => log.info(message),
        warn: (message: string) => log.warn(message),
        error: (message: string) => log.error(message),
      },
    }),
  });
}
