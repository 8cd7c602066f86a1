// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/reports/shard-fetcher`
 * Purpose: Download every report shard a manifest links to.
 * Scope: Implements ReportFetcher over fetch. Links are pre-signed; no auth header is sent.
 * Invariants:
 * - Empty manifest resolves to [] without any request.
 * - Result order == manifest order, whatever order downloads complete in.
 * - All-or-nothing: the first failure rejects with ShardFetchError and aborts in-flight siblings.
 * - Each download is bounded by its own timeout (longer than the auth calls).
 * - Signed query strings never reach logs or errors (describeLink).
 * Side-effects: HTTP (pre-signed report URLs)
 * @internal
 */

import {
  isRecord,
  type RawReportShard,
  type ReportFetcher,
  type ReportManifest,
  ShardFetchError,
} from "@usage-metrics/core";

import type { Logger } from "../../observability/logger.js";
import { GITHUB_API_VERSION } from "../github/github-client.js";

export const SHARD_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_SHARD_CONCURRENCY = 4;

export interface ShardFetcherOptions {
  readonly timeoutMs?: number;
  readonly concurrency?: number;
  readonly logger?: Logger;
  /** Injected fetch (tests); defaults to the global */
  readonly fetch?: typeof fetch;
}

/** Origin + path of a signed link; the query string carries the signature. */
export function describeLink(link: string): string {
  try {
    const url = new URL(link);
    return `${url.origin}${url.pathname}`;
  } catch {
    return "<invalid link>";
  }
}

export class HttpShardFetcher implements ReportFetcher {
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger | undefined;

  constructor(options: ShardFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? SHARD_REQUEST_TIMEOUT_MS;
    this.concurrency = Math.max(
      1,
      Math.floor(options.concurrency ?? DEFAULT_SHARD_CONCURRENCY)
    );
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  async fetchAll(manifest: ReportManifest): Promise<RawReportShard[]> {
    const links = manifest.download_links;
    if (links.length === 0) {
      this.logger?.info("Manifest lists no report shards");
      return [];
    }

    const shards: RawReportShard[] = new Array(links.length);
    const pending = links.entries();
    const abort = new AbortController();

    // Workers share one iterator, so each link is taken exactly once.
    const worker = async (): Promise<void> => {
      for (const [index, link] of pending) {
        if (abort.signal.aborted) return;
        shards[index] = await this.fetchShard(link, index, abort.signal);
      }
    };

    const workerCount = Math.min(this.concurrency, links.length);
    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } catch (error) {
      abort.abort();
      throw error;
    }

    this.logger?.info({ shards: shards.length }, "Report shards downloaded");
    return shards;
  }

  private async fetchShard(
    link: string,
    index: number,
    abortSignal: AbortSignal
  ): Promise<RawReportShard> {
    const label = describeLink(link);
    const signal = AbortSignal.any([
      abortSignal,
      AbortSignal.timeout(this.timeoutMs),
    ]);

    let response: Response;
    try {
      response = await this.fetchImpl(link, {
        method: "GET",
        headers: {
          accept: "application/json",
          "x-github-api-version": GITHUB_API_VERSION,
        },
        signal,
      });
    } catch (error) {
      throw new ShardFetchError(
        index,
        label,
        this.describeFailure(error),
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ShardFetchError(
        index,
        label,
        `HTTP ${response.status}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ShardFetchError(
        index,
        label,
        this.describeFailure(error),
        response.status,
        { cause: error }
      );
    }
    if (!isRecord(body)) {
      throw new ShardFetchError(
        index,
        label,
        "body is not a JSON object",
        response.status
      );
    }

    this.logger?.debug({ shard: index + 1, link: label }, "Shard downloaded");
    return body;
  }

  private describeFailure(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    switch (error.name) {
      case "TimeoutError":
        return `timed out after ${this.timeoutMs}ms`;
      case "AbortError":
        return "aborted after another shard failed";
      case "SyntaxError":
        return "body is not valid JSON";
      default:
        return error.message;
    }
  }
}
