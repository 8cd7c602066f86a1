// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/github/token-exchanger`
 * Purpose: Trade the App assertion for an installation access token.
 * Scope: Implements TokenExchanger. One POST, no caching, no retry.
 * Invariants:
 * - Bearer = assertion; versioned JSON media type requested.
 * - `token` is returned verbatim; a missing/empty token is a ProtocolError.
 * - Bounded by AUTH_REQUEST_TIMEOUT_MS.
 * Side-effects: HTTP (GitHub REST API)
 * Links: ./github-request.ts
 * @internal
 */

import {
  type AccessToken,
  ProtocolError,
  type SignedAssertion,
  type TokenExchanger,
} from "@usage-metrics/core";
import { z } from "zod";

import type { GitHubClient } from "./github-client.js";
import {
  AUTH_REQUEST_TIMEOUT_MS,
  bearerHeaders,
  callGitHub,
  describeIssues,
} from "./github-request.js";

const TOKEN_ROUTE = "POST /app/installations/{installation_id}/access_tokens";

const TokenResponseSchema = z.object({
  token: z.string().min(1, "token must be a non-empty string"),
});

export interface TokenExchangerOptions {
  readonly timeoutMs?: number;
}

export class GitHubTokenExchanger implements TokenExchanger {
  private readonly timeoutMs: number;

  constructor(
    private readonly client: GitHubClient,
    options: TokenExchangerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? AUTH_REQUEST_TIMEOUT_MS;
  }

  async exchange(
    assertion: SignedAssertion,
    installationId: number
  ): Promise<AccessToken> {
    const data = await callGitHub(TOKEN_ROUTE, this.timeoutMs, (signal) =>
      this.client.request(TOKEN_ROUTE, {
        installation_id: installationId,
        headers: bearerHeaders(assertion.token),
        request: { signal },
      })
    );

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError(TOKEN_ROUTE, describeIssues(parsed.error));
    }
    return { token: parsed.data.token };
  }
}
