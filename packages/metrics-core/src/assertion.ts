// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/assertion`
 * Purpose: Claim set for the GitHub App assertion (iat/exp/iss) derived from an injected clock.
 * Scope: Pure arithmetic. Signing lives in the collector's assertion-minter adapter.
 * Invariants:
 * - exp - iat == ASSERTION_LIFETIME_SECONDS (600), never more.
 * - iat == now - ASSERTION_BACKDATE_SECONDS, so exp == now + 540.
 * - Claims contain exactly iat, exp, iss.
 * Side-effects: none
 * @public
 */

import type { Clock } from "./ports";

export const ASSERTION_BACKDATE_SECONDS = 60;
export const ASSERTION_LIFETIME_SECONDS = 600;

export interface AssertionClaims {
  readonly iat: number;
  readonly exp: number;
  readonly iss: string;
}

export function buildAssertionClaims(
  appId: string,
  nowSeconds: number
): AssertionClaims {
  const iat = nowSeconds - ASSERTION_BACKDATE_SECONDS;
  return {
    iat,
    exp: iat + ASSERTION_LIFETIME_SECONDS,
    iss: appId,
  };
}

/** Whole epoch seconds for the clock's current instant (floored). */
export function epochSeconds(clock: Clock): number {
  return Math.floor(Date.parse(clock.now()) / 1000);
}
