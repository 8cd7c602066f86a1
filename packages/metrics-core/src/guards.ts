// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/guards`
 * Purpose: Narrowing helpers for untyped JSON coming off the wire.
 * Scope: Pure type guards. Does not validate domain rules.
 * Side-effects: none
 * @public
 */

/** Plain JSON object (not null, not an array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
