// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url"; shard links are stripped before logging).
 * Side-effects: none
 * Links: Imported by logger module.
 * @internal
 */

export const REDACT_PATHS = [
  // Tokens & assertions
  "token",
  "access_token",
  "accessToken",
  "assertion",
  "jwt",
  // Key material
  "privateKey",
  "private_key",
  "identity.privateKey",
  // HTTP headers
  "headers.authorization",
  "request.headers.authorization",
  "err.request.headers.authorization",
];
