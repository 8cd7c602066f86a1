// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup.
 * Scope: Pins env vars that change logger and settings behavior. Does NOT mock ports or HTTP.
 * Invariants: Unit tests never see the developer's real App credentials from the shell.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { beforeAll } from "vitest";

const CREDENTIAL_KEYS = [
  "APP_ID",
  "AppID",
  "PRIVATE_KEY",
  "PemPath",
  "PRIVATE_KEY_PATH",
  "INSTALLATION_ID",
  "InstallationID",
  "ENTERPRISE",
  "ORG",
  "API_BASE",
  "OUTPUT",
  "CHART_OUTPUT",
  "SHARD_CONCURRENCY",
];

beforeAll(() => {
  process.env.NODE_ENV = "test";
  for (const key of CREDENTIAL_KEYS) {
    delete process.env[key];
  }
});
