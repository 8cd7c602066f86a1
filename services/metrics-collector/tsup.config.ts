// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/tsup.config`
 * Purpose: Build configuration for the collector CLI.
 * Scope: Defines tsup bundler settings for the `usage-metrics` bin. Does not contain runtime code.
 * Invariants: ESM format only; the workspace core package is bundled in, npm deps stay external.
 * Side-effects: none
 * Links: services/metrics-collector/src/main.ts
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: [/^@usage-metrics\//],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
