// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/bootstrap/env-file`
 * Purpose: Read a dotenv-style settings file without touching process.env.
 * Scope: Parsing only; precedence is decided in ./settings.ts.
 * Invariants: A missing file yields `null` (the source is skipped), never an error.
 * Side-effects: IO (reads the file)
 * @internal
 */

import { existsSync, readFileSync } from "node:fs";

import { parse } from "dotenv";

export const DEFAULT_ENV_FILE = "test.env";

export function loadEnvFile(
  envPath: string = DEFAULT_ENV_FILE
): Record<string, string> | null {
  if (!existsSync(envPath)) return null;
  return parse(readFileSync(envPath, "utf-8"));
}
