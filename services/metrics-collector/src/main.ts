#!/usr/bin/env node
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/main`
 * Purpose: CLI entry point. Parses argv, runs the collector, maps failures to exit codes.
 * Scope: Process concerns only (argv, exit code, logger flush). Business logic lives in ./run.ts.
 * Invariants:
 *   - Exit 0 on success, 1 on any failure, commander's own code for --help/usage errors
 *   - Failures are logged once at fatal with their domain error code
 * Side-effects: IO (process exit)
 * Links: ./run.ts
 * @public
 */

import {
  isUsageMetricsError,
  type UsageMetricsErrorCode,
} from "@usage-metrics/core";
import { CommanderError } from "commander";

import { parseCliArgs } from "./cli.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { runCollector } from "./run.js";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  // Composition root owns logger creation
  const logger = makeLogger();

  const summary = await runCollector(args, { logger });
  logger.info(summary, "Collection complete");
  flushLogger();
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // commander already printed help or the usage error
    process.exit(err.exitCode);
  }
  const errorCode: UsageMetricsErrorCode | "UNEXPECTED" =
    isUsageMetricsError(err) ? err.code : "UNEXPECTED";
  bootLogger.fatal({ err, errorCode }, "Usage report collection failed");
  flushLogger();
  process.exit(1);
});
