// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not format output.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no settings validation).
 * Side-effects: none until a log line is written
 * Notes: Use makeLogger for the CLI; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Notes: Reads logging-specific env vars directly (NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME) so logging works before settings resolve.
 * Links: REDACT_PATHS in ./redact
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

type Destination = ReturnType<typeof pino.destination>;

let destination: Destination | undefined;

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const pinoLogLevel = process.env.PINO_LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "metrics-collector";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: pinoLogLevel,
    enabled: !isTestTooling,
    // bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, app: "usage-metrics", service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  destination ??= pino.destination({
    dest: 1,
    sync: nodeEnv !== "production",
    minLength: 4096,
  });

  return pino(config, destination);
}

/** Flush buffered lines before process.exit (async destination in production). */
export function flushLogger(): void {
  destination?.flushSync();
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
