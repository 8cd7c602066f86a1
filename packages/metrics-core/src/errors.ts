// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/core/errors`
 * Purpose: Domain error classes for the usage-report pipeline.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants:
 * - All errors have a readonly `code` discriminant for type guards.
 * - Every error is fatal for the run; nothing here is retried.
 * - Error messages never include tokens, assertions, or key material.
 * Side-effects: none
 * Links: services/metrics-collector/src/main.ts
 * @public
 */

/** Missing or invalid settings. Raised before any network call. */
export class ConfigError extends Error {
  public readonly code = "CONFIG_INVALID" as const;
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Private key could not be parsed or used for signing. */
export class CredentialError extends Error {
  public readonly code = "CREDENTIAL_INVALID" as const;
  constructor(
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot sign app assertion: ${reason}`, options);
    this.name = "CredentialError";
  }
}

/** Non-2xx response from the token-exchange or manifest endpoint. */
export class AuthExchangeError extends Error {
  public readonly code = "AUTH_EXCHANGE_FAILED" as const;
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${endpoint} responded with HTTP ${status}: ${body}`);
    this.name = "AuthExchangeError";
  }
}

/** A trusted endpoint answered with an unexpected shape. */
export class ProtocolError extends Error {
  public readonly code = "PROTOCOL_VIOLATION" as const;
  constructor(
    public readonly endpoint: string,
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(`Unexpected response from ${endpoint}: ${detail}`, options);
    this.name = "ProtocolError";
  }
}

/** An auth or manifest request produced no response at all (timeout, DNS, reset). */
export class TransportError extends Error {
  public readonly code = "TRANSPORT_FAILED" as const;
  constructor(
    public readonly endpoint: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Request to ${endpoint} failed: ${reason}`, options);
    this.name = "TransportError";
  }
}

/** Any shard download failure. Aborts aggregation entirely. */
export class ShardFetchError extends Error {
  public readonly code = "SHARD_FETCH_FAILED" as const;
  constructor(
    public readonly shardIndex: number,
    /** Link without its signed query string */
    public readonly link: string,
    public readonly reason: string,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(
      `Report shard ${shardIndex + 1} (${link}) could not be downloaded: ${reason}`,
      options
    );
    this.name = "ShardFetchError";
  }
}

/** Nothing to chart: empty manifest or empty time series. */
export class NoDataError extends Error {
  public readonly code = "NO_DATA" as const;
  constructor(message = "No pull request data found in reports.") {
    super(message);
    this.name = "NoDataError";
  }
}

export type UsageMetricsError =
  | ConfigError
  | CredentialError
  | AuthExchangeError
  | ProtocolError
  | TransportError
  | ShardFetchError
  | NoDataError;

export type UsageMetricsErrorCode = UsageMetricsError["code"];

// Type guards

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof Error && error.name === "ConfigError";
}

export function isCredentialError(error: unknown): error is CredentialError {
  return error instanceof Error && error.name === "CredentialError";
}

export function isAuthExchangeError(
  error: unknown
): error is AuthExchangeError {
  return error instanceof Error && error.name === "AuthExchangeError";
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof Error && error.name === "ProtocolError";
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof Error && error.name === "TransportError";
}

export function isShardFetchError(error: unknown): error is ShardFetchError {
  return error instanceof Error && error.name === "ShardFetchError";
}

export function isNoDataError(error: unknown): error is NoDataError {
  return error instanceof Error && error.name === "NoDataError";
}

export function isUsageMetricsError(
  error: unknown
): error is UsageMetricsError {
  return (
    isConfigError(error) ||
    isCredentialError(error) ||
    isAuthExchangeError(error) ||
    isProtocolError(error) ||
    isTransportError(error) ||
    isShardFetchError(error) ||
    isNoDataError(error)
  );
}
