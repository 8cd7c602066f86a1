// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/github/github-request`
 * Purpose: Shared request plumbing for bearer-authenticated GitHub REST calls.
 * Scope: Header construction and translation of Octokit/zod failures into the domain error taxonomy.
 * Invariants:
 * - A response with a non-2xx status becomes AuthExchangeError (status + body preserved).
 * - A request that never got a response (timeout, DNS, reset) becomes TransportError.
 * - Bearer tokens never appear in error messages.
 * Side-effects: HTTP (via the send callback)
 * @internal
 */

import type { RequestError } from "@octokit/request-error";
import { AuthExchangeError, TransportError } from "@usage-metrics/core";
import type { ZodError } from "zod";

import { GITHUB_API_VERSION, GITHUB_JSON_MEDIA_TYPE } from "./github-client.js";

/** Auth and manifest calls fail rather than hang past this bound. */
export const AUTH_REQUEST_TIMEOUT_MS = 30_000;

export function bearerHeaders(token: string): Record<string, string> {
  return {
    authorization: `Bearer ${token}`,
    accept: GITHUB_JSON_MEDIA_TYPE,
    "x-github-api-version": GITHUB_API_VERSION,
  };
}

function isHttpError(error: unknown): error is RequestError {
  return error instanceof Error && error.name === "HttpError";
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null) return "";
  return typeof data === "string" ? data : JSON.stringify(data);
}

function isTimeout(error: Error): boolean {
  // Octokit wraps fetch rejections in a RequestError and keeps the original as cause
  return (
    error.name === "TimeoutError" ||
    (error.cause instanceof Error && error.cause.name === "TimeoutError")
  );
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (isTimeout(error)) return `timed out after ${timeoutMs}ms`;
    return error.message;
  }
  return String(error);
}

/**
 * Run one GitHub call and return its response body.
 * `endpoint` is the human-readable route used in error messages.
 */
export async function callGitHub(
  endpoint: string,
  timeoutMs: number,
  send: (signal: AbortSignal) => Promise<{ data: unknown }>
): Promise<unknown> {
  try {
    const response = await send(AbortSignal.timeout(timeoutMs));
    return response.data;
  } catch (error) {
    if (isHttpError(error) && error.response) {
      throw new AuthExchangeError(
        endpoint,
        error.status,
        describeBody(error.response.data)
      );
    }
    throw new TransportError(endpoint, describeFailure(error, timeoutMs), {
      cause: error,
    });
  }
}

export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
    .join("; ");
}
