// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-http`
 * Purpose: In-process fetch stand-in for Octokit and the shard fetcher.
 * Scope: Route table of (method, URL matcher) → responder, plus a log of every request. Does NOT open sockets.
 * Invariants:
 * - Responses are real `Response` objects, so header and body handling match production.
 * - Unrouted requests reject like a network failure (TypeError).
 * - A pending responder honors the request's abort signal.
 * Side-effects: none
 * @public
 */

export interface RecordedRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly body: string | undefined;
  readonly signal: AbortSignal | undefined;
}

export type Responder = (
  request: RecordedRequest
) => Response | Promise<Response>;

interface Route {
  readonly method: string;
  readonly matches: (url: URL) => boolean;
  readonly respond: Responder;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/plain; charset=utf-8" },
  });
}

/** Never settles on its own; rejects with the signal's reason once aborted. */
export const hang: Responder = (request) =>
  new Promise<Response>((_resolve, reject) => {
    const { signal } = request;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });

function toUrl(input: string | URL | Request): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

export class FakeHttp {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  /** Route by exact pathname (string) or by full-URL pattern (RegExp). */
  on(
    method: string,
    target: string | RegExp,
    respond: Responder | Response
  ): this {
    const matches =
      typeof target === "string"
        ? (url: URL) => url.pathname === target
        : (url: URL) => target.test(url.href);
    this.routes.push({
      method: method.toUpperCase(),
      matches,
      respond: respond instanceof Response ? () => respond.clone() : respond,
    });
    return this;
  }

  requestsTo(pathname: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url.pathname === pathname);
  }

  readonly fetch = async (
    input: string | URL | Request,
    init?: RequestInit
  ): Promise<Response> => {
    const request: RecordedRequest = {
      method: (init?.method ?? "GET").toUpperCase(),
      url: toUrl(input),
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
      signal: init?.signal ?? undefined,
    };
    this.requests.push(request);

    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method && candidate.matches(request.url)
    );
    if (!route) {
      throw new TypeError(
        `No fake route for ${request.method} ${request.url.href}`
      );
    }
    return route.respond(request);
  };
}
