/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { expect } from "vitest";

import { createLogger, type Logger } from "../lib/log.ts";
import { isRegistryAuthError, type RegistryAuthErrorCode } from "../lib/errors.ts";
import type { FetchFn } from "../lib/types.ts";

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
}

export interface FakeResponse {
  status: number;
  /** A list of pairs sends the same header more than once. */
  headers?: Record<string, string> | Array<[string, string]>;
  body?: unknown;
}

type Handler = (req: RecordedRequest) => FakeResponse;

/**
 * In-process stand-in for a registry and its token server. Routes are keyed
 * by origin + pathname; every request is recorded.
 */
export class FakeRegistry {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Handler>();

  route(url: string, handler: Handler | FakeResponse): this {
    const { origin, pathname } = new URL(url);
    if (typeof handler === 'function') {
      this.routes.set(origin + pathname, handler);
    } else {
      const fixed = handler;
      this.routes.set(origin + pathname, () => fixed);
    }
    return this;
  }

  readonly fetch: FetchFn = async (url, init) => {
    const req: RecordedRequest = {
      method: init.method ?? 'GET',
      url,
      headers: new Headers(init.headers),
    };
    this.requests.push(req);

    const handler = this.routes.get(url.origin + url.pathname);
    const res: FakeResponse = handler
      ? handler(req)
      : { status: 404, body: { errors: [{ code: 'NOT_FOUND', message: 'no route' }] } };
    const headers = new Headers(res.headers);
    let body: string | null = null;
    if (res.body !== undefined) {
      body = typeof res.body === 'string' ? res.body : JSON.stringify(res.body);
      if (!headers.has('content-type')) headers.set('content-type', 'application/json');
    }
    return new Response(body, { status: res.status, headers });
  };
}

export interface CapturedLog {
  log: Logger;
  records(): unknown[];
}

export function captureLog(): CapturedLog {
  const lines: string[] = [];
  const log = createLogger({
    name: 'test',
    level: 'trace',
    destination: { write: (msg: string) => { lines.push(msg); } },
  });
  return {
    log,
    records: () => lines.map((line): unknown => JSON.parse(line)),
  };
}

export async function expectAuthError(
  promise: Promise<unknown>,
  code: RegistryAuthErrorCode,
) {
  const err: unknown = await promise.then(
    () => { throw new Error(`expected a ${code} error`); },
    (e: unknown) => e,
  );
  expect(isRegistryAuthError(err, code)).toBe(true);
  return err;
}
