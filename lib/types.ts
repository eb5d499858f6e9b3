/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import type { Logger } from "./log.ts";

export interface RegistryIndex {
  name: string;
  official: boolean;
  scheme?: string;
}


/** Credential a client attaches to its requests. */
export type AuthInfo =
| BearerAuthInfo
| BasicAuthInfo
;

export interface BearerAuthInfo {
  type: 'Bearer';
  /** Never empty and never "unauthenticated". */
  token: string;
  /** Lifetime in seconds, as issued by the token server. */
  expiresIn?: number;
  issuedAt?: string;
  refreshToken?: string;
}

export interface BasicAuthInfo {
  type: 'Basic';
  username: string;
  password?: string;
}

/** Username and password supplied by the caller up front. */
export interface RegistryCredentials {
  username: string;
  password: string;
}


/** Parsed content of a `WWW-Authenticate` response header. */
export type Challenge =
| BearerChallenge
| BasicChallenge
;

export interface BearerChallenge {
  scheme: 'Bearer';
  /** The token endpoint. */
  realm: string;
  service?: string;
  scope?: string;
}

export interface BasicChallenge {
  scheme: 'Basic';
  realm: string;
}


/**
 * Any `fetch` implementation. Node's global `fetch` is used by default;
 * tests substitute an in-process registry.
 */
export type FetchFn = (url: URL, init: RequestInit) => Promise<Response>;


export interface RegistryClientOpts {
  /** Registry index name or URL, e.g. "quay.io", "http://localhost:5000". */
  name?: string;
  index?: RegistryIndex; // mutually exclusive with name
  scheme?: string;
  username?: string;
  password?: string;
  token?: string; // pre-issued bearer token
  /** Replaces any credential derived from `token`; used when cloning a client. */
  authInfo?: AuthInfo | null;
  userAgent?: string;
  log?: Logger;
  fetch?: FetchFn;
};
