/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Bearer token auth: given the registry's Bearer challenge, fetch a token
 * from the challenge realm.
 *
 * <https://distribution.github.io/distribution/spec/auth/token/>
 */

import { z } from "zod";

import { withAuthHeader, basicAuthFromCredentials } from "./auth.ts";
import { DockerJsonClient } from "./docker-json-client.ts";
import { CredentialError, TransportError } from "./errors.ts";
import type { Logger } from "./log.ts";
import type {
    BearerAuthInfo,
    BearerChallenge,
    FetchFn,
    RegistryCredentials,
} from "./types.ts";

// Token servers answer "unauthenticated" instead of refusing anonymous pulls.
const REJECTED_TOKENS: ReadonlySet<string> = new Set(['', 'unauthenticated']);

const UINT32_MAX = 0xffffffff;

// `null` and a missing key mean the same thing.
function absentIfNull<T extends z.ZodTypeAny>(schema: T) {
    return schema.nullish().transform((value) => value ?? undefined);
}

/*
 * The token response as sent. For compatibility with OAuth 2.0 the token may
 * come as `access_token` instead of `token`; at least one must be present.
 */
export const TokenResponseSchema = z.object({
    token: absentIfNull(z.string()),
    access_token: absentIfNull(z.string()),
    expires_in: absentIfNull(z.number().int().min(0).max(UINT32_MAX)),
    issued_at: absentIfNull(z.string()),
    refresh_token: absentIfNull(z.string()),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;


/**
 * Build the token endpoint URL:
 *
 *      $realm[?service=$service][{?|&}scope=$scope]*
 *
 * Scopes are appended as given; callers pass them already encoded.
 *
 * @throws {TransportError} 'MalformedUrl' if the result is not an absolute
 *      http(s) URL.
 */
export function tokenEndpoint(challenge: BearerChallenge, scopes: readonly string[]): string {
    let tokenUrl = challenge.realm;
    let separator = '?';
    if (challenge.service !== undefined) {
        tokenUrl += '?service=' + challenge.service;
        separator = '&';
    }
    for (const scope of scopes) {
        tokenUrl += separator + 'scope=' + scope; // intentionally singular 'scope'
        separator = '&';
    }

    let parsed: URL;
    try {
        parsed = new URL(tokenUrl);
    } catch (err) {
        throw new TransportError('MalformedUrl',
            `invalid token endpoint "${tokenUrl}" from WWW-Authenticate realm "${challenge.realm}"`,
            { cause: err });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new TransportError('MalformedUrl',
            `unsupported scheme for WWW-Authenticate realm "${challenge.realm}": "${parsed.protocol}"`);
    }
    return tokenUrl;
}


/**
 * Hide all but the first and last character of a token, for logging.
 *
 *      maskToken('abcdef') === 'a****f'
 */
export function maskToken(token: string): string {
    const chars = Array.from(token);
    if (chars.length === 0) return '';
    const maskStart = Math.min(1, chars.length - 1);
    const maskEnd = Math.max(chars.length - 1, 1);
    return chars.slice(0, maskStart).join('')
        + '*'.repeat(maskEnd - maskStart)
        + chars.slice(maskEnd).join('');
}


/**
 * Turn a token endpoint response body into Bearer auth info.
 *
 * When both `token` and `access_token` are present `token` is used.
 *
 * @throws {TransportError} 'InvalidResponseBody' if the body is not a token response.
 * @throws {CredentialError} 'MissingTokenField' or 'InvalidAuthToken'.
 */
export function parseTokenResponse(body: unknown, log?: Logger): BearerAuthInfo {
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new TransportError('InvalidResponseBody',
            'token endpoint response is not a token response: ' + parsed.error.message,
            { cause: parsed.error });
    }
    const raw = parsed.data;

    const token = raw.token ?? raw.access_token;
    if (token === undefined) {
        throw new CredentialError('MissingTokenField',
            'token endpoint response has neither "token" nor "access_token"');
    }
    if (raw.token !== undefined && raw.access_token !== undefined
            && raw.token !== raw.access_token) {
        log?.warn('token endpoint sent differing "token" and "access_token"; using "token"');
    }
    if (REJECTED_TOKENS.has(token)) {
        throw new CredentialError('InvalidAuthToken',
            `token endpoint returned an unusable token: ${JSON.stringify(token)}`);
    }

    const authInfo: BearerAuthInfo = { type: 'Bearer', token };
    if (raw.expires_in !== undefined) authInfo.expiresIn = raw.expires_in;
    if (raw.issued_at !== undefined) authInfo.issuedAt = raw.issued_at;
    if (raw.refresh_token !== undefined) authInfo.refreshToken = raw.refresh_token;
    return authInfo;
}


/**
 * Get a Bearer token for `scopes` from the realm of a Bearer challenge.
 *
 * `credentials`, when given, are sent as Basic auth to the token endpoint
 * (not to the registry). Nothing is retried.
 */
export async function fetchBearerToken(opts: {
    challenge: BearerChallenge;
    scopes: readonly string[];
    credentials?: RegistryCredentials;
    userAgent: string;
    fetch?: FetchFn;
    log: Logger;
}): Promise<BearerAuthInfo> {
    const { log } = opts;
    const tokenUrl = tokenEndpoint(opts.challenge, opts.scopes);
    log.trace({ tokenUrl }, 'fetchBearerToken: token endpoint');

    const client = new DockerJsonClient({
        url: new URL(tokenUrl).origin,
        userAgent: opts.userAgent,
        fetch: opts.fetch,
        log,
    });
    const resp = await client.request({
        method: 'GET',
        path: tokenUrl,
        headers: withAuthHeader(undefined,
            opts.credentials ? basicAuthFromCredentials(opts.credentials) : null),
        expectStatus: [200],
    });

    const authInfo = parseTokenResponse(await resp.dockerJson(), log);
    log.trace({ token: maskToken(authInfo.token), expiresIn: authInfo.expiresIn },
        'fetchBearerToken: got token');
    return authInfo;
}
