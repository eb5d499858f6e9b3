/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Parse a WWW-Authenticate header like this:
 *
 *      www-authenticate: Bearer realm="https://auth.docker.io/token",service="registry.docker.io"
 *      www-authenticate: Basic realm="registry456.example.com"
 *
 * into one of:
 *
 *      { scheme: 'Bearer', realm: 'https://auth.docker.io/token', service: 'registry.docker.io' }
 *      { scheme: 'Basic', realm: 'registry456.example.com' }
 *
 * There is no grammar here: the value is split into the scheme plus a list
 * of key="value" pairs, and the pairs are then checked against the keys the
 * scheme needs. When several challenges are present, only the first one is
 * read. A key the scheme knows may appear only once.
 */

import type { BasicChallenge, BearerChallenge, Challenge } from "./types.ts";
import { WwwAuthenticateParseError } from "./errors.ts";
import type { Logger } from "./log.ts";

// Each match holds one key="value" pair; only the first also holds the method.
export const CHALLENGE_PATTERN =
    /\s*(?:(?<method>[A-Z][a-z]+)\s*)?(?:\s*(?<key>[a-z]+)\s*=\s*"(?<value>[^"]+)"\s*)/g;

export interface TokenizedChallenge {
    method: string;
    params: Array<[key: string, value: string]>;
}

export function tokenizeWwwAuthenticate(header: string): TokenizedChallenge {
    const matches = [...header.matchAll(CHALLENGE_PATTERN)];
    if (matches.length === 0) {
        throw new WwwAuthenticateParseError('InvalidValue',
            `WWW-Authenticate header must look like 'Method key="value", ...': ${JSON.stringify(header)}`);
    }

    const method = matches[0].groups?.method;
    if (!method) {
        throw new WwwAuthenticateParseError('FieldMethodMissing',
            `WWW-Authenticate header has no auth method: ${JSON.stringify(header)}`);
    }

    // Several headers arrive joined with ", "; only the first challenge counts.
    const params: TokenizedChallenge['params'] = [];
    for (const [i, match] of matches.entries()) {
        if (i > 0 && match.groups?.method) break;
        const key = match.groups?.key;
        const value = match.groups?.value;
        if (key !== undefined && value !== undefined) {
            params.push([key, value]);
        }
    }
    return { method, params };
}


interface ChallengeShape<T extends Challenge> {
    keys: ReadonlySet<string>;
    build(params: ReadonlyMap<string, string>): T;
}

function requireParam(params: ReadonlyMap<string, string>, scheme: string, key: string) {
    const value = params.get(key);
    if (value === undefined) {
        throw new WwwAuthenticateParseError('InvalidValue',
            `${scheme} challenge is missing "${key}"`);
    }
    return value;
}

const BASIC: ChallengeShape<BasicChallenge> = {
    keys: new Set(['realm']),
    build: (params) => ({
        scheme: 'Basic',
        realm: requireParam(params, 'Basic', 'realm'),
    }),
};

const BEARER: ChallengeShape<BearerChallenge> = {
    keys: new Set(['realm', 'service', 'scope']),
    build(params) {
        const challenge: BearerChallenge = {
            scheme: 'Bearer',
            realm: requireParam(params, 'Bearer', 'realm'),
        };
        const service = params.get('service');
        if (service !== undefined) challenge.service = service;
        const scope = params.get('scope');
        if (scope !== undefined) challenge.scope = scope;
        return challenge;
    },
};

const SHAPES: Record<string, ChallengeShape<Challenge>> = {
    Basic: BASIC,
    Bearer: BEARER,
};


function decodeHeader(header: Uint8Array | string) {
    if (typeof header === 'string') return header;
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(header);
    } catch (err) {
        throw new WwwAuthenticateParseError('InvalidEncoding',
            'WWW-Authenticate header is not valid UTF-8', { cause: err });
    }
}

/**
 * Parse the raw value of a `WWW-Authenticate` header.
 *
 * Keys the matched scheme does not know are dropped and reported as a
 * warning on `log`.
 *
 * @throws {WwwAuthenticateParseError}
 */
export function parseWwwAuthenticate(header: Uint8Array | string, log?: Logger): Challenge {
    const { method, params } = tokenizeWwwAuthenticate(decodeHeader(header));

    const shape = Object.hasOwn(SHAPES, method) ? SHAPES[method] : undefined;
    if (!shape) {
        throw new WwwAuthenticateParseError('InvalidValue',
            `unsupported auth scheme: "${method}"`);
    }

    const byKey = new Map<string, string>();
    for (const [key, value] of params) {
        if (byKey.has(key) && shape.keys.has(key)) {
            throw new WwwAuthenticateParseError('InvalidValue',
                `${method} challenge repeats "${key}"`);
        }
        byKey.set(key, value);
    }
    const challenge = shape.build(byKey);

    const ignoredKeys = [...byKey.keys()].filter(key => !shape.keys.has(key));
    if (ignoredKeys.length > 0) {
        log?.warn({ scheme: method, ignoredKeys },
            'skipping unrecognized keys in WWW-Authenticate header');
    }
    return challenge;
}
