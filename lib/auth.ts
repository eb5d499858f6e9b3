/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Buffer } from "node:buffer";
import type { AuthInfo, BasicAuthInfo, RegistryCredentials } from "./types.ts";

/**
 * The "Authorization" header value for the given auth info.
 * - Bearer auth: `Bearer <token>`
 * - Basic auth: `Basic <base64(username:password)>`, with an empty password
 *   when none is set.
 */
export function authorizationHeader(authInfo: AuthInfo): string {
    switch (authInfo.type) {
    case 'Bearer':
        return 'Bearer ' + authInfo.token;
    case 'Basic': {
        const credentials = `${authInfo.username}:${authInfo.password ?? ''}`;
        return 'Basic ' + Buffer.from(credentials, 'utf8').toString('base64');
    }
    }
}

/*
 * Return a copy of `headers` with the "Authorization" header set from the
 * given auth info, or with it removed when there is none. The input is left
 * untouched, so applying the same auth info again gives the same headers.
 */
export function withAuthHeader(headers: Headers | undefined, authInfo: AuthInfo | null): Headers {
    const result = new Headers(headers);
    if (authInfo) {
        result.set('authorization', authorizationHeader(authInfo));
    } else {
        result.delete('authorization');
    }
    return result;
}

export function basicAuthFromCredentials(credentials: RegistryCredentials): BasicAuthInfo {
    return {
        type: 'Basic',
        username: credentials.username,
        password: credentials.password,
    };
}
