/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import {
    parseIndex,
    urlFromIndex,
    API_VERSION_CHECK_PATH,
    DEFAULT_USERAGENT,
} from "./common.ts";
import type {
    AuthInfo,
    FetchFn,
    RegistryClientOpts,
    RegistryCredentials,
    RegistryIndex,
} from "./types.ts";
import { DockerJsonClient, type DockerResponse, type HttpReqOpts } from "./docker-json-client.ts";
import { parseWwwAuthenticate } from "./www-authenticate.ts";
import { basicAuthFromCredentials, withAuthHeader } from "./auth.ts";
import { fetchBearerToken } from "./bearer.ts";
import { CredentialError, ProtocolError } from "./errors.ts";
import { getDefaultLogger, type Logger } from "./log.ts";

/*
 * Docker Registry API v2 client, reduced to authentication: work out which
 * auth the registry wants, perform it, and attach the result to requests.
 *
 * <https://distribution.github.io/distribution/spec/api/#api-version-check>
 *
 * A client is an immutable value. `authenticate()` does not change the
 * client it is called on; it returns a new client holding the credential.
 *
 *      const client = new RegistryClientV2({name: 'quay.io', username, password});
 *      const authed = await client.authenticate(['repository:coreos/etcd:pull']);
 *      await authed.isAuthenticated();   // true
 */
export class RegistryClientV2 {
    readonly version = 2;
    readonly index: RegistryIndex;
    readonly url: string;
    readonly username?: string;
    readonly password?: string;
    readonly authInfo: AuthInfo | null;
    readonly userAgent: string;
    private readonly _opts: RegistryClientOpts;
    private readonly _fetch?: FetchFn;
    private readonly _log: Logger;

    constructor(opts: RegistryClientOpts) {
        if (opts.index) {
            this.index = { ...opts.index };
        } else {
            this.index = parseIndex(opts.name);
        }
        this.url = urlFromIndex(this.index, opts.scheme);

        this.username = opts.username;
        this.password = opts.password;
        if (opts.authInfo !== undefined) {
            this.authInfo = opts.authInfo;
        } else if (opts.token) {
            this.authInfo = { type: 'Bearer', token: opts.token };
        } else {
            this.authInfo = null;
        }

        this.userAgent = opts.userAgent ?? DEFAULT_USERAGENT;
        this._fetch = opts.fetch;
        this._log = (opts.log ?? getDefaultLogger()).child({ component: 'RegistryClientV2' });
        this._opts = { ...opts, index: this.index, name: undefined };
        this._log.trace({ url: this.url }, 'RegistryClientV2 url');
    }

    private get _api() {
        return new DockerJsonClient({
            url: this.url,
            userAgent: this.userAgent,
            fetch: this._fetch,
            log: this._log,
        });
    }

    /** The caller's username and password, if a username was given. */
    get credentials(): RegistryCredentials | undefined {
        if (this.username === undefined) return undefined;
        return { username: this.username, password: this.password ?? '' };
    }

    /** A copy of this client that carries `authInfo` instead. */
    withAuthInfo(authInfo: AuthInfo | null): RegistryClientV2 {
        return new RegistryClientV2({ ...this._opts, authInfo });
    }

    /**
     * Make a request against the registry with this client's credential
     * attached. `opts.path` is relative to the registry URL.
     */
    async request(opts: HttpReqOpts): Promise<DockerResponse> {
        return await this._api.request({
            ...opts,
            headers: withAuthHeader(opts.headers, this.authInfo),
        });
    }

    /**
     * Ping the base URL.
     * See: <https://distribution.github.io/distribution/spec/api/#base>
     *
     * Use `res.status` to infer information:
     *          404     This registry URL does not support the v2 API.
     *          401     Authentication is required (or failed). Use the
     *                  WWW-Authenticate header for the appropriate auth method.
     *          200     Successful authentication.
     */
    async ping(opts: {
        expectStatus?: HttpReqOpts['expectStatus'];
    } = {}): Promise<DockerResponse> {
        const resp = await this.request({
            method: 'GET',
            path: API_VERSION_CHECK_PATH,
            expectStatus: opts.expectStatus ?? [200, 401, 404],
        });
        await resp.dockerBody();
        return resp;
    }

    /**
     * Authenticate against the registry and return a client carrying the
     * resulting credential.
     *
     * The registry is probed without any credential. Its challenge decides
     * the method:
     * - Basic: the client's username and password are used as they are.
     * - Bearer: a token for `scopes` is requested from the challenge realm,
     *   sending the username and password (if any) to that token endpoint.
     *
     * A registry answering the probe with 200 and no challenge allows
     * anonymous access; the returned client then carries no credential.
     *
     * @throws {ProtocolError} 'MissingAuthHeader' if a non-200 probe response
     *      has no WWW-Authenticate header.
     * @throws {CredentialError} 'NoCredentials' on a Basic challenge without
     *      a username.
     */
    async authenticate(scopes: readonly string[] = []): Promise<RegistryClientV2> {
        // Don't send an earlier credential to what may be a different endpoint.
        const probe = this.withAuthInfo(null);
        const res = await probe.ping({ expectStatus: 'any' });

        const chalHeader = res.headers.get('www-authenticate');
        if (!chalHeader) {
            if (res.status === 200) {
                this._log.debug('authenticate: registry allows anonymous access');
                return probe;
            }
            throw new ProtocolError('MissingAuthHeader',
                `missing WWW-Authenticate header from "GET ${API_VERSION_CHECK_PATH}" (HTTP ${res.status})`);
        }

        const challenge = parseWwwAuthenticate(chalHeader, this._log);
        this._log.trace({ scheme: challenge.scheme, realm: challenge.realm },
            'authenticate: challenge received');

        let authInfo: AuthInfo;
        if (challenge.scheme === 'Basic') {
            const credentials = this.credentials;
            if (!credentials) {
                throw new CredentialError('NoCredentials',
                    `registry ${this.url} requires Basic auth but no username was given`);
            }
            authInfo = basicAuthFromCredentials(credentials);
        } else {
            authInfo = await fetchBearerToken({
                challenge,
                scopes,
                credentials: this.credentials,
                userAgent: this.userAgent,
                fetch: this._fetch,
                log: this._log,
            });
        }

        this._log.trace({ type: authInfo.type }, 'authenticate: login succeeded');
        return this.withAuthInfo(authInfo);
    }

    /**
     * Check whether requests with the current credential (or none) are
     * accepted by the registry, which may be thanks to anonymous access.
     *
     * @throws {UnexpectedHttpStatusError} for any status but 200 and 401.
     */
    async isAuthenticated(): Promise<boolean> {
        const res = await this.ping({ expectStatus: [200, 401] });
        return res.status === 200;
    }
}

export function createClient(opts: RegistryClientOpts) {
    return new RegistryClientV2(opts);
}
