/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import {
    TransportError,
    UnexpectedHttpStatusError,
    type RegistryError,
} from "./errors.ts";
import type { Logger } from "./log.ts";
import type { FetchFn } from "./types.ts";

// --- API

export interface HttpReqOpts {
    method: string;
    /** Resolved against the client's `url`; may also be absolute. */
    path: string;
    headers?: Headers;
    /** Statuses that do not raise. 'any' accepts every status. */
    expectStatus?: readonly number[] | 'any';
    redirect?: 'follow' | 'manual' | 'error';
}

export class DockerJsonClient {
    readonly accept: string;
    readonly url: string;
    readonly userAgent: string;
    private readonly fetch: FetchFn;
    private readonly log: Logger;

    constructor(options: {
        accept?: string;
        url: string;
        userAgent: string;
        fetch?: FetchFn;
        log: Logger;
    }) {
        this.accept = options.accept ?? 'application/json';
        this.url = options.url;
        this.userAgent = options.userAgent;
        this.fetch = options.fetch ?? globalThis.fetch;
        this.log = options.log;
    }

    async request(opts: HttpReqOpts): Promise<DockerResponse> {
        const headers = new Headers(opts.headers);
        if (!headers.has('accept') && this.accept) {
            headers.set('accept', this.accept);
        }
        headers.set('user-agent', this.userAgent);

        let url: URL;
        try {
            url = new URL(opts.path, this.url);
        } catch (err) {
            throw new TransportError('MalformedUrl',
                `invalid request URL: ${JSON.stringify(opts.path)} (base ${this.url})`, { cause: err });
        }

        let rawResp: Response;
        try {
            rawResp = await this.fetch(url, {
                method: opts.method,
                headers: headers,
                redirect: opts.redirect ?? 'manual',
            });
        } catch (err) {
            throw new TransportError('NetworkFailure',
                `${opts.method} ${url.origin}${url.pathname} failed: ${describe(err)}`, { cause: err });
        }
        this.log.trace({ method: opts.method, url: url.origin + url.pathname, status: rawResp.status },
            'response');

        const resp = new DockerResponse(rawResp);
        const expectStatus = opts.expectStatus ?? [200];
        if (expectStatus !== 'any' && !expectStatus.includes(resp.status)) {
            throw await resp.dockerThrowable(
                `Unexpected HTTP ${resp.status} from ${opts.method} ${url.pathname}`);
        }
        return resp;
    }
};


function describe(err: unknown) {
    return err instanceof Error ? err.message : String(err);
}

function isRegistryError(value: unknown): value is RegistryError {
    return typeof value === 'object' && value !== null
        && 'message' in value && typeof value.message === 'string';
}


/**
 * A fetch `Response` whose body is read at most once, with helpers for the
 * JSON and error conventions registries use.
 */
export class DockerResponse {
    // Cache the body once we decode it once.
    private decodedBody?: Uint8Array;

    constructor(readonly raw: Response) {}

    get status() {
        return this.raw.status;
    }

    get headers() {
        return this.raw.headers;
    }

    async dockerBody(): Promise<Uint8Array> {
        this.decodedBody ??= new Uint8Array(await this.raw.arrayBuffer());
        return this.decodedBody;
    }

    /** The parsed JSON body, or undefined for an empty body. */
    async dockerJson(): Promise<unknown> {
        const text = new TextDecoder().decode(await this.dockerBody());
        if (text.trim().length == 0) return undefined;

        try {
            return JSON.parse(text);
        } catch (jsonErr) {
            throw new TransportError('InvalidResponseBody',
                'Invalid JSON in response: ' + describe(jsonErr), { cause: jsonErr });
        }
    }

    /*
     * Registry errors come as `{"errors": [{code, message, detail}]}`. Be nice
     * and handle `{"error": {...}}` and a bare `{code, message}` too.
     */
    async dockerErrors(): Promise<RegistryError[]> {
        const obj = await this.dockerJson().catch(() => undefined);
        if (typeof obj !== 'object' || obj === null) return [];

        let candidates: unknown[];
        if ('error' in obj && obj.error) {
            candidates = [obj.error];
        } else if ('errors' in obj && Array.isArray(obj.errors)) {
            candidates = obj.errors;
        } else {
            candidates = [obj];
        }
        return candidates.filter(isRegistryError);
    }

    async dockerThrowable(baseMsg: string): Promise<UnexpectedHttpStatusError> {
        // no point trying to parse HTML
        if (this.headers.get('content-type')?.startsWith('text/html')) {
            await this.dockerBody();
            return new UnexpectedHttpStatusError(this.status, [], `${baseMsg} (w/ HTML body)`);
        }

        try {
            const errors = this.status >= 400 ? await this.dockerErrors() : [];
            const errorTexts = errors.map(x => '    ' + [
                x.code,
                x.message,
                x.detail ? JSON.stringify(x.detail) : '',
            ].filter(x => x).join(': '));
            if (errors.length === 0) {
                const text = new TextDecoder().decode(await this.dockerBody());
                if (text.length > 1) {
                    errorTexts.push('    ' + text.slice(0, 512));
                }
            }
            return new UnexpectedHttpStatusError(this.status, errors, [baseMsg, ...errorTexts].join('\n'));
        } catch (err) {
            return new UnexpectedHttpStatusError(this.status, [],
                `${baseMsg} - and failed to read error body: ${describe(err)}`);
        }
    }
}
