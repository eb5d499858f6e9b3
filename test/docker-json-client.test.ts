/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { describe, expect, it } from "vitest";

import { DockerJsonClient, DockerResponse } from "../lib/docker-json-client.ts";
import { captureLog, expectAuthError, FakeRegistry } from "./util.ts";

const REGISTRY = 'https://registry.example.com';

function newClient(registry: FakeRegistry, accept?: string) {
    return new DockerJsonClient({
        url: REGISTRY,
        accept,
        userAgent: 'test-agent',
        fetch: registry.fetch,
        log: captureLog().log,
    });
}

function jsonResponse(status: number, body: unknown) {
    return new DockerResponse(new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    }));
}

describe('DockerJsonClient.request', () => {
    it('sends accept and user-agent headers', async () => {
        const registry = new FakeRegistry().route(REGISTRY + '/v2/', { status: 200 });

        await newClient(registry).request({ method: 'GET', path: '/v2/' });
        await newClient(registry, 'application/vnd.oci.image.index.v1+json')
            .request({ method: 'GET', path: '/v2/' });

        expect(registry.requests[0].headers.get('accept')).toBe('application/json');
        expect(registry.requests[0].headers.get('user-agent')).toBe('test-agent');
        expect(registry.requests[1].headers.get('accept'))
            .toBe('application/vnd.oci.image.index.v1+json');
    });

    it('resolves the path against the base URL', async () => {
        const registry = new FakeRegistry()
            .route('https://auth.example/token', { status: 200, body: { token: 'x' } });

        await newClient(registry).request({ method: 'GET', path: 'https://auth.example/token?scope=a' });

        expect(registry.requests[0].url.href).toBe('https://auth.example/token?scope=a');
    });

    it('raises on an unexpected status with the registry errors', async () => {
        const registry = new FakeRegistry().route(REGISTRY + '/v2/', {
            status: 500,
            body: { errors: [{ code: 'UNKNOWN', message: 'boom' }] },
        });

        const err = await expectAuthError(
            newClient(registry).request({ method: 'GET', path: '/v2/' }),
            'UnexpectedHttpStatus');

        expect(err).toHaveProperty('status', 500);
        expect(err).toHaveProperty('message', 'Unexpected HTTP 500 from GET /v2/\n    UNKNOWN: boom');
    });

    it('accepts any status with expectStatus "any"', async () => {
        const registry = new FakeRegistry();
        const res = await newClient(registry)
            .request({ method: 'GET', path: '/v2/', expectStatus: 'any' });
        expect(res.status).toBe(404);
    });

    it('wraps fetch failures', async () => {
        const client = new DockerJsonClient({
            url: REGISTRY,
            userAgent: 'test-agent',
            fetch: () => Promise.reject(new Error('getaddrinfo ENOTFOUND')),
            log: captureLog().log,
        });

        const err = await expectAuthError(client.request({ method: 'GET', path: '/v2/' }), 'NetworkFailure');
        expect(err).toHaveProperty('message',
            'GET https://registry.example.com/v2/ failed: getaddrinfo ENOTFOUND');
    });

    it('rejects a base URL that does not parse', async () => {
        const client = new DockerJsonClient({
            url: 'not a url',
            userAgent: 'test-agent',
            fetch: new FakeRegistry().fetch,
            log: captureLog().log,
        });
        await expectAuthError(client.request({ method: 'GET', path: '/v2/' }), 'MalformedUrl');
    });
});

describe('DockerResponse', () => {
    it('reads the body once', async () => {
        const res = new DockerResponse(new Response('{"a":1}'));
        expect(await res.dockerJson()).toEqual({ a: 1 });
        expect(await res.dockerJson()).toEqual({ a: 1 });
    });

    it('treats an empty body as undefined', async () => {
        expect(await new DockerResponse(new Response(null)).dockerJson()).toBeUndefined();
    });

    it('rejects invalid JSON', async () => {
        const res = new DockerResponse(new Response('{nope'));
        await expectAuthError(res.dockerJson(), 'InvalidResponseBody');
    });

    it('reads the usual error body shapes', async () => {
        expect(await jsonResponse(401, {
            errors: [{ code: 'UNAUTHORIZED', message: 'authentication required', detail: null }],
        }).dockerErrors()).toEqual([
            { code: 'UNAUTHORIZED', message: 'authentication required', detail: null },
        ]);
        expect(await jsonResponse(403, { error: { message: 'denied' } }).dockerErrors())
            .toEqual([{ message: 'denied' }]);
        expect(await jsonResponse(400, { code: 'BAD', message: 'bad request' }).dockerErrors())
            .toEqual([{ code: 'BAD', message: 'bad request' }]);
        expect(await jsonResponse(400, { details: 'no message' }).dockerErrors()).toEqual([]);
    });

    it('does not try to parse HTML error pages', async () => {
        const res = new DockerResponse(new Response('<html>oops</html>', {
            status: 502,
            headers: { 'content-type': 'text/html; charset=utf-8' },
        }));
        const err = await res.dockerThrowable('Unexpected HTTP 502');
        expect(err.message).toBe('Unexpected HTTP 502 (w/ HTML body)');
        expect(err.errors).toEqual([]);
    });

    it('quotes a plain text error body', async () => {
        const res = new DockerResponse(new Response('bad gateway', {
            status: 502,
            headers: { 'content-type': 'text/plain' },
        }));
        const err = await res.dockerThrowable('Unexpected HTTP 502');
        expect(err.message).toBe('Unexpected HTTP 502\n    bad gateway');
        expect(err.status).toBe(502);
    });
});
