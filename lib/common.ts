/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { arch, platform, versions } from "node:process";
import type { RegistryIndex } from "./types.ts";

// --- globals

export const VERSION = '0.1.0';
export const DEFAULT_USERAGENT = `registry-auth-client/${VERSION}`
    + ` (${arch}-${platform}; node/${versions.node})`;

export const DEFAULT_INDEX_NAME = 'docker.io';
// The official index serves the v2 API from a different host.
export const DEFAULT_V2_REGISTRY = 'https://registry-1.docker.io';

// What `docker login` sends as its default server address.
export const DEFAULT_LOGIN_SERVERNAME = 'https://index.docker.io/v1/';

/** The base endpoint probed for the authentication challenge. */
export const API_VERSION_CHECK_PATH = '/v2/';


// --- exports

/**
 * Parse a registry index name or URL.
 *
 * Examples:
 *      docker.io               (no scheme implies 'https')
 *      index.docker.io         (normalized to docker.io)
 *      https://quay.io
 *      http://localhost:5000
 *      https://index.docker.io/v1/  (`docker login` default)
 */
export function parseIndex(arg?: string): RegistryIndex {
    if (!arg || arg === DEFAULT_LOGIN_SERVERNAME) {
        return { name: DEFAULT_INDEX_NAME, official: true };
    }

    let scheme: string | undefined;
    let name = arg;
    const protoSepIdx = arg.indexOf('://');
    if (protoSepIdx !== -1) {
        scheme = arg.slice(0, protoSepIdx);
        if (scheme !== 'http' && scheme !== 'https') {
            throw new Error(
                `invalid index scheme, must be "http" or "https": ${arg}`);
        }
        name = arg.slice(protoSepIdx + 3);
    }

    if (!name) {
        throw new Error(`invalid index, empty host: ${arg}`);
    }
    if (!name.includes('.') && !name.includes(':') && name !== 'localhost') {
        throw new Error(
            `invalid index, "${name}" does not look like a valid host: ${arg}`);
    }
    // Tolerate the trailing '/' some URL builders add.
    if (name.endsWith('/')) {
        name = name.slice(0, -1);
    }
    if (name.includes('/')) {
        throw new Error(`invalid index, trailing repo: ${arg}`);
    }
    if (name === 'index.' + DEFAULT_INDEX_NAME) {
        name = DEFAULT_INDEX_NAME;
    }

    const official = name === DEFAULT_INDEX_NAME;
    if (official && scheme === 'http') {
        throw new Error(
            `invalid index, HTTP to official index is disallowed: ${arg}`);
    }

    return scheme ? { name, official, scheme } : { name, official };
}


export function isLocalhost(host: string) {
    const lead = host.split(':')[0];
    return lead === 'localhost' || lead === '127.0.0.1';
}


/**
 * Base URL of the v2 API for an index. Localhost defaults to plain HTTP.
 */
export function urlFromIndex(index: RegistryIndex, scheme?: string) {
    if (index.official) {
        return DEFAULT_V2_REGISTRY;
    }
    const effective = scheme ?? index.scheme
        ?? (isLocalhost(index.name) ? 'http' : 'https');
    return `${effective}://${index.name}`;
}


/**
 * Return a scope string to be used for a token request. Example:
 *   repository:library/nginx:pull
 */
export function makeAuthScope(resource: string, name: string, actions: readonly string[]) {
    return `${resource}:${name}:${actions.join(',')}`;
}
