/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

export type * from './types.ts';
export * from './errors.ts';
export { RegistryClientV2, createClient } from './registry-client-v2.ts';
export { DockerJsonClient, DockerResponse, type HttpReqOpts } from './docker-json-client.ts';
export {
    parseWwwAuthenticate,
    tokenizeWwwAuthenticate,
    type TokenizedChallenge,
} from './www-authenticate.ts';
export { authorizationHeader, withAuthHeader } from './auth.ts';
export {
    fetchBearerToken,
    maskToken,
    parseTokenResponse,
    tokenEndpoint,
    type TokenResponse,
} from './bearer.ts';
export {
    DEFAULT_INDEX_NAME,
    DEFAULT_USERAGENT,
    makeAuthScope,
    parseIndex,
    urlFromIndex,
} from './common.ts';
export { createLogger, type Logger, type LogLevel } from './log.ts';
