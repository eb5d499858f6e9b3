/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Error classes raised while negotiating registry authentication.
 *
 * Every error carries a `code` so callers can switch on it without
 * matching messages:
 *
 *      try {
 *          client = await client.authenticate([scope]);
 *      } catch (err) {
 *          if (isRegistryAuthError(err, 'NoCredentials')) { ... }
 *          throw err;
 *      }
 */

export type WwwAuthenticateParseErrorCode =
| 'InvalidValue'
| 'FieldMethodMissing'
| 'InvalidEncoding'
;

export type CredentialErrorCode =
| 'NoCredentials'
| 'MissingTokenField'
| 'InvalidAuthToken'
;

export type TransportErrorCode =
| 'MalformedUrl'
| 'UnexpectedHttpStatus'
| 'NetworkFailure'
| 'InvalidResponseBody'
;

export type ProtocolErrorCode =
| 'MissingAuthHeader'
;

export type RegistryAuthErrorCode =
| WwwAuthenticateParseErrorCode
| CredentialErrorCode
| TransportErrorCode
| ProtocolErrorCode
;

export abstract class RegistryAuthError extends Error {
    abstract readonly code: RegistryAuthErrorCode;
}

/** The `WWW-Authenticate` header value is malformed or incomplete. */
export class WwwAuthenticateParseError extends RegistryAuthError {
    override name = 'WwwAuthenticateParseError';
    constructor(
        readonly code: WwwAuthenticateParseErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class CredentialError extends RegistryAuthError {
    override name = 'CredentialError';
    constructor(
        readonly code: CredentialErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class TransportError extends RegistryAuthError {
    override name = 'TransportError';
    constructor(
        readonly code: TransportErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

/** An error body entry, as in `{"errors": [{"code": ..., "message": ...}]}`. */
export interface RegistryError {
    code?: string;
    message: string;
    detail?: unknown;
}

export class UnexpectedHttpStatusError extends TransportError {
    override name = 'UnexpectedHttpStatusError';
    constructor(
        readonly status: number,
        readonly errors: RegistryError[],
        message: string,
    ) {
        super('UnexpectedHttpStatus', message);
    }
}

export class ProtocolError extends RegistryAuthError {
    override name = 'ProtocolError';
    constructor(
        readonly code: ProtocolErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export function isRegistryAuthError(
    err: unknown,
    code?: RegistryAuthErrorCode,
): err is RegistryAuthError {
    if (!(err instanceof RegistryAuthError)) return false;
    return code === undefined || err.code === code;
}
