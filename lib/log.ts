/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.Level;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export const DEFAULT_LOG_NAME = 'registry-auth-client';
export const LOG_LEVEL_ENV = 'REGISTRY_AUTH_LOG_LEVEL';

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Level for the default logger: `$REGISTRY_AUTH_LOG_LEVEL`, else 'warn'.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const level = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    return level && isLogLevel(level) ? level : 'warn';
}

export function createLogger(opts: {
    name?: string;
    level?: LogLevel;
    destination?: pino.DestinationStream;
} = {}): Logger {
    const options: pino.LoggerOptions = {
        name: opts.name ?? DEFAULT_LOG_NAME,
        level: opts.level ?? logLevelFromEnv(),
    };
    return opts.destination ? pino(options, opts.destination) : pino(options);
}

let defaultLog: Logger | undefined;

/** Process-wide logger used when a client is not given its own `log`. */
export function getDefaultLogger(): Logger {
    defaultLog ??= createLogger();
    return defaultLog;
}
