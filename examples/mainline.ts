/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Shared code for the examples in this dir to get CLI options.
 */

import { parseArgs, type ParseArgsConfig } from "node:util";
import { createInterface } from "node:readline/promises";

import { createLogger, type Logger } from "../lib/index.ts";

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

const options = {
    help: { type: 'boolean', short: 'h' },
    verbose: { type: 'boolean', short: 'v' },
    scope: { type: 'string', short: 's', multiple: true },
    username: { type: 'string', short: 'u' },
    password: { type: 'string', short: 'p' },
} satisfies OptionsConfig;

export interface MainlineOpts {
    verbose: boolean;
    scopes: string[];
    username?: string;
    password?: string;
}


export function fail(cmd: string, err: unknown, opts: {
    verbose?: boolean;
} = {}): never {
    const errToShow = err instanceof Error
        ? (opts.verbose ? err.stack ?? err.message : err.message)
        : String(err);
    console.error('%s: error: %s', cmd, errToShow);
    process.exit(2);
}


export async function mainline(config: {
    cmd: string;
    usage: string;
}): Promise<{ opts: MainlineOpts; args: string[]; log: Logger }> {
    const { values, positionals } = parseArgs({
        options,
        allowPositionals: true,
    });

    if (values.help) {
        console.log(`usage: ${config.cmd} ${config.usage}`);
        process.exit(0);
    }

    const opts: MainlineOpts = {
        verbose: values.verbose ?? false,
        scopes: values.scope ?? [],
        username: values.username,
        password: values.password,
    };

    // Handle password prompt, if necessary.
    if (opts.username && opts.password === undefined) {
        const rl = createInterface({ input: process.stdin, output: process.stderr });
        try {
            opts.password = (await rl.question(`Password for ${opts.username}: `)).trim();
        } finally {
            rl.close();
        }
    }

    const log = createLogger({ name: config.cmd, level: opts.verbose ? 'trace' : 'warn' });
    return { opts, args: positionals, log };
}
