/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Authenticate against a registry, roughly what `docker login` does.
 *
 * Usage:
 *      npm run example -- examples/login.ts [-u username] [-p password] [-s SCOPE]... [INDEX-NAME]
 *
 * Run with -v for more verbose logging.
 *
 * Example:
 *      $ npm run example -- examples/login.ts -s repository:library/alpine:pull docker.io
 *      Result: {
 *          "type": "Bearer",
 *          "token": "e****A",
 *          "expiresIn": 300
 *      }
 */

import { mainline, fail } from "./mainline.ts";
import { RegistryClientV2, maskToken } from "../lib/index.ts";

const cmd = 'login';
const { opts, args, log } = await mainline({
    cmd,
    usage: '[-u username] [-p password] [-s SCOPE]... [INDEX-NAME]',
});

// `docker login` with no args passes
// `serveraddress=https://index.docker.io/v1/` (yes, "v1", even for v2 reg).
const indexName = args[0] ?? 'https://index.docker.io/v1/';

try {
    const client = new RegistryClientV2({
        name: indexName,
        username: opts.username,
        password: opts.password,
        log,
    });
    const { authInfo } = await client.authenticate(opts.scopes);
    const shown = authInfo?.type === 'Bearer'
        ? { ...authInfo, token: maskToken(authInfo.token) }
        : authInfo && { type: authInfo.type, username: authInfo.username };
    console.log('Result:', JSON.stringify(shown, null, 4));
} catch (err) {
    fail(cmd, err, opts);
}
