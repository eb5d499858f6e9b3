/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { mainline, fail } from "./mainline.ts";
import { createClient } from "../lib/index.ts";

// Shared mainline with the other examples to get CLI opts.
const cmd = 'isAuthenticated';
const { opts, args, log } = await mainline({
    cmd,
    usage: '[-u username] [-p password] [-s SCOPE]... INDEX-NAME',
});
const name = args[0];
if (!name) {
    console.error('usage: npm run example -- examples/%s.ts INDEX-NAME', cmd);
    process.exit(2);
}

try {
    const client = createClient({
        name,
        username: opts.username,
        password: opts.password,
        log,
    });
    console.log('before login:', await client.isAuthenticated());

    const authed = await client.authenticate(opts.scopes);
    console.log('after login:', await authed.isAuthenticated());
} catch (err) {
    fail(cmd, err, opts);
}
