#!/usr/bin/env node
// =============================================================================
// fenfeed CLI — draws the featured game feed in the terminal
// =============================================================================

import { run } from './app.js';

const controller = new AbortController();
const stop = () => controller.abort();
process.once('SIGINT', stop);

run(process.argv.slice(2), {
    env: process.env,
    out: process.stdout,
    err: process.stderr,
    interactive: process.stdout.isTTY === true,
    signal: controller.signal,
}).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    },
).finally(() => {
    process.off('SIGINT', stop);
});
