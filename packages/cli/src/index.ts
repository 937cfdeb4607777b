#!/usr/bin/env node
/**
 * hashdrop - share files through a content-addressed store on your own server.
 *
 * Thin argument layer: everything past option parsing lives in @hashdrop/core.
 */

import { runCli } from './program.js'

process.exitCode = await runCli(process.argv.slice(2))
