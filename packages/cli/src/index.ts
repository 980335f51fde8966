#!/usr/bin/env tsx

/**
 * evmkit CLI
 */

import { run } from './program'

process.exitCode = await run(process.argv)
