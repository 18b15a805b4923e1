#!/usr/bin/env node
/**
 * bin/holdback.ts — entry point for the `holdback` CLI command.
 *
 * HOLDBACK_HOME=/tmp/q holdback init treasury --admin 0xadmin --avatar 0xsafe --target 0xsafe
 * holdback --as 0xadmin proposers add 0xalice
 */

import { createProgram } from '../commands/index.js'

await createProgram().parseAsync()
