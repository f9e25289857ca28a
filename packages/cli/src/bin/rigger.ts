#!/usr/bin/env node
/**
 * bin/rigger.ts — entry point for the `rigger` CLI command.
 */

import { program } from '../commands/index.js'

await program.parseAsync()
