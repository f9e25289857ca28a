/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/rigger.ts.
 */

import { program } from 'commander'
import { applyCommand, revertCommand, validateCommand } from './lifecycle.js'
import { listCommand } from './list.js'
import { logCommand } from './log.js'

program
  .name('rigger')
  .description(
    'Rigger — declarative package provisioning.\n' +
    'Packages bundle apply / revert / validate actions run against a node.',
  )
  .version('0.1.0')

program.addCommand(applyCommand)
program.addCommand(revertCommand)
program.addCommand(validateCommand)
program.addCommand(listCommand)
program.addCommand(logCommand)

export { program }
