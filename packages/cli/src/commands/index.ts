/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/classguard.ts.
 */

import { program } from 'commander'
import { demoCommand } from './demo.js'
import { logCommand } from './log.js'

program
  .name('classguard')
  .description(
    'classguard: access control, constants, abstract/final classes and\n' +
    'interfaces for JavaScript objects, enforced at run time.',
  )
  .version('0.1.0')

program.addCommand(demoCommand)
program.addCommand(logCommand)

export { program }
