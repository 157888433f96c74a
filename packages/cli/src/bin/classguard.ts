#!/usr/bin/env node
/**
 * bin/classguard.ts: entry point for the `classguard` command.
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
