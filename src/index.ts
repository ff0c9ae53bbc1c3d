#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import packageJson from '../package.json'

import { deobfEvents } from './lib/events'

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  deobfEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  deobfEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main() {
  try {
    program
      .name('deobf')
      .description('Manage deobfuscation dependency configurations')
      .version(packageJson.version)

    setupCommands(program)

    await program.parseAsync(process.argv)
  } catch (error) {
    deobfEvents.emitEvent({
      type: 'cli_error',
      level: 'error',
      data: {
        message: error instanceof Error ? error.message : String(error)
      }
    })
    process.exit(1)
  }
}

void main()
