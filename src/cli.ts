#!/usr/bin/env node

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { scanCommand } from './commands/scan.js'
import { statusCommand } from './commands/status.js'
import { clearCommand } from './commands/clear.js'

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('registry-scan')
    .usage('$0 <command> [options]')
    .command(scanCommand)
    .command(statusCommand)
    .command(clearCommand)
    .demandCommand(1, 'You must specify a command')
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .strict()
    .parse()
}

main().catch((error: Error) => {
  console.error('Error:', error.message)
  process.exit(1)
})
